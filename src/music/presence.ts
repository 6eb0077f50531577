import { IdleLeaveScheduler } from './idle-leave';
import { StateRegistry } from './state';

/** One voice-state update, reduced to the channel ids that matter here. */
export interface VoiceStateChange {
  guildId: string;
  oldChannelId: string | null;
  newChannelId: string | null;
  /** Channel the bot currently sits in, if any. */
  botChannelId: string | null;
}

/** Feeds guild membership events into the idle-leave scheduler and the state registry. */
export class PresenceTracker {
  private readonly registry: StateRegistry;
  private readonly idleLeave: IdleLeaveScheduler;
  private readonly membershipDelayMs: number;

  constructor(registry: StateRegistry, idleLeave: IdleLeaveScheduler, membershipDelayMs: number) {
    this.registry = registry;
    this.idleLeave = idleLeave;
    this.membershipDelayMs = membershipDelayMs;
  }

  /** Returns true when the change touched the bot's channel and was forwarded. */
  onVoiceStateChange(change: VoiceStateChange): boolean {
    const { botChannelId } = change;
    if (!botChannelId) return false;
    if (change.oldChannelId === change.newChannelId) return false;
    if (change.oldChannelId !== botChannelId && change.newChannelId !== botChannelId) return false;

    const state = this.registry.get(change.guildId);
    if (!state) return false;
    this.idleLeave.onMembershipChange(state, this.membershipDelayMs);
    return true;
  }

  onGuildRemoved(guildId: string): void {
    const state = this.registry.evict(guildId);
    if (!state) return;
    this.idleLeave.cancel(state);
    state.clear();
    state.pendingCandidates = null;
    state.voice.disconnect();
    console.log(`[voice] Evicted state guild=${guildId}`);
  }
}
