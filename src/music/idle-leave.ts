import { GuildState, IdleLeaveTimer } from './queue';
import { Notifier, hasHumanMembers } from './types';

export const DEPARTURE_MESSAGE = 'Nobody is left in here, so I will take my leave.';

/**
 * Per-guild delayed disconnect. At most one timer is armed per guild; arming a
 * new one replaces the old.
 */
export class IdleLeaveScheduler {
  private readonly notifier: Notifier;

  constructor(notifier: Notifier) {
    this.notifier = notifier;
  }

  schedule(state: GuildState, delayMs: number): void {
    this.cancel(state);
    const timer: IdleLeaveTimer = {
      timeout: setTimeout(() => {
        this.fire(state, timer).catch((error) => {
          console.error(`[idle-leave] Timer failed guild=${state.guildId}:`, error);
        });
      }, delayMs),
      delayMs,
    };
    state.idleLeaveTimer = timer;
    console.log(`[idle-leave] Armed guild=${state.guildId} delay=${delayMs}ms`);
  }

  /** Returns true when a pending timer was removed. */
  cancel(state: GuildState): boolean {
    const timer = state.idleLeaveTimer;
    if (!timer) return false;
    clearTimeout(timer.timeout);
    state.idleLeaveTimer = null;
    console.log(`[idle-leave] Cancelled guild=${state.guildId}`);
    return true;
  }

  /** Reacts to someone joining or leaving the bot's voice channel. */
  onMembershipChange(state: GuildState, delayMs: number): void {
    if (!state.voice.isConnected()) return;
    if (hasHumanMembers(state.voice)) {
      this.cancel(state);
    } else {
      this.schedule(state, delayMs);
    }
  }

  /**
   * Runs when `timer` elapses. Returns true if the bot left the channel.
   * The claim on the timer and the membership re-check happen under the
   * guild lock, so a cancel that lands first turns this into a no-op.
   */
  async fire(state: GuildState, timer: IdleLeaveTimer): Promise<boolean> {
    const left = await state.mutationLock.run(() => {
      if (state.idleLeaveTimer !== timer) return false;
      state.idleLeaveTimer = null;

      if (!state.voice.isConnected() || hasHumanMembers(state.voice)) {
        console.log(`[idle-leave] Conditions changed, staying guild=${state.guildId}`);
        return false;
      }

      state.clear();
      state.voice.disconnect();
      return true;
    });

    if (!left) return false;

    console.log(`[idle-leave] Left voice channel guild=${state.guildId}`);
    try {
      await this.notifier.send(state.guildId, state.lastTextChannelId, DEPARTURE_MESSAGE);
    } catch (error) {
      console.warn(`[idle-leave] Departure notice failed guild=${state.guildId}:`, error);
    }
    return true;
  }
}
