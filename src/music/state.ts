import { GuildState } from './queue';
import { VoiceSession } from './types';

export type VoiceSessionFactory = (guildId: string) => VoiceSession;

/**
 * Process-wide guild → state map. States are created on first reference and
 * live until `evict` is called.
 */
export class StateRegistry {
  private readonly states = new Map<string, GuildState>();
  private readonly createVoice: VoiceSessionFactory;

  constructor(createVoice: VoiceSessionFactory) {
    this.createVoice = createVoice;
  }

  getOrCreate(guildId: string): GuildState {
    let state = this.states.get(guildId);
    if (!state) {
      state = new GuildState(guildId, this.createVoice(guildId));
      this.states.set(guildId, state);
    }
    return state;
  }

  get(guildId: string): GuildState | undefined {
    return this.states.get(guildId);
  }

  evict(guildId: string): GuildState | undefined {
    const state = this.states.get(guildId);
    this.states.delete(guildId);
    return state;
  }

  get size(): number {
    return this.states.size;
  }
}
