import { CommandContext } from '../../src/commands/play';
import { CandidateTrack } from '../../src/music/types';

export interface RecordedContext {
  ctx: CommandContext;
  replies: string[];
  choices: Array<{ text: string; candidates: readonly CandidateTrack[] }>;
}

export function createContext(overrides: Partial<Omit<CommandContext, 'reply' | 'presentChoices'>> = {}): RecordedContext {
  const replies: string[] = [];
  const choices: Array<{ text: string; candidates: readonly CandidateTrack[] }> = [];
  const ctx: CommandContext = {
    guildId: 'guild-1',
    authorId: 'user-1',
    channelId: 'text-1',
    authorVoiceChannelId: 'voice-1',
    attachments: [],
    ...overrides,
    reply: async (text) => {
      replies.push(text);
    },
    presentChoices: async (text, candidates) => {
      choices.push({ text, candidates });
    },
  };
  return { ctx, replies, choices };
}
