import { CommandContext, MusicCommands } from './play';

export type CommandName = 'play' | 'choose' | 'pause' | 'resume' | 'skip' | 'stop' | 'now' | 'queue' | 'help';

const ALIASES: Record<string, CommandName> = {
  play: 'play',
  p: 'play',
  choose: 'choose',
  pick: 'choose',
  pause: 'pause',
  resume: 'resume',
  skip: 'skip',
  next: 'skip',
  stop: 'stop',
  now: 'now',
  np: 'now',
  queue: 'queue',
  q: 'queue',
  help: 'help',
};

export interface ParsedCommand {
  name: CommandName;
  /** Everything after the command word, trimmed. */
  args: string;
}

/** `!P  some song` → `{ name: 'play', args: 'some song' }`; unknown words and non-prefixed text → null. */
export function parseCommand(content: string, prefix: string): ParsedCommand | null {
  const text = content.trim();
  if (!prefix || !text.startsWith(prefix)) return null;

  const body = text.slice(prefix.length);
  const match = /^(\S+)\s*([\s\S]*)$/.exec(body);
  if (!match) return null;

  const word = match[1].toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(ALIASES, word)) return null;
  return { name: ALIASES[word], args: match[2].trim() };
}

export type CommandHandlers = Pick<
  MusicCommands,
  | 'handlePlay'
  | 'handleChoose'
  | 'handlePause'
  | 'handleResume'
  | 'handleSkip'
  | 'handleStop'
  | 'handleNow'
  | 'handleQueue'
  | 'handleHelp'
>;

export async function dispatchCommand(
  commands: CommandHandlers,
  ctx: CommandContext,
  command: ParsedCommand
): Promise<void> {
  console.log(`[command] ${command.name} guild=${ctx.guildId} user=${ctx.authorId}`);
  switch (command.name) {
    case 'play':
      await commands.handlePlay(ctx, command.args);
      break;
    case 'choose':
      await commands.handleChoose(ctx, command.args);
      break;
    case 'pause':
      await commands.handlePause(ctx);
      break;
    case 'resume':
      await commands.handleResume(ctx);
      break;
    case 'skip':
      await commands.handleSkip(ctx);
      break;
    case 'stop':
      await commands.handleStop(ctx);
      break;
    case 'now':
      await commands.handleNow(ctx);
      break;
    case 'queue':
      await commands.handleQueue(ctx);
      break;
    case 'help':
      await commands.handleHelp(ctx);
      break;
  }
}
