import { CommandHandlers, dispatchCommand, parseCommand } from '../../../src/commands/router';
import { muteConsole } from '../../helpers/fakes';
import { createContext } from '../../helpers/context';

describe('parseCommand', () => {
  it.each([
    ['!play never gonna', 'play', 'never gonna'],
    ['!P  spaced   out ', 'play', 'spaced   out'],
    ['!pick 2', 'choose', '2'],
    ['!choose', 'choose', ''],
    ['!next', 'skip', ''],
    ['!np', 'now', ''],
    ['!Q', 'queue', ''],
    ['  !help', 'help', ''],
  ])('parses %p', (content, name, args) => {
    expect(parseCommand(content, '!')).toEqual({ name, args });
  });

  it('ignores unknown commands and text without the prefix', () => {
    expect(parseCommand('!dance', '!')).toBeNull();
    expect(parseCommand('play something', '!')).toBeNull();
    expect(parseCommand('!', '!')).toBeNull();
    expect(parseCommand('!toString', '!')).toBeNull();
  });

  it('supports longer prefixes', () => {
    expect(parseCommand('jb!skip', 'jb!')).toEqual({ name: 'skip', args: '' });
  });
});

describe('dispatchCommand', () => {
  muteConsole();

  function fakeCommands(): jest.Mocked<CommandHandlers> {
    return {
      handlePlay: jest.fn().mockResolvedValue(undefined),
      handleChoose: jest.fn().mockResolvedValue(true),
      handlePause: jest.fn().mockResolvedValue(undefined),
      handleResume: jest.fn().mockResolvedValue(undefined),
      handleSkip: jest.fn().mockResolvedValue(undefined),
      handleStop: jest.fn().mockResolvedValue(undefined),
      handleNow: jest.fn().mockResolvedValue(undefined),
      handleQueue: jest.fn().mockResolvedValue(undefined),
      handleHelp: jest.fn().mockResolvedValue(undefined),
    };
  }

  it('passes arguments to the matching handler', async () => {
    const commands = fakeCommands();
    const { ctx } = createContext();

    await dispatchCommand(commands, ctx, { name: 'play', args: 'some song' });
    await dispatchCommand(commands, ctx, { name: 'choose', args: '3' });
    await dispatchCommand(commands, ctx, { name: 'help', args: '' });
    await dispatchCommand(commands, ctx, { name: 'skip', args: 'ignored' });

    expect(commands.handlePlay).toHaveBeenCalledWith(ctx, 'some song');
    expect(commands.handleChoose).toHaveBeenCalledWith(ctx, '3');
    expect(commands.handleHelp).toHaveBeenCalledWith(ctx);
    expect(commands.handleSkip).toHaveBeenCalledWith(ctx);
    expect(commands.handleStop).not.toHaveBeenCalled();
  });
});
