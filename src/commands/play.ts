// src/commands/play.ts
import { NotInVoiceChannelError, isMusicError } from '../music/errors';
import { EnqueueResult, PlaybackController } from '../music/playback';
import { GuildState } from '../music/queue';
import { SearchSelectionFlow } from '../music/selection';
import { StateRegistry } from '../music/state';
import { CandidateTrack, MediaResolver, Track, createTrack } from '../music/types';
import { formatCandidateList, formatQueue } from './play-ui';

export interface Attachment {
  url: string;
  name: string;
}

/** What a command handler needs from the message or button that triggered it. */
export interface CommandContext {
  guildId: string;
  authorId: string;
  channelId: string;
  authorVoiceChannelId: string | null;
  attachments: Attachment[];
  reply(text: string): Promise<void>;
  /** Replies with `text` plus one selection control per candidate. */
  presentChoices(text: string, candidates: readonly CandidateTrack[]): Promise<void>;
}

export const HELP_TEXT = [
  'Commands:',
  'play <link | search terms> (p): play a link, search, or play an attached file',
  'choose <number> (pick): pick one of the last search results',
  'pause / resume: pause or resume the current track',
  'skip (next): skip the current track',
  'stop: stop playback and clear the queue',
  'now (np): show the current track',
  'queue (q): list upcoming tracks',
  'help: show this message',
].join('\n');

function describeEnqueue(result: EnqueueResult): string {
  if (result.started) return `Playing **${result.track.title}**`;
  return `Added to queue: **${result.track.title}** (position ${result.position})`;
}

export function isUrl(text: string): boolean {
  return /^https?:\/\//.test(text);
}

export class MusicCommands {
  private readonly registry: StateRegistry;
  private readonly resolver: MediaResolver;
  private readonly playback: PlaybackController;
  private readonly selection: SearchSelectionFlow;

  constructor(
    registry: StateRegistry,
    resolver: MediaResolver,
    playback: PlaybackController,
    selection: SearchSelectionFlow
  ) {
    this.registry = registry;
    this.resolver = resolver;
    this.playback = playback;
    this.selection = selection;
  }

  async handlePlay(ctx: CommandContext, query: string): Promise<void> {
    await this.guard(ctx, 'play', async (state) => {
      const trimmed = query.trim();
      if (!trimmed && ctx.attachments.length === 0) {
        await ctx.reply('Usage: play <link or search terms>, or attach an audio file.');
        return;
      }
      if (!ctx.authorVoiceChannelId) {
        throw new NotInVoiceChannelError();
      }
      await this.playback.join(state, ctx.authorVoiceChannelId);

      let track: Track;
      if (!trimmed) {
        const attachment = ctx.attachments[0];
        track = createTrack(attachment.url, attachment.name, attachment.url);
      } else if (isUrl(trimmed)) {
        track = await this.resolver.resolveOne(trimmed);
      } else {
        const candidates = await this.selection.search(state, trimmed);
        await ctx.presentChoices(formatCandidateList(candidates), candidates);
        return;
      }

      const result = await this.playback.enqueueAndMaybeStart(state, track);
      await ctx.reply(describeEnqueue(result));
    });
  }

  /**
   * Resolves a search result by number. Returns true when a track was queued.
   * A button passes the list it was rendered for as `expected`.
   */
  async handleChoose(
    ctx: CommandContext,
    rawIndex: string | number,
    expected?: readonly CandidateTrack[]
  ): Promise<boolean> {
    const index = typeof rawIndex === 'number' ? rawIndex : Number(rawIndex.trim());
    if (typeof rawIndex === 'string' && (!rawIndex.trim() || !Number.isInteger(index))) {
      await ctx.reply('Usage: choose <number> (for example: choose 2)');
      return false;
    }

    let queued = false;
    await this.guard(ctx, 'choose', async (state) => {
      const result = await this.selection.select(state, index, async () => {
        if (ctx.authorVoiceChannelId) {
          await this.playback.join(state, ctx.authorVoiceChannelId);
        } else if (!state.voice.isConnected()) {
          throw new NotInVoiceChannelError();
        }
      }, expected);
      queued = true;
      await ctx.reply(describeEnqueue(result));
    });
    return queued;
  }

  async handlePause(ctx: CommandContext): Promise<void> {
    await this.guard(ctx, 'pause', async (state) => {
      this.playback.pause(state);
      await ctx.reply('⏸️ Paused.');
    });
  }

  async handleResume(ctx: CommandContext): Promise<void> {
    await this.guard(ctx, 'resume', async (state) => {
      this.playback.resume(state);
      await ctx.reply('▶️ Resumed.');
    });
  }

  async handleSkip(ctx: CommandContext): Promise<void> {
    await this.guard(ctx, 'skip', async (state) => {
      this.playback.skip(state);
      await ctx.reply('⏭️ Skipped.');
    });
  }

  async handleStop(ctx: CommandContext): Promise<void> {
    await this.guard(ctx, 'stop', async (state) => {
      await this.playback.stop(state);
      await ctx.reply('⏹️ Stopped and cleared the queue.');
    });
  }

  async handleNow(ctx: CommandContext): Promise<void> {
    await this.guard(ctx, 'now', async (state) => {
      const current = state.getCurrentSong();
      await ctx.reply(current ? `Now playing: **${current.title}**\n${current.pageUrl}` : 'Nothing is playing right now.');
    });
  }

  async handleQueue(ctx: CommandContext): Promise<void> {
    await this.guard(ctx, 'queue', async (state) => {
      await ctx.reply(formatQueue(state.getQueue()));
    });
  }

  async handleHelp(ctx: CommandContext): Promise<void> {
    await ctx.reply(HELP_TEXT);
  }

  private async guard(
    ctx: CommandContext,
    command: string,
    run: (state: GuildState) => Promise<void>
  ): Promise<void> {
    const state = this.registry.getOrCreate(ctx.guildId);
    state.rememberTextChannel(ctx.channelId);
    try {
      await run(state);
    } catch (error) {
      if (isMusicError(error)) {
        console.log(`[command] ${command} rejected guild=${ctx.guildId} code=${error.code}`);
        await ctx.reply(error.message);
        return;
      }
      console.error(`[command] ${command} failed guild=${ctx.guildId}:`, error);
      await ctx.reply(`Something went wrong while running ${command}.`);
    }
  }
}
