import { IdleLeaveDelays } from '../config';
import { NoActiveSessionError, PlaybackTransportError } from './errors';
import { IdleLeaveScheduler } from './idle-leave';
import { GuildState, PlaySession } from './queue';
import { Notifier, Track, hasHumanMembers } from './types';

export interface EnqueueResult {
  track: Track;
  /** 1-based position in the pending queue, or 0 when playback started with this track. */
  position: number;
  started: boolean;
}

/**
 * Turns a guild's queue into a sequence of play sessions.
 *
 * Every transition (enqueue, advance, stop) runs under the guild's
 * `mutationLock`; completion events from the voice session are re-posted onto
 * the event loop before they take the lock.
 */
export class PlaybackController {
  private readonly idleLeave: IdleLeaveScheduler;
  private readonly notifier: Notifier;
  private readonly delays: IdleLeaveDelays;

  constructor(idleLeave: IdleLeaveScheduler, notifier: Notifier, delays: IdleLeaveDelays) {
    this.idleLeave = idleLeave;
    this.notifier = notifier;
    this.delays = delays;
  }

  /** Connects to `voiceChannelId` unless already connected, and remembers it for rejoining. */
  async join(state: GuildState, voiceChannelId: string): Promise<void> {
    state.lastVoiceChannelId = voiceChannelId;
    if (state.voice.isConnected()) return;
    console.log(`[voice] Joining guild=${state.guildId} channel=${voiceChannelId}`);
    await state.voice.connect(voiceChannelId);
  }

  async enqueueAndMaybeStart(state: GuildState, track: Track): Promise<EnqueueResult> {
    return state.mutationLock.run(async () => {
      const position = state.addSong(track);
      this.idleLeave.cancel(state);

      if (state.getCurrentSong() === null && !state.voice.isPlaying()) {
        await this.advance(state);
        if (state.getCurrentSong() === track) {
          return { track, position: 0, started: true };
        }
      }
      return { track, position, started: false };
    });
  }

  /**
   * Starts the next queued track. With `finished`, does nothing unless that
   * session is still the active one, so one completion advances at most once.
   */
  async playNext(state: GuildState, finished?: PlaySession): Promise<void> {
    await state.mutationLock.run(async () => {
      if (finished) {
        if (!state.isActiveSession(finished)) return;
        state.endSession();
      }
      await this.advance(state);
    });
  }

  pause(state: GuildState): Track | null {
    if (!state.voice.pause()) {
      throw new NoActiveSessionError('Nothing is playing right now.');
    }
    return state.getCurrentSong();
  }

  resume(state: GuildState): Track | null {
    if (!state.voice.resume()) {
      throw new NoActiveSessionError('Playback is not paused.');
    }
    return state.getCurrentSong();
  }

  /** Stops the current stream; its completion advances the queue. */
  skip(state: GuildState): Track | null {
    if (!state.voice.isPlaying() && !state.voice.isPaused()) {
      throw new NoActiveSessionError('There is nothing to skip.');
    }
    const skipped = state.getCurrentSong();
    state.voice.stop();
    return skipped;
  }

  async stop(state: GuildState): Promise<void> {
    await state.mutationLock.run(() => {
      state.clear();
      if (state.voice.isPlaying() || state.voice.isPaused()) {
        state.voice.stop();
      }
      if (state.voice.isConnected() && !hasHumanMembers(state.voice)) {
        this.idleLeave.schedule(state, this.delays.stopMs);
      }
    });
  }

  // Caller holds state.mutationLock.
  private async advance(state: GuildState): Promise<void> {
    const track = state.getNextSong();
    if (!track) {
      state.endSession();
      if (state.voice.isConnected() && !hasHumanMembers(state.voice)) {
        this.idleLeave.schedule(state, this.delays.queueEmptyMs);
      }
      return;
    }

    this.idleLeave.cancel(state);

    if (!state.voice.isConnected()) {
      const rejoined = await this.rejoin(state);
      if (!rejoined) {
        state.requeueCurrent();
        this.announce(state, 'I lost the voice connection. Join a voice channel and play again.');
        return;
      }
    }

    const session = state.beginSession(track);
    console.log(`[playback] Now playing guild=${state.guildId} session=${session.id} title="${track.title}"`);
    try {
      state.voice.play(track.streamUrl, (error) => this.onComplete(state, session, error));
    } catch (error) {
      this.onComplete(state, session, error instanceof Error ? error : new Error(String(error)));
      return;
    }
    this.announce(state, `Now playing: **${track.title}**`);
  }

  private async rejoin(state: GuildState): Promise<boolean> {
    const channelId = state.lastVoiceChannelId;
    if (!channelId) return false;
    try {
      console.log(`[voice] Rejoining guild=${state.guildId} channel=${channelId}`);
      await state.voice.connect(channelId);
      return true;
    } catch (error) {
      console.error(`[voice] Rejoin failed guild=${state.guildId}:`, error);
      return false;
    }
  }

  private onComplete(state: GuildState, session: PlaySession, error?: Error): void {
    if (session.completed) return;
    session.completed = true;

    if (error) {
      console.error('[playback]', new PlaybackTransportError(session.track.title, error));
    }

    setImmediate(() => {
      this.playNext(state, session).catch((advanceError) => {
        console.error(`[playback] Advancing queue failed guild=${state.guildId}:`, advanceError);
      });
    });
  }

  private announce(state: GuildState, text: string): void {
    this.notifier.send(state.guildId, state.lastTextChannelId, text).catch((error) => {
      console.warn(`[playback] Notice failed guild=${state.guildId}:`, error);
    });
  }
}
