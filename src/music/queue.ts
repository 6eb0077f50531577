// src/music/queue.ts
import { SerialLock } from './lock';
import { CandidateTrack, Track, VoiceSession } from './types';

export interface IdleLeaveTimer {
  readonly timeout: ReturnType<typeof setTimeout>;
  readonly delayMs: number;
}

export interface PlaySession {
  readonly id: number;
  readonly track: Track;
  completed: boolean;
}

/**
 * Mutable playback state of one guild.
 *
 * `queue`, `current` and `session` are only changed while holding
 * `mutationLock`. `pendingCandidates` is guarded by `chooseInFlight` instead.
 */
export class GuildState {
  readonly guildId: string;
  readonly voice: VoiceSession;
  readonly mutationLock = new SerialLock();

  private queue: Track[] = [];
  private currentTrack: Track | null = null;
  private session: PlaySession | null = null;
  private sessionCounter = 0;

  pendingCandidates: readonly CandidateTrack[] | null = null;
  chooseInFlight = false;
  lastTextChannelId: string | null = null;
  lastVoiceChannelId: string | null = null;
  idleLeaveTimer: IdleLeaveTimer | null = null;

  constructor(guildId: string, voice: VoiceSession) {
    this.guildId = guildId;
    this.voice = voice;
  }

  addSong(track: Track): number {
    this.queue.push(track);
    return this.queue.length;
  }

  getCurrentSong(): Track | null {
    return this.currentTrack;
  }

  /** Moves the queue head into `current`; clears `current` when the queue is empty. */
  getNextSong(): Track | null {
    this.currentTrack = this.queue.shift() ?? null;
    return this.currentTrack;
  }

  /** Puts the current track back at the head of the queue. */
  requeueCurrent(): void {
    if (!this.currentTrack) return;
    this.queue.unshift(this.currentTrack);
    this.currentTrack = null;
  }

  clear(): void {
    this.queue = [];
    this.currentTrack = null;
    this.endSession();
  }

  getQueue(): Track[] {
    return [...this.queue];
  }

  beginSession(track: Track): PlaySession {
    this.sessionCounter += 1;
    this.session = { id: this.sessionCounter, track, completed: false };
    return this.session;
  }

  /** Detaches the active session so its completion no longer advances the queue. */
  endSession(): void {
    if (this.session) {
      this.session.completed = true;
    }
    this.session = null;
  }

  isActiveSession(session: PlaySession): boolean {
    return this.session === session;
  }

  rememberTextChannel(channelId: string): void {
    this.lastTextChannelId = channelId;
  }
}
