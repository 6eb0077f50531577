/** A resolved, playable item. */
export interface Track {
  /** Opaque handle the audio pipe can open (direct media URL). */
  readonly streamUrl: string;
  readonly title: string;
  /** Source page; equals `streamUrl` when no separate page exists. */
  readonly pageUrl: string;
}

/** An unresolved, metadata-only search hit. */
export interface CandidateTrack {
  readonly title: string;
  readonly pageUrl: string;
  /** Whole seconds. */
  readonly duration?: number;
  readonly channel?: string;
}

export function createTrack(streamUrl: string, title: string, pageUrl?: string): Track {
  return Object.freeze({ streamUrl, title, pageUrl: pageUrl || streamUrl });
}

export interface MediaResolver {
  resolveOne(queryOrPage: string): Promise<Track>;
  searchFlat(query: string, count: number): Promise<CandidateTrack[]>;
}

export interface ChannelMember {
  id: string;
  bot: boolean;
}

/** Called once per play session, with the transport error if the stream failed. */
export type PlaybackCompletion = (error?: Error) => void;

/** Voice connection of the bot in one guild. */
export interface VoiceSession {
  connect(channelId: string): Promise<void>;
  disconnect(): void;
  play(streamUrl: string, onComplete: PlaybackCompletion): void;
  /** Returns false when the player was not actually playing. */
  pause(): boolean;
  /** Returns false when the player was not paused by a command. */
  resume(): boolean;
  stop(): void;
  isPlaying(): boolean;
  isPaused(): boolean;
  isConnected(): boolean;
  currentChannelMembers(): ChannelMember[];
}

export interface Notifier {
  /**
   * Sends `text` to `channelId`, or to a fallback channel of the guild when the
   * channel is unknown or unusable.
   */
  send(guildId: string, channelId: string | null, text: string): Promise<void>;
}

export function hasHumanMembers(voice: VoiceSession): boolean {
  if (!voice.isConnected()) return false;
  return voice.currentChannelMembers().some((member) => !member.bot);
}
