export type MusicErrorCode =
  | 'RESOLUTION_FAILED'
  | 'INVALID_SELECTION'
  | 'SELECTION_IN_PROGRESS'
  | 'NOT_IN_VOICE_CHANNEL'
  | 'NO_ACTIVE_SESSION'
  | 'PLAYBACK_TRANSPORT';

/**
 * Base class for failures that are reported back to the command issuer.
 * `message` is the user-facing text.
 */
export class MusicError extends Error {
  readonly code: MusicErrorCode;

  constructor(message: string, code: MusicErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No result, no audio stream, or the upstream source rejected the request. */
export class ResolutionError extends MusicError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'RESOLUTION_FAILED', options);
  }
}

export class InvalidSelectionError extends MusicError {
  constructor(message: string) {
    super(message, 'INVALID_SELECTION');
  }
}

export class SelectionInProgressError extends MusicError {
  constructor() {
    super('Hold on, the previous selection is still being processed.', 'SELECTION_IN_PROGRESS');
  }
}

export class NotInVoiceChannelError extends MusicError {
  constructor() {
    super('You need to be in a voice channel first!', 'NOT_IN_VOICE_CHANNEL');
  }
}

export class NoActiveSessionError extends MusicError {
  constructor(message: string) {
    super(message, 'NO_ACTIVE_SESSION');
  }
}

// Logged and treated as the end of the track; never shown to users.
export class PlaybackTransportError extends MusicError {
  constructor(title: string, cause?: unknown) {
    super(`Playback failed for "${title}"`, 'PLAYBACK_TRANSPORT', { cause });
  }
}

export function isMusicError(value: unknown): value is MusicError {
  return value instanceof MusicError;
}
