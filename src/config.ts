function readInt(name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = Number.parseInt(process.env[name] || String(fallback), 10);
  if (!Number.isFinite(raw)) return fallback;
  return Math.max(min, Math.min(max, raw));
}

function readString(name: string, fallback: string): string {
  const value = process.env[name]?.trim();
  return value ? value : fallback;
}

export function discordToken(): string | undefined {
  return process.env.DISCORD_TOKEN?.trim() || undefined;
}

export function commandPrefix(): string {
  return readString('COMMAND_PREFIX', '!');
}

/** Grace periods before leaving a voice channel with no human listeners. */
export interface IdleLeaveDelays {
  /** A membership change left the channel without humans. */
  membershipMs: number;
  /** `stop` was issued. */
  stopMs: number;
  /** The queue drained on its own. */
  queueEmptyMs: number;
}

export function idleLeaveDelays(): IdleLeaveDelays {
  return {
    membershipMs: readInt('IDLE_LEAVE_MEMBERSHIP_MS', 1000, 0),
    stopMs: readInt('IDLE_LEAVE_STOP_MS', 5000, 0),
    queueEmptyMs: readInt('IDLE_LEAVE_QUEUE_EMPTY_MS', 15000, 0),
  };
}

export function searchResultCount(): number {
  return readInt('SEARCH_RESULT_COUNT', 5, 1, 10);
}

export function chooseButtonTimeoutMs(): number {
  return readInt('CHOOSE_BUTTON_TIMEOUT_MS', 60000, 1000);
}

export function ytDlpSocketTimeout(): number {
  return readInt('YTDLP_SOCKET_TIMEOUT', 10, 1, 120);
}

export function ytDlpBinary(): string {
  return readString('YTDLP_PATH', 'yt-dlp');
}

export function ffmpegBinary(): string {
  return readString('FFMPEG_PATH', 'ffmpeg');
}
