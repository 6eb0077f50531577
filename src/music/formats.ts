import { ExtractedInfo, MediaFormat } from './ytdlp-payload';

function hasCodec(codec: string | undefined): boolean {
  return !!codec && codec !== 'none';
}

function byBitrateDesc(rate: (format: MediaFormat) => number) {
  return (a: MediaFormat, b: MediaFormat) => rate(b) - rate(a);
}

/**
 * Picks the stream endpoint to play: the highest-bitrate audio-only format,
 * else the highest-bitrate combined audio+video format, else the payload's
 * own URL. Returns null when none exists.
 */
export function selectStreamUrl(info: ExtractedInfo): string | null {
  const playable = info.formats.filter((format) => !!format.url);

  const audioOnly = playable
    .filter((format) => hasCodec(format.acodec) && !hasCodec(format.vcodec))
    .sort(byBitrateDesc((format) => format.abr ?? format.tbr ?? 0));
  if (audioOnly.length > 0) return audioOnly[0].url ?? null;

  const combined = playable
    .filter((format) => hasCodec(format.acodec) && hasCodec(format.vcodec))
    .sort(byBitrateDesc((format) => format.tbr ?? 0));
  if (combined.length > 0) return combined[0].url ?? null;

  return info.url ?? null;
}
