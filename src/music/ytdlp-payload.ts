// Shapes of `yt-dlp --dump-single-json` output, read field by field.

export interface MediaFormat {
  url?: string;
  acodec?: string;
  vcodec?: string;
  abr?: number;
  tbr?: number;
}

export interface ExtractedInfo {
  title?: string;
  url?: string;
  webpageUrl?: string;
  originalUrl?: string;
  formats: MediaFormat[];
}

export interface SearchEntry {
  title?: string;
  url?: string;
  webpageUrl?: string;
  originalUrl?: string;
  duration?: number;
  channel?: string;
  uploader?: string;
}

type JsonRecord = Record<string, unknown>;

function asRecord(value: unknown): JsonRecord | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? (value as JsonRecord)
    : null;
}

function readString(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value ? value : undefined;
}

function readNumber(record: JsonRecord, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readEntries(record: JsonRecord): JsonRecord[] {
  const entries = record.entries;
  if (!Array.isArray(entries)) return [];
  return entries.map(asRecord).filter((entry): entry is JsonRecord => entry !== null);
}

export function parseJsonOutput(stdout: string): JsonRecord | null {
  const trimmed = stdout.trim();
  if (!trimmed || trimmed === 'null') return null;
  return asRecord(JSON.parse(trimmed));
}

function toFormat(record: JsonRecord): MediaFormat {
  return {
    url: readString(record, 'url'),
    acodec: readString(record, 'acodec'),
    vcodec: readString(record, 'vcodec'),
    abr: readNumber(record, 'abr'),
    tbr: readNumber(record, 'tbr'),
  };
}

/** Reads a single-item payload; a search or playlist result yields its first entry. */
export function toExtractedInfo(payload: JsonRecord | null): ExtractedInfo | null {
  if (!payload) return null;
  const entries = readEntries(payload);
  if ('entries' in payload && entries.length === 0) return null;
  const info = entries.length > 0 ? entries[0] : payload;

  const formats = Array.isArray(info.formats)
    ? info.formats.map(asRecord).filter((f): f is JsonRecord => f !== null).map(toFormat)
    : [];

  return {
    title: readString(info, 'title'),
    url: readString(info, 'url'),
    webpageUrl: readString(info, 'webpage_url'),
    originalUrl: readString(info, 'original_url'),
    formats,
  };
}

export function toSearchEntries(payload: JsonRecord | null): SearchEntry[] {
  if (!payload) return [];
  return readEntries(payload).map((entry) => ({
    title: readString(entry, 'title'),
    url: readString(entry, 'url'),
    webpageUrl: readString(entry, 'webpage_url'),
    originalUrl: readString(entry, 'original_url'),
    duration: readNumber(entry, 'duration'),
    channel: readString(entry, 'channel'),
    uploader: readString(entry, 'uploader'),
  }));
}
