// src/music/search.ts
import execa from 'execa';
import { ytDlpBinary, ytDlpSocketTimeout } from '../config';
import { ResolutionError } from './errors';
import { selectStreamUrl } from './formats';
import { CandidateTrack, MediaResolver, Track, createTrack } from './types';
import { YtDlpAuth, getYtDlpAuth, logYtDlpAuthContext, ytDlpAuthArgs } from './ytdlp-auth';
import { parseJsonOutput, toExtractedInfo, toSearchEntries } from './ytdlp-payload';

/** Runs yt-dlp with `args` and resolves with its stdout. */
export type YtDlpRunner = (args: string[]) => Promise<string>;

export type PlayerClient = 'web' | 'android';

const RESTRICTED_CLIENT_MARKER = 'not available on this app';

export function createYtDlpRunner(binary: string = ytDlpBinary()): YtDlpRunner {
  return async (args) => {
    const { stdout } = await execa(binary, args);
    return stdout;
  };
}

function errorText(error: unknown): string {
  if (error instanceof Error) {
    const stderr = 'stderr' in error ? error.stderr : undefined;
    return typeof stderr === 'string' && stderr ? `${error.message}\n${stderr}` : error.message;
  }
  return String(error);
}

/** First `ERROR:` line yt-dlp printed, or the first line of the error. */
export function formatYtDlpError(error: unknown): string {
  const lines = errorText(error)
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  const errorLine = lines.find((line) => line.startsWith('ERROR:'));
  if (errorLine) return errorLine.replace(/^ERROR:\s*(\[[^\]]+\]\s*)?/, '');
  return lines[0] || 'unknown error';
}

export function isRestrictedClientError(error: unknown): boolean {
  return errorText(error).toLowerCase().includes(RESTRICTED_CLIENT_MARKER);
}

export function toAbsolutePageUrl(page: string): string {
  return /^https?:\/\//.test(page) ? page : `https://www.youtube.com/watch?v=${page}`;
}

function readPayload(stdout: string): ReturnType<typeof parseJsonOutput> {
  try {
    return parseJsonOutput(stdout);
  } catch (error) {
    throw new ResolutionError('yt-dlp returned unreadable output.', { cause: error });
  }
}

export class YtDlpResolver implements MediaResolver {
  private readonly run: YtDlpRunner;
  private readonly auth: YtDlpAuth;

  constructor(run: YtDlpRunner = createYtDlpRunner(), auth: YtDlpAuth = getYtDlpAuth()) {
    this.run = run;
    this.auth = auth;
  }

  private baseArgs(): string[] {
    return [
      '--dump-single-json',
      '--no-warnings',
      '--skip-download',
      '--socket-timeout', String(ytDlpSocketTimeout()),
      ...ytDlpAuthArgs(this.auth),
    ];
  }

  async resolveOne(queryOrPage: string): Promise<Track> {
    const target = queryOrPage.trim();
    if (!target) {
      throw new ResolutionError('Nothing to look up.');
    }
    logYtDlpAuthContext(this.auth);

    try {
      return await this.extract(target, 'web');
    } catch (error) {
      if (!isRestrictedClientError(error)) throw error;
      console.warn(`[yt-dlp] web client refused "${target}", retrying with android client`);
      return this.extract(target, 'android');
    }
  }

  private async extract(target: string, client: PlayerClient): Promise<Track> {
    const startedAt = Date.now();
    const args = [
      ...this.baseArgs(),
      '--no-playlist',
      '--default-search', 'ytsearch',
      '--geo-bypass',
      '--ignore-no-formats-error',
      '--retries', '1',
      '--extractor-retries', '0',
      '--extractor-args', `youtube:player_client=${client}`,
      '--',
      target,
    ];

    let stdout: string;
    try {
      stdout = await this.run(args);
    } catch (error) {
      console.error(`[yt-dlp] extract failed client=${client} target="${target}": ${formatYtDlpError(error)}`);
      if (client === 'web' && isRestrictedClientError(error)) throw error;
      throw new ResolutionError(`Extraction failed: ${formatYtDlpError(error)}`, { cause: error });
    }

    const info = toExtractedInfo(readPayload(stdout));
    if (!info) {
      throw new ResolutionError('No results found.');
    }
    const streamUrl = selectStreamUrl(info);
    if (!streamUrl) {
      throw new ResolutionError('Could not find an audio stream for that.');
    }

    const title = info.title || 'Untitled';
    const pageUrl = info.webpageUrl || info.originalUrl || target;
    console.log(`[yt-dlp] extracted client=${client} title="${title}" in ${Date.now() - startedAt}ms`);
    return createTrack(streamUrl, title, pageUrl);
  }

  async searchFlat(query: string, count: number): Promise<CandidateTrack[]> {
    const trimmedQuery = query.trim();
    if (!trimmedQuery) {
      throw new ResolutionError('Search query is empty.');
    }
    logYtDlpAuthContext(this.auth);

    const startedAt = Date.now();
    let stdout: string;
    try {
      stdout = await this.run([...this.baseArgs(), '--flat-playlist', '--', `ytsearch${count}:${trimmedQuery}`]);
    } catch (error) {
      console.error(`[yt-dlp] search failed query="${trimmedQuery}": ${formatYtDlpError(error)}`);
      throw new ResolutionError(`Search failed: ${formatYtDlpError(error)}`, { cause: error });
    }

    const candidates: CandidateTrack[] = [];
    for (const entry of toSearchEntries(readPayload(stdout))) {
      const page = entry.url || entry.webpageUrl || entry.originalUrl;
      if (!page) continue;
      candidates.push({
        title: entry.title || 'Untitled',
        pageUrl: toAbsolutePageUrl(page),
        duration: entry.duration !== undefined && entry.duration >= 0 ? Math.floor(entry.duration) : undefined,
        channel: entry.channel || entry.uploader,
      });
    }

    if (candidates.length === 0) {
      throw new ResolutionError('No search results found.');
    }
    console.log(`[yt-dlp] search query="${trimmedQuery}" results=${candidates.length} in ${Date.now() - startedAt}ms`);
    return candidates;
  }
}
