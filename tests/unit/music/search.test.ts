import { ResolutionError } from '../../../src/music/errors';
import {
  YtDlpResolver,
  formatYtDlpError,
  isRestrictedClientError,
  toAbsolutePageUrl,
} from '../../../src/music/search';
import { muteConsole } from '../../helpers/fakes';

function ytDlpFailure(stderr: string): Error {
  return Object.assign(new Error('Command failed with exit code 1'), { stderr });
}

const RESTRICTED = ytDlpFailure('ERROR: [youtube] abc123: The following content is not available on this app.');

const videoPayload = JSON.stringify({
  title: 'Test Song',
  webpage_url: 'https://www.youtube.com/watch?v=abc123',
  formats: [
    { url: 'https://cdn.test/audio', acodec: 'opus', vcodec: 'none', abr: 128 },
    { url: 'https://cdn.test/video', acodec: 'aac', vcodec: 'avc1', tbr: 900 },
  ],
});

describe('YtDlpResolver', () => {
  muteConsole();

  let run: jest.Mock<Promise<string>, [string[]]>;
  let resolver: YtDlpResolver;

  beforeEach(() => {
    run = jest.fn<Promise<string>, [string[]]>();
    resolver = new YtDlpResolver(run, { mode: 'none' });
  });

  describe('resolveOne', () => {
    it('extracts with the web client and picks the audio stream', async () => {
      run.mockResolvedValueOnce(videoPayload);

      const track = await resolver.resolveOne('  https://www.youtube.com/watch?v=abc123 ');

      expect(track).toEqual({
        streamUrl: 'https://cdn.test/audio',
        title: 'Test Song',
        pageUrl: 'https://www.youtube.com/watch?v=abc123',
      });
      expect(run).toHaveBeenCalledTimes(1);
      expect(run.mock.calls[0][0]).toEqual([
        '--dump-single-json',
        '--no-warnings',
        '--skip-download',
        '--socket-timeout', '10',
        '--no-playlist',
        '--default-search', 'ytsearch',
        '--geo-bypass',
        '--ignore-no-formats-error',
        '--retries', '1',
        '--extractor-retries', '0',
        '--extractor-args', 'youtube:player_client=web',
        '--',
        'https://www.youtube.com/watch?v=abc123',
      ]);
    });

    it('retries once with the android client when the web client is refused', async () => {
      run.mockRejectedValueOnce(RESTRICTED).mockResolvedValueOnce(videoPayload);

      const track = await resolver.resolveOne('https://www.youtube.com/watch?v=abc123');

      expect(track.streamUrl).toBe('https://cdn.test/audio');
      expect(run).toHaveBeenCalledTimes(2);
      expect(run.mock.calls[1][0]).toContain('youtube:player_client=android');
    });

    it('gives up after the android retry is refused as well', async () => {
      run.mockRejectedValue(RESTRICTED);

      await expect(resolver.resolveOne('abc123')).rejects.toThrow(
        new ResolutionError('Extraction failed: abc123: The following content is not available on this app.')
      );
      expect(run).toHaveBeenCalledTimes(2);
    });

    it('does not retry other failures', async () => {
      run.mockRejectedValueOnce(ytDlpFailure('WARNING: slow\nERROR: [youtube] abc123: Video unavailable'));

      await expect(resolver.resolveOne('abc123')).rejects.toThrow('Extraction failed: abc123: Video unavailable');
      expect(run).toHaveBeenCalledTimes(1);
    });

    it('reports a payload without a playable stream', async () => {
      run.mockResolvedValueOnce(JSON.stringify({ title: 'Silent', formats: [{ url: 'https://cdn.test/v', acodec: 'none', vcodec: 'vp9' }] }));
      await expect(resolver.resolveOne('silent')).rejects.toThrow('Could not find an audio stream for that.');
    });

    it('reports empty and unreadable output', async () => {
      run.mockResolvedValueOnce('');
      await expect(resolver.resolveOne('nothing')).rejects.toThrow('No results found.');

      run.mockResolvedValueOnce('not json');
      await expect(resolver.resolveOne('garbage')).rejects.toThrow('yt-dlp returned unreadable output.');
    });

    it('falls back to the input as page and a default title', async () => {
      run.mockResolvedValueOnce(JSON.stringify({ url: 'https://cdn.test/direct.mp3' }));

      await expect(resolver.resolveOne('https://files.test/direct')).resolves.toEqual({
        streamUrl: 'https://cdn.test/direct.mp3',
        title: 'Untitled',
        pageUrl: 'https://files.test/direct',
      });
    });

    it('rejects blank input without running yt-dlp', async () => {
      await expect(resolver.resolveOne('   ')).rejects.toThrow('Nothing to look up.');
      expect(run).not.toHaveBeenCalled();
    });

    it('passes cookie arguments', async () => {
      resolver = new YtDlpResolver(run, { mode: 'browser', browserSpec: 'firefox' });
      run.mockResolvedValueOnce(videoPayload);

      await resolver.resolveOne('abc123');

      expect(run.mock.calls[0][0].slice(5, 7)).toEqual(['--cookies-from-browser', 'firefox']);
    });
  });

  describe('searchFlat', () => {
    it('runs a flat search and normalises the entries', async () => {
      run.mockResolvedValueOnce(JSON.stringify({
        entries: [
          { id: 'aaa', title: 'Bare id', url: 'aaa', duration: 125.9, channel: 'Chan' },
          { title: 'Full url', url: 'https://www.youtube.com/watch?v=bbb', uploader: 'Uploader', duration: -1 },
          { title: 'No page at all' },
          { webpage_url: 'https://www.youtube.com/watch?v=ccc' },
        ],
      }));

      const results = await resolver.searchFlat(' lofi beats ', 3);

      expect(run.mock.calls[0][0].slice(-3)).toEqual(['--flat-playlist', '--', 'ytsearch3:lofi beats']);
      expect(results).toEqual([
        { title: 'Bare id', pageUrl: 'https://www.youtube.com/watch?v=aaa', duration: 125, channel: 'Chan' },
        { title: 'Full url', pageUrl: 'https://www.youtube.com/watch?v=bbb', duration: undefined, channel: 'Uploader' },
        { title: 'Untitled', pageUrl: 'https://www.youtube.com/watch?v=ccc', duration: undefined, channel: undefined },
      ]);
    });

    it('fails when nothing usable comes back', async () => {
      run.mockResolvedValueOnce(JSON.stringify({ entries: [{ title: 'No page' }] }));
      await expect(resolver.searchFlat('q', 5)).rejects.toThrow('No search results found.');
    });

    it('wraps process failures', async () => {
      run.mockRejectedValueOnce(ytDlpFailure('ERROR: Unable to download API page: HTTP Error 429'));
      await expect(resolver.searchFlat('q', 5)).rejects.toThrow('Search failed: Unable to download API page: HTTP Error 429');
    });

    it('rejects an empty query', async () => {
      await expect(resolver.searchFlat('  ', 5)).rejects.toThrow('Search query is empty.');
    });
  });
});

describe('yt-dlp error helpers', () => {
  it('extracts the first ERROR line without its extractor tag', () => {
    expect(formatYtDlpError(ytDlpFailure('ERROR: [generic] Unsupported URL: x'))).toBe('Unsupported URL: x');
  });

  it('falls back to the first line of the message', () => {
    expect(formatYtDlpError(new Error('spawn yt-dlp ENOENT'))).toBe('spawn yt-dlp ENOENT');
    expect(formatYtDlpError('')).toBe('unknown error');
  });

  it('recognises the restricted-client marker case-insensitively', () => {
    expect(isRestrictedClientError(RESTRICTED)).toBe(true);
    expect(isRestrictedClientError(new Error('NOT AVAILABLE ON THIS APP'))).toBe(true);
    expect(isRestrictedClientError(new Error('Video unavailable'))).toBe(false);
  });

  it('turns bare ids into watch urls', () => {
    expect(toAbsolutePageUrl('xyz')).toBe('https://www.youtube.com/watch?v=xyz');
    expect(toAbsolutePageUrl('https://example.test/v/1')).toBe('https://example.test/v/1');
  });
});
