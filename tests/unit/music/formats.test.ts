import { selectStreamUrl } from '../../../src/music/formats';
import { parseJsonOutput, toExtractedInfo, toSearchEntries } from '../../../src/music/ytdlp-payload';

describe('selectStreamUrl', () => {
  it('prefers the highest-bitrate audio-only format', () => {
    const url = selectStreamUrl({
      url: 'https://cdn.test/fallback',
      formats: [
        { url: 'https://cdn.test/combined', acodec: 'aac', vcodec: 'avc1', tbr: 900 },
        { url: 'https://cdn.test/audio-low', acodec: 'opus', vcodec: 'none', abr: 50 },
        { url: 'https://cdn.test/audio-high', acodec: 'opus', vcodec: 'none', abr: 160 },
        { url: 'https://cdn.test/video-only', acodec: 'none', vcodec: 'vp9', tbr: 2000 },
      ],
    });
    expect(url).toBe('https://cdn.test/audio-high');
  });

  it('treats a missing video codec as audio-only and falls back to tbr', () => {
    const url = selectStreamUrl({
      formats: [
        { url: 'https://cdn.test/a', acodec: 'mp4a', tbr: 96 },
        { url: 'https://cdn.test/b', acodec: 'mp4a', tbr: 128 },
      ],
    });
    expect(url).toBe('https://cdn.test/b');
  });

  it('uses the best combined format when there is no audio-only one', () => {
    const url = selectStreamUrl({
      formats: [
        { url: 'https://cdn.test/360p', acodec: 'aac', vcodec: 'avc1', tbr: 600 },
        { url: 'https://cdn.test/720p', acodec: 'aac', vcodec: 'avc1', tbr: 1500 },
        { acodec: 'opus', vcodec: 'none', abr: 320 },
      ],
    });
    expect(url).toBe('https://cdn.test/720p');
  });

  it('falls back to the payload url, then to null', () => {
    expect(selectStreamUrl({ url: 'https://cdn.test/direct.mp3', formats: [] })).toBe('https://cdn.test/direct.mp3');
    expect(selectStreamUrl({ formats: [{ url: 'https://cdn.test/v', acodec: 'none', vcodec: 'vp9' }] })).toBeNull();
  });
});

describe('yt-dlp payload readers', () => {
  it('treats empty and null output as no payload', () => {
    expect(parseJsonOutput('')).toBeNull();
    expect(parseJsonOutput('  null\n')).toBeNull();
    expect(toExtractedInfo(null)).toBeNull();
  });

  it('reads the first entry of a search payload', () => {
    const payload = parseJsonOutput(JSON.stringify({
      _type: 'playlist',
      entries: [
        { title: 'First', webpage_url: 'https://video.test/1', formats: [{ url: 'https://cdn.test/1', acodec: 'opus', abr: 'high' }, 'junk'] },
        { title: 'Second' },
      ],
    }));

    expect(toExtractedInfo(payload)).toEqual({
      title: 'First',
      url: undefined,
      webpageUrl: 'https://video.test/1',
      originalUrl: undefined,
      formats: [{ url: 'https://cdn.test/1', acodec: 'opus', vcodec: undefined, abr: undefined, tbr: undefined }],
    });
  });

  it('returns null for a payload with an empty entries list', () => {
    expect(toExtractedInfo(parseJsonOutput('{"entries": []}'))).toBeNull();
  });

  it('drops entries that are not objects', () => {
    const entries = toSearchEntries(parseJsonOutput(JSON.stringify({
      entries: [null, 3, { id: 'abc', title: 'Song', url: 'abc', duration: 61.7, uploader: 'Someone' }],
    })));

    expect(entries).toEqual([{
      title: 'Song',
      url: 'abc',
      webpageUrl: undefined,
      originalUrl: undefined,
      duration: 61.7,
      channel: undefined,
      uploader: 'Someone',
    }]);
  });
});
