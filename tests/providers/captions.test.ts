/**
 * TubeBrief — Caption Transcript Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getSubtitles } from 'youtube-captions-scraper';
import { YouTubeCaptionsClient, cleanTranscript } from '../../src/providers/captions';
import { TransientNetworkError } from '../../src/lib/errors';

vi.mock('youtube-captions-scraper', () => ({
  getSubtitles: vi.fn(),
}));

const mockedGetSubtitles = vi.mocked(getSubtitles);

beforeEach(() => {
  mockedGetSubtitles.mockReset();
});

describe('cleanTranscript', () => {
  it('should drop bracketed cues and collapse whitespace', () => {
    expect(cleanTranscript('[Music]  hello\n\nthere [Applause] friends ')).toBe('hello there friends');
  });
});

describe('YouTubeCaptionsClient', () => {
  it('should join caption cues into one clean text', async () => {
    mockedGetSubtitles.mockResolvedValueOnce([
      { start: '0.0', dur: '1.5', text: 'Welcome back' },
      { start: '1.5', dur: '2.0', text: '[Music]' },
      { start: '3.5', dur: '2.0', text: 'to the channel' },
    ]);

    const text = await new YouTubeCaptionsClient({ lang: 'de' }).fetch('vid1');

    expect(text).toBe('Welcome back to the channel');
    expect(mockedGetSubtitles).toHaveBeenCalledWith({ videoID: 'vid1', lang: 'de' });
  });

  it('should return null when the video has no captions', async () => {
    mockedGetSubtitles.mockRejectedValueOnce(new Error('Could not find captions for vid1'));

    expect(await new YouTubeCaptionsClient().fetch('vid1')).toBeNull();
  });

  it('should return null for empty or cue-only captions', async () => {
    mockedGetSubtitles.mockResolvedValueOnce([]);
    mockedGetSubtitles.mockResolvedValueOnce([{ start: '0', dur: '1', text: '[Music]' }]);
    const client = new YouTubeCaptionsClient();

    expect(await client.fetch('vid1')).toBeNull();
    expect(await client.fetch('vid2')).toBeNull();
  });

  it('should raise other failures as transient', async () => {
    mockedGetSubtitles.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(new YouTubeCaptionsClient().fetch('vid1')).rejects.toBeInstanceOf(
      TransientNetworkError
    );
  });
});
