/**
 * TubeBrief — Digest Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildDigest,
  exportDigestAsJson,
  formatDigestDate,
  renderDigestMarkdown,
} from '../../src/digest/digest';
import type { ProcessedRecord } from '../../src/types';
import { at } from '../helpers/fakes';

const summarized: ProcessedRecord = {
  videoId: 'v1',
  sourceId: 'a',
  title: 'Shipping Faster',
  link: 'https://www.youtube.com/watch?v=v1',
  outcome: { kind: 'summarized', summary: 'First line.\nSecond line.' },
  publishedAt: at('2026-03-10T01:00:00.000Z'),
  processedAt: at('2026-03-10T12:00:00.000Z'),
};

const skipped: ProcessedRecord = {
  ...summarized,
  videoId: 'v2',
  title: 'Music Video',
  outcome: { kind: 'skipped', skipReason: 'no_transcript' },
};

describe('formatDigestDate', () => {
  it('should use the UTC calendar date', () => {
    expect(formatDigestDate(at('2026-03-10T23:30:00.000Z'))).toBe('2026-03-10');
  });
});

describe('buildDigest', () => {
  it('should include summarized records only', () => {
    const digest = buildDigest([summarized, skipped], at('2026-03-10T12:00:00.000Z'));

    expect(digest).toEqual({
      date: '2026-03-10',
      count: 1,
      items: [
        {
          videoId: 'v1',
          title: 'Shipping Faster',
          summary: 'First line.\nSecond line.',
          link: 'https://www.youtube.com/watch?v=v1',
          publishedAt: '2026-03-10T01:00:00.000Z',
        },
      ],
    });
  });
});

describe('exportDigestAsJson', () => {
  it('should write indented JSON', () => {
    const digest = buildDigest([], at('2026-03-10T12:00:00.000Z'));

    expect(exportDigestAsJson(digest)).toBe('{\n  "date": "2026-03-10",\n  "count": 0,\n  "items": []\n}');
  });
});

describe('renderDigestMarkdown', () => {
  it('should render each video with its link and summary', () => {
    const digest = buildDigest([summarized], at('2026-03-10T12:00:00.000Z'));

    expect(renderDigestMarkdown(digest)).toBe(
      [
        '# Daily Digest — 2026-03-10',
        '',
        '1 new video.',
        '',
        '## [Shipping Faster](https://www.youtube.com/watch?v=v1)',
        '_Published 2026-03-10T01:00:00.000Z_',
        '',
        'First line.',
        'Second line.',
      ].join('\n')
    );
  });

  it('should say so when there is nothing new', () => {
    expect(renderDigestMarkdown(buildDigest([], at('2026-03-10T12:00:00.000Z')))).toBe(
      '# Daily Digest — 2026-03-10\n\n_No new videos._'
    );
  });
});
