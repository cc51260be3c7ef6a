import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SkywalkerSource } from './skywalker';

const parseURL = vi.hoisted(() => vi.fn());

vi.mock('rss-parser', () => ({
  default: class {
    parseURL = parseURL;
  },
}));

describe('SkywalkerSource', () => {
  const source = new SkywalkerSource({ rssUrl: 'https://feed.example.com/jobs', timeoutMs: 1000 });

  beforeEach(() => {
    parseURL.mockReset();
  });

  it('maps feed items to raw records', async () => {
    parseURL.mockResolvedValue({
      items: [
        {
          guid: 'job-1',
          title: 'Frontend developer',
          contentSnippet: 'Vue and TypeScript',
          content: '<p>Vue and TypeScript</p>',
          link: 'https://example.com/jobs/1',
          isoDate: '2026-01-01T09:00:00.000Z',
          pubDate: 'Thu, 01 Jan 2026 09:00:00 GMT',
        },
        {
          title: 'Office manager',
          content: 'Full time',
          link: 'https://example.com/jobs/2',
          pubDate: 'Thu, 01 Jan 2026 08:00:00 GMT',
        },
      ],
    });

    const result = await source.fetchJobs(['vue']);

    expect(parseURL).toHaveBeenCalledWith('https://feed.example.com/jobs');
    expect(result).toEqual({
      ok: true,
      records: [
        {
          id: 'job-1',
          title: 'Frontend developer',
          description: 'Vue and TypeScript',
          url: 'https://example.com/jobs/1',
          posted_at: '2026-01-01T09:00:00.000Z',
        },
        {
          id: null,
          title: 'Office manager',
          description: 'Full time',
          url: 'https://example.com/jobs/2',
          posted_at: 'Thu, 01 Jan 2026 08:00:00 GMT',
        },
      ],
    });
  });

  it('reports feed errors as a failed result', async () => {
    parseURL.mockRejectedValue(new Error('Status code 502'));

    const result = await source.fetchJobs([]);

    expect(!result.ok && result.error.message).toBe('Status code 502');
    expect(!result.ok && result.error.source).toBe('skywalker');
  });
});
