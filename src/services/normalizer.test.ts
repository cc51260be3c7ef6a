import { describe, expect, it } from 'vitest';
import { normalizeJob, parsePostedAt } from './normalizer';

describe('normalizeJob', () => {
  it('maps field aliases onto the job record', () => {
    const result = normalizeJob(
      {
        id: 42,
        title: '  Build   a dashboard ',
        desc: '<p>React&nbsp;and <b>charts</b></p>',
        link: 'https://example.com/p/42',
        affiliate_url: 'https://aff.example.com/?u=42',
        minbudget: '1,000',
        maxbudget: 2500,
        budget_currency: 'usd',
        published_at: '2026-01-01T10:00:00Z',
      },
      'freelancer'
    );

    expect(result).toEqual({
      ok: true,
      job: {
        source: 'freelancer',
        externalId: '42',
        title: 'Build a dashboard',
        description: 'React and charts',
        url: 'https://example.com/p/42',
        proposalUrl: 'https://aff.example.com/?u=42',
        budgetMin: 1000,
        budgetMax: 2500,
        currency: 'USD',
        postedAt: new Date('2026-01-01T10:00:00Z'),
      },
    });
  });

  it('prefers the first alias that has a value', () => {
    const result = normalizeJob({ title: 'T', url: '', original_url: 'https://example.com/b' }, 's');
    expect(result.ok && result.job.url).toBe('https://example.com/b');
  });

  it('fills absent fields with empty values', () => {
    const result = normalizeJob({ title: 'Only a title' }, 'skywalker');
    expect(result).toEqual({
      ok: true,
      job: {
        source: 'skywalker',
        externalId: null,
        title: 'Only a title',
        description: '',
        url: '',
        proposalUrl: null,
        budgetMin: null,
        budgetMax: null,
        currency: null,
        postedAt: null,
      },
    });
  });

  it('keeps a record with a url but no title', () => {
    const result = normalizeJob({ url: 'https://example.com/x' }, 's');
    expect(result.ok && result.job.title).toBe('');
  });

  it('drops a record with neither title nor url', () => {
    expect(normalizeJob({ description: 'orphan', title: '   ' }, 's'))
      .toEqual({ ok: false, reason: 'missing title and url' });
  });

  it('leaves unparseable budgets and non-code currencies as they are', () => {
    const result = normalizeJob({ title: 'T', budget_min: 'negotiable', currency: '€' }, 's');
    expect(result.ok && result.job.budgetMin).toBeNull();
    expect(result.ok && result.job.currency).toBe('€');
  });
});

describe('parsePostedAt', () => {
  it('reads unix seconds and milliseconds', () => {
    expect(parsePostedAt(1767225600)).toEqual(new Date('2026-01-01T00:00:00Z'));
    expect(parsePostedAt(1767225600000)).toEqual(new Date('2026-01-01T00:00:00Z'));
    expect(parsePostedAt('1767225600')).toEqual(new Date('2026-01-01T00:00:00Z'));
  });

  it('reads RFC-2822 dates', () => {
    expect(parsePostedAt('Thu, 01 Jan 2026 00:00:00 GMT')).toEqual(new Date('2026-01-01T00:00:00Z'));
  });

  it('returns null for garbage', () => {
    expect(parsePostedAt('not a date')).toBeNull();
    expect(parsePostedAt(new Date('invalid'))).toBeNull();
    expect(parsePostedAt({})).toBeNull();
  });
});
