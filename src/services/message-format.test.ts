import { describe, expect, it } from 'vitest';
import type { JobRecord } from '../types/job';
import {
  buildActionLinks,
  escapeHtml,
  formatBudget,
  formatJobMessage,
  formatTimeAgo,
  truncate,
} from './message-format';

const now = new Date('2026-01-01T12:00:00Z');

const job: JobRecord = {
  source: 'freelancer',
  externalId: '7',
  title: 'Fix <script> tag & layout',
  description: 'Short description',
  url: 'https://example.com/p/7',
  proposalUrl: null,
  budgetMin: 100,
  budgetMax: 300,
  currency: 'USD',
  postedAt: new Date('2026-01-01T10:30:00Z'),
};

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#039;&amp;&#039;&lt;/a&gt;');
  });
});

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('  hello  ', 10)).toBe('hello');
  });

  it('cuts long text and appends the marker', () => {
    expect(truncate('hello world again', 6)).toBe('hello...');
  });
});

describe('formatTimeAgo', () => {
  it('describes the age of a listing', () => {
    expect(formatTimeAgo(null, now)).toBe('unknown');
    expect(formatTimeAgo(new Date('2026-01-01T11:59:30Z'), now)).toBe('just now');
    expect(formatTimeAgo(new Date('2026-01-01T11:15:00Z'), now)).toBe('45 minutes ago');
    expect(formatTimeAgo(new Date('2026-01-01T09:00:00Z'), now)).toBe('3 hours ago');
    expect(formatTimeAgo(new Date('2025-12-29T12:00:00Z'), now)).toBe('3 days ago');
  });
});

describe('formatBudget', () => {
  it('formats ranges, single values and missing budgets', () => {
    expect(formatBudget(job)).toBe('100–300 USD');
    expect(formatBudget({ budgetMin: 50, budgetMax: 50, currency: null })).toBe('50');
    expect(formatBudget({ budgetMin: null, budgetMax: 80, currency: 'EUR' })).toBe('80 EUR');
    expect(formatBudget({ budgetMin: null, budgetMax: null, currency: 'EUR' })).toBe('N/A');
  });
});

describe('formatJobMessage', () => {
  it('renders every field as escaped HTML', () => {
    const text = formatJobMessage(job, { matchedKeyword: 'layout', descriptionMaxLength: 400, now });
    expect(text).toBe([
      '💼 <b>Fix &lt;script&gt; tag &amp; layout</b>',
      '💰 Budget: 100–300 USD',
      '🌍 Source: freelancer',
      '🔑 Match: layout',
      '🕒 Posted: 1 hours ago',
      '',
      '📝 Short description',
    ].join('\n'));
  });

  it('omits the match and description lines when absent', () => {
    const text = formatJobMessage({ ...job, title: '', description: '' }, {
      matchedKeyword: null,
      descriptionMaxLength: 400,
      now,
    });
    expect(text.split('\n')).toEqual([
      '💼 <b>(no title)</b>',
      '💰 Budget: 100–300 USD',
      '🌍 Source: freelancer',
      '🕒 Posted: 1 hours ago',
    ]);
  });

  it('caps the description length', () => {
    const text = formatJobMessage({ ...job, description: 'abcdefghij' }, {
      matchedKeyword: null,
      descriptionMaxLength: 4,
      now,
    });
    expect(text.endsWith('📝 abcd...')).toBe(true);
  });
});

describe('buildActionLinks', () => {
  it('puts the proposal link first', () => {
    expect(buildActionLinks({ url: 'https://example.com/a', proposalUrl: 'https://aff.example.com/a' })).toEqual([
      { text: '📝 Proposal', url: 'https://aff.example.com/a' },
      { text: '🔗 Original', url: 'https://example.com/a' },
    ]);
  });

  it('returns only the original link without a proposal', () => {
    expect(buildActionLinks({ url: 'https://example.com/a', proposalUrl: null })).toEqual([
      { text: '🔗 Original', url: 'https://example.com/a' },
    ]);
  });
});
