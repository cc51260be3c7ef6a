import type { JobRecord } from '../types/job';
import type { ActionLink } from './messaging-channel';

export const TRUNCATION_MARKER = '...';
const TITLE_MAX_LENGTH = 200;

export interface FormatOptions {
  matchedKeyword: string | null;
  descriptionMaxLength: number;
  now: Date;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function truncate(text: string, maxLength: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxLength) return trimmed;
  return `${trimmed.slice(0, maxLength).trimEnd()}${TRUNCATION_MARKER}`;
}

export function formatTimeAgo(postedAt: Date | null, now: Date): string {
  if (!postedAt) return 'unknown';

  const minutes = Math.floor((now.getTime() - postedAt.getTime()) / 60000);
  if (minutes < 1) return 'just now';
  if (minutes < 60) return `${minutes} minutes ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours} hours ago`;
  return `${Math.floor(hours / 24)} days ago`;
}

export function formatBudget(job: Pick<JobRecord, 'budgetMin' | 'budgetMax' | 'currency'>): string {
  const currency = job.currency ? ` ${job.currency}` : '';
  const { budgetMin: min, budgetMax: max } = job;

  if (min !== null && max !== null && min !== max) return `${min}–${max}${currency}`;
  if (min !== null) return `${min}${currency}`;
  if (max !== null) return `${max}${currency}`;
  return 'N/A';
}

/**
 * Formats a job as a Telegram HTML message
 */
export function formatJobMessage(job: JobRecord, options: FormatOptions): string {
  const title = job.title ? truncate(job.title, TITLE_MAX_LENGTH) : '(no title)';
  const lines = [
    `💼 <b>${escapeHtml(title)}</b>`,
    `💰 Budget: ${escapeHtml(formatBudget(job))}`,
    `🌍 Source: ${escapeHtml(job.source)}`,
  ];

  if (options.matchedKeyword) {
    lines.push(`🔑 Match: ${escapeHtml(options.matchedKeyword)}`);
  }

  lines.push(`🕒 Posted: ${formatTimeAgo(job.postedAt, options.now)}`);

  if (job.description) {
    lines.push('', `📝 ${escapeHtml(truncate(job.description, options.descriptionMaxLength))}`);
  }

  return lines.join('\n');
}

/**
 * Buttons under the message: proposal link first when the source has one
 */
export function buildActionLinks(job: Pick<JobRecord, 'url' | 'proposalUrl'>): ActionLink[] {
  const links: ActionLink[] = [];
  if (job.proposalUrl) {
    links.push({ text: '📝 Proposal', url: job.proposalUrl });
  }
  if (job.url) {
    links.push({ text: '🔗 Original', url: job.url });
  }
  return links;
}
