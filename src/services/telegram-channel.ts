import TelegramBot from 'node-telegram-bot-api';
import type { ActionLink, MessagingChannel, SendResult } from './messaging-channel';
import { isRecord } from '../utils/guards';
import { errorMessage } from '../utils/errors';

// Bad request, blocked by the user, chat not found
const PERMANENT_STATUS_CODES = new Set([400, 403, 404]);

type TelegramSender = Pick<TelegramBot, 'sendMessage'>;

/**
 * Maps a node-telegram-bot-api rejection to a send result.
 * API errors carry `code: 'ETELEGRAM'` and the response body; anything else
 * (EFATAL, EPARSE, socket errors) is treated as transient.
 */
export function classifyTelegramError(error: unknown): SendResult {
  const reason = errorMessage(error);
  if (!isRecord(error) || error.code !== 'ETELEGRAM' || !isRecord(error.response)) {
    return { status: 'failed', reason, permanent: false };
  }

  const body = isRecord(error.response.body) ? error.response.body : {};
  const statusCode = typeof body.error_code === 'number'
    ? body.error_code
    : error.response.statusCode;

  if (statusCode === 429) {
    const parameters = isRecord(body.parameters) ? body.parameters : {};
    const retryAfter = typeof parameters.retry_after === 'number' ? parameters.retry_after : 1;
    return { status: 'rate-limited', retryAfterSeconds: retryAfter };
  }

  const permanent = typeof statusCode === 'number' && PERMANENT_STATUS_CODES.has(statusCode);
  return { status: 'failed', reason, permanent };
}

/**
 * Telegram Bot API channel
 * The bot runs without polling; it only sends.
 */
export class TelegramChannel implements MessagingChannel {
  private readonly bot: TelegramSender;
  private closed = false;

  constructor(botToken: string, bot?: TelegramSender) {
    this.bot = bot ?? new TelegramBot(botToken, { polling: false });
  }

  async send(recipientId: number, text: string, links: ActionLink[]): Promise<SendResult> {
    if (this.closed) {
      return { status: 'failed', reason: 'channel closed', permanent: true };
    }

    const options: TelegramBot.SendMessageOptions = {
      parse_mode: 'HTML',
      disable_web_page_preview: false,
    };
    if (links.length > 0) {
      options.reply_markup = {
        inline_keyboard: [links.map(link => ({ text: link.text, url: link.url }))],
      };
    }

    try {
      await this.bot.sendMessage(recipientId, text, options);
      return { status: 'ok' };
    } catch (error) {
      return classifyTelegramError(error);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
