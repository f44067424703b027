import TelegramBot from 'node-telegram-bot-api';
import { logger } from './logger.js';
import type { RuntimeConfig } from './config.js';
import type { GenerationErrorKind } from './types.js';

export interface JobFailureNotice {
  jobId: string;
  userId: string;
  error: string;
  errorKind: GenerationErrorKind;
}

export interface FailureNotifier {
  notifyJobFailed(notice: JobFailureNotice): Promise<void>;
}

type MessageSender = Pick<TelegramBot, 'sendMessage'>;

export function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatFailureMessage(notice: JobFailureNotice): string {
  return `
🚨 <b>Video Generation Failed</b>

Job ID: <code>${escapeHtml(notice.jobId)}</code>
User: <code>${escapeHtml(notice.userId)}</code>
Kind: <code>${notice.errorKind}</code>
Error: <code>${escapeHtml(notice.error)}</code>
  `.trim();
}

export class TelegramNotifier implements FailureNotifier {
  constructor(
    private readonly bot: MessageSender,
    private readonly chatId: string
  ) {}

  async notifyJobFailed(notice: JobFailureNotice): Promise<void> {
    try {
      await this.bot.sendMessage(this.chatId, formatFailureMessage(notice), {
        parse_mode: 'HTML'
      });
    } catch (error) {
      logger.error({ error, jobId: notice.jobId }, 'Failed to send Telegram message');
    }
  }
}

export function createFailureNotifier(
  config: Pick<RuntimeConfig, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_CHAT_ID'>
): FailureNotifier | undefined {
  if (!config.TELEGRAM_BOT_TOKEN || !config.TELEGRAM_CHAT_ID) {
    logger.warn('Telegram bot token or chat ID not configured, skipping Telegram notifications');
    return undefined;
  }

  const bot = new TelegramBot(config.TELEGRAM_BOT_TOKEN);
  logger.info('Telegram bot initialized');
  return new TelegramNotifier(bot, config.TELEGRAM_CHAT_ID);
}
