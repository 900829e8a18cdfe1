import axios, { type AxiosInstance } from 'axios';
import type { Notifier } from '../types';
import { NotifierDeliveryError, errorMessage } from './errors';

const TELEGRAM_API_URL = 'https://api.telegram.org';

/**
 * Sends alert text to a Telegram chat through the Bot API.
 */
export class TelegramNotifier implements Notifier {
  private readonly http: AxiosInstance;

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ baseURL: TELEGRAM_API_URL, timeout: 10_000 });
  }

  async send(text: string): Promise<void> {
    try {
      await this.http.post(`/bot${this.botToken}/sendMessage`, {
        chat_id: this.chatId,
        text,
      });
    } catch (err) {
      throw new NotifierDeliveryError(`Telegram delivery failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export class ConsoleNotifier implements Notifier {
  async send(text: string): Promise<void> {
    console.log(`[notifier] ${text.replace(/\n/g, ' | ')}`);
  }
}

/**
 * Best-effort delivery: a failing notifier never reaches trading logic.
 */
export async function safeSend(notifier: Notifier, text: string): Promise<void> {
  try {
    await notifier.send(text);
  } catch (err) {
    const wrapped = err instanceof NotifierDeliveryError ? err : new NotifierDeliveryError(errorMessage(err), { cause: err });
    console.warn(`[notifier] ⚠️ Dropped notice: ${wrapped.message}`);
  }
}

export function createNotifier(botToken: string | null, chatId: string | null): Notifier {
  if (!botToken || !chatId) {
    console.warn('[notifier] TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID not set; notices go to the console only');
    return new ConsoleNotifier();
  }
  return new TelegramNotifier(botToken, chatId);
}
