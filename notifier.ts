import axios from "axios";
import type { AxiosInstance } from "axios";

const TELEGRAM_API_BASE = "https://api.telegram.org";
const NOTIFY_TIMEOUT = 5000;

/**
 * Fire-and-forget message sink. Implementations never throw and never make
 * the caller wait.
 */
export interface Notifier {
  notify(message: string): void;
}

export type TelegramOptions = {
  token?: string;
  chatId?: string;
  http?: AxiosInstance;
};

export class TelegramNotifier implements Notifier {
  readonly #token?: string;
  readonly #chatId?: string;
  readonly #http: AxiosInstance;

  constructor({ token, chatId, http }: TelegramOptions) {
    this.#token = token;
    this.#chatId = chatId;
    this.#http = http ?? axios.create({ baseURL: TELEGRAM_API_BASE, timeout: NOTIFY_TIMEOUT });
  }

  get enabled(): boolean {
    return Boolean(this.#token && this.#chatId);
  }

  notify(message: string): void {
    void this.send(message);
  }

  /**
   * Resolves once the message was delivered or dropped; never rejects.
   */
  async send(message: string): Promise<boolean> {
    if (!this.#token || !this.#chatId) return false;
    try {
      await this.#http.post(`/bot${this.#token}/sendMessage`, {
        chat_id: this.#chatId,
        text: message,
      });
      return true;
    } catch (err) {
      console.warn("⚠️ Telegram send failed:", err instanceof Error ? err.message : String(err));
      return false;
    }
  }
}
