import axios from "axios";
import type { Notifier } from "../types.js";

export const MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_AFTER_SECONDS = 1;

export interface TelegramApiResponse {
  ok: boolean;
  description?: string;
  error_code?: number;
  parameters?: { retry_after?: number };
}

export interface TelegramPayload {
  chat_id: string;
  text: string;
  parse_mode: "Markdown";
}

export type TelegramPost = (
  url: string,
  payload: TelegramPayload
) => Promise<{ status: number; data: TelegramApiResponse }>;

export class TelegramError extends Error {
  constructor(
    readonly status: number,
    readonly description: string,
    readonly attempts: number
  ) {
    super(`Telegram API error ${status}: ${description}`);
    this.name = "TelegramError";
  }
}

// Status handling lives in the sender, so axios must not throw on 4xx/5xx.
const axiosPost: TelegramPost = async (url, payload) => {
  const res = await axios.post<TelegramApiResponse>(url, payload, {
    timeout: 15_000,
    validateStatus: () => true,
  });
  return { status: res.status, data: res.data };
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export interface TelegramSenderOptions {
  botToken: string;
  chatId: string;
  post?: TelegramPost;
  wait?: (ms: number) => Promise<void>;
}

export function createTelegramSender(opts: TelegramSenderOptions): Notifier {
  const post = opts.post ?? axiosPost;
  const wait = opts.wait ?? sleep;
  const url = `https://api.telegram.org/bot${opts.botToken}/sendMessage`;

  return {
    async send(text: string): Promise<void> {
      const payload: TelegramPayload = { chat_id: opts.chatId, text, parse_mode: "Markdown" };

      for (let attempt = 1; ; attempt++) {
        const { status, data } = await post(url, payload);
        if (status >= 200 && status < 300) return;

        const description = data?.description ?? "no description";
        if (status !== 429 || attempt >= MAX_ATTEMPTS) {
          throw new TelegramError(status, description, attempt);
        }

        const retryAfter = data?.parameters?.retry_after ?? DEFAULT_RETRY_AFTER_SECONDS;
        console.warn(`  Telegram 429: retrying in ${retryAfter}s (attempt ${attempt}/${MAX_ATTEMPTS})`);
        await wait(retryAfter * 1000);
      }
    },
  };
}
