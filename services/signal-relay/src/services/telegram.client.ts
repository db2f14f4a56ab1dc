import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { DeliveryError } from '../errors.js';

const ApiReply = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
});
type ApiReply = z.infer<typeof ApiReply>;

const SentMessage = z.object({ message_id: z.number() });
const BotUser = z.object({ id: z.number(), username: z.string().optional() });

export type SendResult = { messageId: number };

/** What the dispatcher needs from a chat-messaging API. */
export interface MessagingClient {
  sendText(text: string): Promise<SendResult>;
}

export type TelegramClientOptions = {
  apiBase: string;
  botToken: string;
  chatId: string;
  timeoutMs: number;
  /** undici dispatcher override (connection pool, proxy, MockAgent in tests) */
  dispatcher?: Dispatcher;
};

export class TelegramClient implements MessagingClient {
  constructor(private readonly opts: TelegramClientOptions) {}

  private url(method: string) {
    return `${this.opts.apiBase}/bot${this.opts.botToken}/${method}`;
  }

  private async call(method: string, payload?: Record<string, unknown>): Promise<ApiReply> {
    const ac = new AbortController();
    const to = setTimeout(() => ac.abort(), this.opts.timeoutMs);

    try {
      const res = await fetch(this.url(method), {
        method: payload ? 'POST' : 'GET',
        body: payload ? JSON.stringify(payload) : undefined,
        headers: payload ? { 'content-type': 'application/json' } : undefined,
        signal: ac.signal,
        dispatcher: this.opts.dispatcher,
      });

      const raw = await res.json().catch(() => undefined);
      const reply = ApiReply.safeParse(raw);

      if (res.status === 429) {
        const seconds =
          (reply.success ? reply.data.parameters?.retry_after : undefined) ??
          Number(res.headers.get('retry-after') ?? 1);
        throw new DeliveryError(`${method}: rate limited by messaging API`, {
          retryable: true,
          status: 429,
          retryAfterMs: Number.isFinite(seconds) ? seconds * 1000 : 1000,
        });
      }
      if (res.status >= 500) {
        throw new DeliveryError(`${method}: HTTP ${res.status}`, { retryable: true, status: res.status });
      }
      if (!reply.success) {
        throw new DeliveryError(`${method}: unexpected reply (HTTP ${res.status})`, {
          retryable: false,
          status: res.status,
        });
      }
      if (!res.ok || !reply.data.ok) {
        // 4xx: bad token, unknown chat, malformed text; a retry would fail the same way
        throw new DeliveryError(`${method}: ${reply.data.description ?? `HTTP ${res.status}`}`, {
          retryable: false,
          status: res.status,
        });
      }
      return reply.data;
    } catch (err) {
      if (err instanceof DeliveryError) throw err;
      const message = ac.signal.aborted
        ? `${method}: timeout after ${this.opts.timeoutMs}ms`
        : `${method}: ${err instanceof Error ? err.message : String(err)}`;
      throw new DeliveryError(message, { retryable: true, cause: err });
    } finally {
      clearTimeout(to);
    }
  }

  async sendText(text: string): Promise<SendResult> {
    const reply = await this.call('sendMessage', {
      chat_id: this.opts.chatId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
    const sent = SentMessage.safeParse(reply.result);
    if (!sent.success) {
      throw new DeliveryError('sendMessage: reply without message_id', { retryable: false });
    }
    return { messageId: sent.data.message_id };
  }

  /** Checks the bot credentials; resolves with the bot's identity. */
  async getMe(): Promise<{ id: number; username?: string }> {
    const reply = await this.call('getMe');
    const bot = BotUser.safeParse(reply.result);
    if (!bot.success) throw new DeliveryError('getMe: unexpected reply', { retryable: false });
    return bot.data;
  }
}
