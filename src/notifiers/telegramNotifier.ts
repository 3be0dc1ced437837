import { z } from "zod";
import { describeError } from "../errors.js";
import type { NotificationEvent, Notifier } from "../notifier.js";

export interface TelegramSendMessageParams {
  chat_id: string;
  text: string;
  parse_mode?: "Markdown";
}

export interface TelegramApiClient {
  sendMessage(params: TelegramSendMessageParams): Promise<void>;
}

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export class FetchTelegramApiClient implements TelegramApiClient {
  private readonly baseUrl: string;

  constructor(
    token: string,
    baseUrl?: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.baseUrl = baseUrl ?? `https://api.telegram.org/bot${token}`;
  }

  async sendMessage(params: TelegramSendMessageParams): Promise<void> {
    const response = await this.fetchImpl(`${this.baseUrl}/sendMessage`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(params),
      signal: AbortSignal.timeout(20_000),
    });

    const parsed = TelegramResponseSchema.safeParse(await response.json().catch(() => null));
    if (!response.ok || !parsed.success || !parsed.data.ok) {
      const description = parsed.success ? parsed.data.description : undefined;
      throw new Error(
        `Telegram API error on sendMessage (status ${response.status}): ${description ?? "unknown error"}`,
      );
    }
  }
}

export interface TelegramNotifierOptions {
  token: string;
  chatId: string;
  client?: TelegramApiClient;
  clock?: () => Date;
}

// Telegram limit is 4096; keep margin.
const MAX_MESSAGE_LENGTH = 3500;
const EXCERPT_LENGTH = 500;

function formatUtc(date: Date) {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatNotification(event: NotificationEvent, at: Date): string {
  const task = `Task: \`${event.taskName}\`\nID: \`${event.taskId ?? "-"}\``;
  const details = event.details ? `\n\n${event.details}` : "";

  switch (event.kind) {
    case "started":
      return `🚀 *Task Started*\n\n${task}${details}\n\nStarted at: ${formatUtc(at)}`;
    case "complete":
      return `✅ *Task Complete*\n\n${task}${details}\n\nCompleted at: ${formatUtc(at)}`;
    case "ready":
      return `🧪 *Ready for Testing*\n\n${task}${details}\n\nReady at: ${formatUtc(at)}`;
    case "blocker": {
      const excerpt = event.excerpt?.trim();
      const lastError = excerpt ? `\n\nLast error:\n\`\`\`\n${excerpt.slice(-EXCERPT_LENGTH)}\n\`\`\`` : "";
      return `⚠️ *Task Blocked*\n\n${task}\n\nReason: ${event.details}${lastError}`;
    }
    case "blocked-summary":
      return `🚧 *Blocked Tasks Summary*\n\n${event.details}`;
    case "reset":
      return `🔁 *Task Reset*\n\n${task}${details}`;
    case "question":
      return `❓ *Agent Question*\n\nFrom: \`${event.taskName}\`${details}`;
  }
}

/**
 * Sends each event to one chat. Markdown is tried first; text Telegram
 * refuses to parse is re-sent plain.
 */
export class TelegramNotifier implements Notifier {
  private readonly chatId: string;
  private readonly client: TelegramApiClient;
  private readonly clock: () => Date;

  constructor(options: TelegramNotifierOptions) {
    this.chatId = options.chatId;
    this.client = options.client ?? new FetchTelegramApiClient(options.token);
    this.clock = options.clock ?? (() => new Date());
  }

  async notify(event: NotificationEvent): Promise<void> {
    const text = this.truncate(formatNotification(event, this.clock()));
    try {
      await this.client.sendMessage({ chat_id: this.chatId, text, parse_mode: "Markdown" });
    } catch (markdownError) {
      try {
        await this.client.sendMessage({ chat_id: this.chatId, text });
      } catch (plainError) {
        throw new Error(`Telegram delivery failed: ${describeError(plainError)}`, { cause: markdownError });
      }
    }
  }

  private truncate(text: string): string {
    if (text.length <= MAX_MESSAGE_LENGTH) return text;
    return `${text.slice(0, MAX_MESSAGE_LENGTH)}\n[truncated ${text.length - MAX_MESSAGE_LENGTH} chars]`;
  }
}
