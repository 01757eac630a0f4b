import type { ReplyMarkup } from '../types/telegram';

export interface SendMessageOptions {
  replyMarkup?: ReplyMarkup;
}

/** The slice of the Bot API the rest of the app talks to. */
export interface MessageTransport {
  sendMessage(chatId: number | string, text: string, options?: SendMessageOptions): Promise<void>;
  editMessageText(chatId: number | string, messageId: number, text: string, options?: SendMessageOptions): Promise<void>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
}

export class TelegramApi implements MessageTransport {
  private readonly baseUrl: string;

  constructor(botToken: string) {
    this.baseUrl = `https://api.telegram.org/bot${botToken}`;
  }

  async sendMessage(chatId: number | string, text: string, options: SendMessageOptions = {}): Promise<void> {
    await this.call('sendMessage', {
      chat_id: chatId,
      text,
      reply_markup: options.replyMarkup
    });
  }

  async editMessageText(
    chatId: number | string,
    messageId: number,
    text: string,
    options: SendMessageOptions = {}
  ): Promise<void> {
    try {
      await this.call('editMessageText', {
        chat_id: chatId,
        message_id: messageId,
        text,
        reply_markup: options.replyMarkup
      });
    } catch (error) {
      // Telegram rejects edits that change nothing; that is not a failure here.
      if (error instanceof Error && /message is not modified/i.test(error.message)) {
        return;
      }
      throw error;
    }
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      text
    });
  }

  private async call(method: string, body: Record<string, unknown>): Promise<void> {
    const response = await fetch(`${this.baseUrl}/${method}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json'
      },
      body: JSON.stringify(body)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Telegram API ${method} failed: HTTP ${response.status} ${text}`);
    }

    const payload: unknown = await response.json();
    if (typeof payload !== 'object' || payload === null || !('ok' in payload) || payload.ok !== true) {
      const description =
        typeof payload === 'object' && payload !== null && 'description' in payload
          ? String(payload.description)
          : 'unknown error';
      throw new Error(`Telegram API ${method} failed: ${description}`);
    }
  }
}
