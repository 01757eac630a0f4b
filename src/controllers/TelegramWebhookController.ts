import { PrayerHandlers } from '../prayer/handlers';
import { ReadingHandlers } from '../reading/handlers';
import { parseCallbackData } from '../services/callbackData';
import { ContentComposer, LOCATION_BUTTON, TRY_AGAIN_LATER } from '../services/ContentComposer';
import type { MessageTransport } from '../services/TelegramApi';
import type { TelegramCallbackQuery, TelegramMessage, TelegramUpdate } from '../types/telegram';
import { StorageError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const UPDATE_DEDUPE_TTL_MS = 10 * 60 * 1000;

function parseCommand(text: string): { command: string; args: string } {
  const [head = '', ...rest] = text.trim().split(/\s+/);
  const command = head.split('@')[0].toLowerCase();
  return { command, args: rest.join(' ') };
}

export class TelegramWebhookController {
  private readonly processedUpdateIds = new Map<number, number>();

  constructor(
    private readonly transport: MessageTransport,
    private readonly composer: ContentComposer,
    private readonly prayerHandlers: PrayerHandlers,
    private readonly readingHandlers: ReadingHandlers
  ) {}

  async handle(update: TelegramUpdate): Promise<void> {
    if (this.isDuplicateUpdate(update.update_id)) {
      return;
    }

    const chatId = update.callback_query?.message?.chat.id ?? update.message?.chat.id;

    try {
      if (update.callback_query) {
        await this.handleCallback(update.callback_query);
        return;
      }

      if (update.message) {
        await this.handleMessage(update.message);
      }
    } catch (error) {
      logger.error('Failed to process update', {
        error: errorMessage(error),
        updateId: update.update_id
      });

      if (error instanceof StorageError && chatId != null) {
        await this.transport.sendMessage(chatId, TRY_AGAIN_LATER).catch((sendError: unknown) => {
          logger.error('Failed to report storage error', { error: errorMessage(sendError), chatId });
        });
      }
    }
  }

  private isDuplicateUpdate(updateId: number): boolean {
    const now = Date.now();

    for (const [key, ts] of this.processedUpdateIds) {
      if (now - ts > UPDATE_DEDUPE_TTL_MS) {
        this.processedUpdateIds.delete(key);
      }
    }

    if (this.processedUpdateIds.has(updateId)) {
      return true;
    }

    this.processedUpdateIds.set(updateId, now);
    return false;
  }

  private async handleMessage(message: TelegramMessage): Promise<void> {
    const from = message.from;
    if (!from) {
      return;
    }

    const chatId = message.chat.id;
    const userId = String(from.id);

    if (message.location) {
      await this.prayerHandlers.handleLocation(chatId, userId, message.location.latitude, message.location.longitude);
      return;
    }

    const text = message.text?.trim();
    if (!text) {
      return;
    }

    if (text.startsWith('/')) {
      await this.handleCommand(chatId, userId, text);
      return;
    }

    if (text === LOCATION_BUTTON) {
      await this.prayerHandlers.showLocationPrompt(chatId, userId);
      return;
    }

    if (this.readingHandlers.isAwaitingValue(userId)) {
      await this.readingHandlers.submitValue(chatId, userId, text);
    }
  }

  private async handleCommand(chatId: number, userId: string, text: string): Promise<void> {
    const { command, args } = parseCommand(text);

    switch (command) {
      case '/start':
      case '/help':
        await this.transport.sendMessage(chatId, this.composer.startText());
        return;
      case '/lokasi':
        await this.prayerHandlers.showLocationPrompt(chatId, userId);
        return;
      case '/solat':
        await this.prayerHandlers.showTracker(chatId, userId);
        return;
      case '/jadwal':
        await this.prayerHandlers.showSchedule(chatId, userId);
        return;
      case '/rekap':
        await this.prayerHandlers.showRecap(chatId, userId);
        return;
      case '/ingatkan':
        await this.prayerHandlers.enableReminders(chatId, userId);
        return;
      case '/ngaji':
        await this.readingHandlers.showStatus(chatId, userId);
        return;
      case '/baca':
        await this.readingHandlers.startSelection(chatId, userId);
        return;
      case '/target':
        await this.readingHandlers.setDailyTarget(chatId, userId, args);
        return;
      case '/pengingatngaji':
        await this.readingHandlers.setReadingReminder(chatId, userId, args);
        return;
      case '/batal':
        await this.readingHandlers.cancel(chatId, userId);
        return;
      default:
        await this.transport.sendMessage(chatId, 'Perintah tidak dikenal. Ketik /start untuk daftar perintah.');
    }
  }

  private async handleCallback(callback: TelegramCallbackQuery): Promise<void> {
    const message = callback.message;
    const action = callback.data ? parseCallbackData(callback.data) : null;
    const userId = String(callback.from.id);

    try {
      if (!message || !action) {
        return;
      }

      const chatId = message.chat.id;
      const messageId = message.message_id;

      switch (action.type) {
        case 'toggle':
          await this.prayerHandlers.toggle(chatId, userId, messageId, action.eventName);
          return;
        case 'refresh':
          await this.prayerHandlers.showTracker(chatId, userId, messageId);
          return;
        case 'readingStart':
          await this.readingHandlers.startSelection(chatId, userId);
          return;
        case 'selectionPage':
          await this.readingHandlers.navigate(chatId, userId, messageId, action.page);
          return;
        case 'selectionPick':
          await this.readingHandlers.pick(chatId, userId, messageId, action.item);
          return;
        case 'selectionCancel':
          await this.readingHandlers.cancel(chatId, userId, messageId);
          return;
      }
    } finally {
      await this.transport.answerCallbackQuery(callback.id).catch((error: unknown) => {
        logger.warn('answerCallbackQuery failed', { error: errorMessage(error), callbackId: callback.id });
      });
    }
  }
}
