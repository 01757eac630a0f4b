import { UserRecordRepo } from '../repos/UserRecordRepo';
import { ReminderScheduler } from '../scheduler/ReminderScheduler';
import { ContentComposer } from '../services/ContentComposer';
import type { MessageTransport } from '../services/TelegramApi';
import { logger } from '../utils/logger';
import { isValidTimeHHmm, parseClock } from '../utils/time';
import { SelectionFlow, type SelectionOutcome } from './selectionFlow';

const log = logger.child('reading');

const REMINDER_OFF = ['off', 'mati', 'stop'];

export class ReadingHandlers {
  constructor(
    private readonly transport: MessageTransport,
    private readonly repo: UserRecordRepo,
    private readonly flow: SelectionFlow,
    private readonly scheduler: ReminderScheduler,
    private readonly composer: ContentComposer
  ) {}

  isAwaitingValue(userId: string): boolean {
    return this.flow.session(userId)?.stage === 'AWAITING_VALUE';
  }

  async showStatus(chatId: number, userId: string): Promise<void> {
    const record = await this.repo.get(userId);
    await this.transport.sendMessage(chatId, this.composer.readingStatusText(record.reading), {
      replyMarkup: this.composer.readingStatusKeyboard()
    });
  }

  async startSelection(chatId: number, userId: string): Promise<void> {
    await this.render(chatId, this.flow.start(userId));
  }

  async navigate(chatId: number, userId: string, messageId: number, page: number): Promise<void> {
    await this.render(chatId, this.flow.navigate(userId, page), messageId);
  }

  async pick(chatId: number, userId: string, messageId: number, item: number): Promise<void> {
    await this.render(chatId, this.flow.pick(userId, item), messageId);
  }

  async submitValue(chatId: number, userId: string, text: string): Promise<void> {
    await this.render(chatId, await this.flow.submitValue(userId, text));
  }

  async cancel(chatId: number, userId: string, messageId?: number): Promise<void> {
    await this.render(chatId, this.flow.cancel(userId), messageId);
  }

  async setDailyTarget(chatId: number, userId: string, arg: string): Promise<void> {
    const raw = arg.trim();
    const target = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(target)) {
      await this.transport.sendMessage(chatId, 'Format: /target 10 (jumlah ayat per hari, 0 untuk hapus target).');
      return;
    }

    await this.repo.update(userId, (record) => {
      record.reading.dailyTarget = target;
    });

    await this.transport.sendMessage(
      chatId,
      target > 0 ? `🎯 Target harian disimpan: ${target} ayat per hari.` : '🎯 Target harian dihapus.'
    );
  }

  /**
   * One reading reminder per chat. Setting a reminder in a chat where another
   * member has one replaces theirs and clears their stored intent.
   */
  async setReadingReminder(chatId: number, userId: string, arg: string): Promise<void> {
    const raw = arg.trim().toLowerCase();
    const ownerKey = String(chatId);

    if (REMINDER_OFF.includes(raw)) {
      const previousChatId = await this.repo.update(userId, (record) => {
        const previous = record.reading.reminderChatId;
        record.reading.reminderTime = null;
        record.reading.reminderChatId = null;
        return previous;
      });
      if (previousChatId != null) {
        this.scheduler.cancelReadingReminder(String(previousChatId), userId);
      }
      await this.transport.sendMessage(chatId, '🔕 Pengingat ngaji dimatikan.');
      return;
    }

    if (!isValidTimeHHmm(raw)) {
      await this.transport.sendMessage(chatId, 'Format: /pengingatngaji 20:00 (atau /pengingatngaji off).');
      return;
    }

    const clock = parseClock(raw);
    const previousChatId = await this.repo.update(userId, (record) => {
      const previous = record.reading.reminderChatId;
      record.reading.reminderTime = clock.text;
      record.reading.reminderChatId = chatId;
      return previous;
    });

    const replacedUserId = this.scheduler.readingReminderUser(ownerKey);
    if (replacedUserId != null && replacedUserId !== userId) {
      await this.repo.update(replacedUserId, (record) => {
        if (record.reading.reminderChatId === chatId) {
          record.reading.reminderTime = null;
          record.reading.reminderChatId = null;
        }
      });
      log.info('Reading reminder taken over', { chatId, userId, replacedUserId });
    }

    if (previousChatId != null && previousChatId !== chatId) {
      this.scheduler.cancelReadingReminder(String(previousChatId), userId);
    }
    this.scheduler.scheduleReadingReminder(ownerKey, userId, clock.text);

    const lines = [`⏰ Pengingat ngaji aktif setiap hari jam ${clock.text}.`];
    if (replacedUserId != null && replacedUserId !== userId) {
      lines.push('⚠️ Pengingat ngaji anggota lain di chat ini sudah diganti.');
    }
    await this.transport.sendMessage(chatId, lines.join('\n'));
  }

  private async render(chatId: number, outcome: SelectionOutcome, messageId?: number): Promise<void> {
    switch (outcome.kind) {
      case 'CHOOSING_ITEM': {
        const text = this.composer.surahPickerText(outcome.page);
        const replyMarkup = this.composer.surahPickerKeyboard(outcome.page);
        if (messageId != null) {
          await this.transport.editMessageText(chatId, messageId, text, { replyMarkup });
          return;
        }
        await this.transport.sendMessage(chatId, text, { replyMarkup });
        return;
      }
      case 'AWAITING_VALUE': {
        const text = this.composer.ayahPromptText(outcome.surah, outcome.error);
        if (messageId != null) {
          await this.transport.editMessageText(chatId, messageId, text);
          return;
        }
        await this.transport.sendMessage(chatId, text);
        return;
      }
      case 'COMPLETED':
        await this.transport.sendMessage(
          chatId,
          this.composer.readingSavedText(outcome.surah, outcome.position.subPosition)
        );
        return;
      case 'CANCELLED': {
        const text = this.composer.cancelledText(outcome.hadSession);
        if (messageId != null) {
          await this.transport.editMessageText(chatId, messageId, text);
          return;
        }
        await this.transport.sendMessage(chatId, text, { replyMarkup: { remove_keyboard: true } });
        return;
      }
      case 'IDLE':
        log.debug('Selection input without a session', { chatId });
        return;
    }
  }
}
