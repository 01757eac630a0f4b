import { UserRecordRepo } from '../repos/UserRecordRepo';
import { ReminderScheduler } from '../scheduler/ReminderScheduler';
import { ContentComposer } from '../services/ContentComposer';
import type { MessageTransport } from '../services/TelegramApi';
import type { PrayerTimes, UserRecord, WorshipSettings } from '../types/domain';
import { InvalidTimeFormatError, LookupFailedError, UnknownEventError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { isoDateInTimezone } from '../utils/time';
import { ChecklistManager } from './checklist';
import type { TimeSource, TimeSourceQuery } from './prayerTimesService';

const log = logger.child('prayer');

export class PrayerHandlers {
  constructor(
    private readonly transport: MessageTransport,
    private readonly repo: UserRecordRepo,
    private readonly timeSource: TimeSource,
    private readonly checklist: ChecklistManager,
    private readonly scheduler: ReminderScheduler,
    private readonly composer: ContentComposer,
    private readonly settings: WorshipSettings,
    private readonly now: () => Date = () => new Date()
  ) {}

  async showLocationPrompt(chatId: number, userId: string): Promise<void> {
    const record = await this.repo.get(userId);
    await this.transport.sendMessage(chatId, this.composer.locationPromptText(this.placeLabel(record)), {
      replyMarkup: this.composer.locationKeyboard()
    });
  }

  async handleLocation(chatId: number, userId: string, latitude: number, longitude: number): Promise<void> {
    let placeLabel: string;
    let resolved = true;
    try {
      placeLabel = await this.timeSource.reverseGeocode(latitude, longitude);
    } catch (error) {
      log.warn('Reverse geocoding unavailable', { userId, error: errorMessage(error) });
      placeLabel = `${latitude.toFixed(4)}, ${longitude.toFixed(4)}`;
      resolved = false;
    }

    await this.repo.update(userId, (record) => {
      record.location = { latitude, longitude, placeLabel };
    });

    await this.transport.sendMessage(chatId, this.composer.locationSavedText(placeLabel, resolved), {
      replyMarkup: { remove_keyboard: true }
    });
  }

  async showTracker(chatId: number, userId: string, editMessageId?: number): Promise<void> {
    const record = await this.repo.get(userId);
    const status = this.checklist.getOrInit(record, this.today());
    const times = await this.loadTimesOrNull(record);
    const text = this.composer.trackerText({
      now: this.now(),
      placeLabel: this.placeLabel(record),
      status,
      times
    });
    const replyMarkup = this.composer.trackerKeyboard(status);

    if (editMessageId != null) {
      await this.transport.editMessageText(chatId, editMessageId, text, { replyMarkup });
      return;
    }
    await this.transport.sendMessage(chatId, text, { replyMarkup });
  }

  async toggle(chatId: number, userId: string, messageId: number, eventName: string): Promise<void> {
    const date = this.today();
    await this.repo.update(userId, (record) => {
      const status = this.checklist.getOrInit(record, date);
      try {
        this.checklist.toggle(status, eventName);
      } catch (error) {
        if (!(error instanceof UnknownEventError)) {
          throw error;
        }
        log.warn('Ignoring toggle of unknown prayer', { userId, eventName });
      }
    });

    await this.showTracker(chatId, userId, messageId);
  }

  async showSchedule(chatId: number, userId: string): Promise<void> {
    const record = await this.repo.get(userId);
    const times = await this.loadTimesOrNull(record);
    await this.transport.sendMessage(
      chatId,
      this.composer.scheduleText({ now: this.now(), placeLabel: this.placeLabel(record), times })
    );
  }

  async showRecap(chatId: number, userId: string): Promise<void> {
    const record = await this.repo.get(userId);
    const status = this.checklist.getOrInit(record, this.today());
    await this.transport.sendMessage(chatId, this.composer.recapText(this.checklist.summary(status)));
  }

  async enableReminders(chatId: number, userId: string): Promise<void> {
    const record = await this.repo.get(userId);

    try {
      const events = await this.scheduler.rescheduleEvents(String(chatId), () =>
        this.timeSource.fetchTimes(this.now(), this.query(record))
      );
      await this.transport.sendMessage(chatId, this.composer.remindersEnabledText(events));
    } catch (error) {
      if (error instanceof LookupFailedError || error instanceof InvalidTimeFormatError) {
        log.warn('Prayer reminders not scheduled', { userId, chatId, error: errorMessage(error) });
        await this.transport.sendMessage(chatId, 'Gagal setup pengingat. Coba lagi nanti.');
        return;
      }
      throw error;
    }
  }

  private async loadTimesOrNull(record: UserRecord): Promise<PrayerTimes | null> {
    try {
      return await this.timeSource.fetchTimes(this.now(), this.query(record));
    } catch (error) {
      if (error instanceof LookupFailedError) {
        log.warn('Prayer times unavailable', { error: error.message });
        return null;
      }
      throw error;
    }
  }

  private query(record: UserRecord): TimeSourceQuery {
    if (record.location) {
      return { latitude: record.location.latitude, longitude: record.location.longitude };
    }
    return { city: this.settings.defaultCity, country: this.settings.defaultCountry };
  }

  private placeLabel(record: UserRecord): string {
    return record.location?.placeLabel ?? this.settings.defaultCity;
  }

  private today(): string {
    return isoDateInTimezone(this.now(), this.settings.timezone);
  }
}
