import { UserRecordRepo } from '../repos/UserRecordRepo';
import { ContentComposer } from '../services/ContentComposer';
import type { MessageTransport } from '../services/TelegramApi';
import type { TimerPayload } from '../types/domain';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('notifier');

/** Turns a fired timer into a chat message. */
export class ReminderNotifier {
  constructor(
    private readonly transport: MessageTransport,
    private readonly repo: UserRecordRepo,
    private readonly composer: ContentComposer
  ) {}

  readonly handle = async (payload: TimerPayload): Promise<void> => {
    let text: string;
    switch (payload.purpose) {
      case 'EVENT_ONESHOT':
        text = this.composer.prayerReminderText(payload.eventName);
        break;
      case 'READING_DAILY': {
        // The record is read now, not when the timer was set.
        const record = await this.repo.get(payload.userId);
        text = this.composer.readingReminderText(record.reading);
        break;
      }
    }

    try {
      await this.transport.sendMessage(payload.ownerKey, text);
    } catch (error) {
      log.error('Reminder delivery failed', { ...payload, error: errorMessage(error) });
    }
  };
}
