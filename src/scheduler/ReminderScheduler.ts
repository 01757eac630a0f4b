import { PRAYER_NAMES } from '../types/domain';
import type { PrayerName, PrayerTimes, TimerPayload, TimerPurpose, UserRecords, WorshipSettings } from '../types/domain';
import { KeyedQueue } from '../utils/async';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { atLocalClock, parseClock, type ClockTime } from '../utils/time';
import type { CancelTimer, TimerDriver } from './timerDriver';

export type FireHandler = (payload: TimerPayload) => Promise<void>;

export interface ScheduledEvent {
  eventName: PrayerName;
  time: string;
  fireAt: Date;
}

export interface LiveTimerInfo {
  payload: TimerPayload;
  fireAt: Date | null;
  dailyTime: string | null;
}

interface LiveTimer extends LiveTimerInfo {
  token: number;
  cancel: CancelTimer;
}

type Slot = PrayerName | 'daily';

const log = logger.child('scheduler');

function slotKey(purpose: TimerPurpose, slot: Slot): string {
  return `${purpose}:${slot}`;
}

/**
 * Registry of live reminder timers, grouped by owner (chat) and keyed by
 * purpose and slot. Registering under a key always cancels what was there.
 */
export class ReminderScheduler {
  private readonly owners = new Map<string, Map<string, LiveTimer>>();
  private readonly reschedules = new KeyedQueue();
  private nextToken = 1;

  constructor(
    private readonly driver: TimerDriver,
    private readonly settings: Pick<WorshipSettings, 'timezone'>,
    private readonly onFire: FireHandler,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Replaces the owner's one-shot prayer reminders with today's. Nothing is
   * cancelled unless every time loaded and parsed.
   */
  async rescheduleEvents(ownerKey: string, loadTimes: () => Promise<PrayerTimes>): Promise<ScheduledEvent[]> {
    return this.reschedules.run(ownerKey, async () => {
      const times = await loadTimes();
      const now = this.now();
      const planned = PRAYER_NAMES.map((eventName) => {
        const clock = parseClock(times[eventName]);
        return { eventName, clock, fireAt: atLocalClock(now, clock, this.settings.timezone) };
      });

      this.cancelPurpose(ownerKey, 'EVENT_ONESHOT');

      const upcoming = planned.filter((event) => event.fireAt.getTime() > now.getTime());
      for (const event of upcoming) {
        this.register(
          { purpose: 'EVENT_ONESHOT', ownerKey, eventName: event.eventName },
          event.eventName,
          { fireAt: event.fireAt }
        );
      }

      log.info('Prayer reminders scheduled', {
        ownerKey,
        scheduled: upcoming.map((event) => event.eventName),
        skipped: planned.length - upcoming.length
      });

      return upcoming.map((event) => ({ eventName: event.eventName, time: event.clock.text, fireAt: event.fireAt }));
    });
  }

  scheduleReadingReminder(ownerKey: string, userId: string, time: string): ClockTime {
    const clock = parseClock(time);
    this.register({ purpose: 'READING_DAILY', ownerKey, userId }, 'daily', { dailyTime: clock });
    log.info('Reading reminder scheduled', { ownerKey, userId, time: clock.text });
    return clock;
  }

  /** The user whose daily reading reminder is live in this chat, if any. */
  readingReminderUser(ownerKey: string): string | null {
    const payload = this.owners.get(ownerKey)?.get(slotKey('READING_DAILY', 'daily'))?.payload;
    return payload?.purpose === 'READING_DAILY' ? payload.userId : null;
  }

  /** Cancels the chat's reading reminder; with `userId`, only when it belongs to that user. */
  cancelReadingReminder(ownerKey: string, userId?: string): boolean {
    if (userId != null && this.readingReminderUser(ownerKey) !== userId) {
      return false;
    }
    return this.cancelPurpose(ownerKey, 'READING_DAILY') > 0;
  }

  cancelOwner(ownerKey: string): void {
    const timers = this.owners.get(ownerKey);
    if (!timers) {
      return;
    }
    for (const timer of timers.values()) {
      timer.cancel();
    }
    this.owners.delete(ownerKey);
  }

  /** Re-registers daily reading reminders from persisted intent after a restart. */
  restoreReadingReminders(records: UserRecords): number {
    let restored = 0;
    for (const [userId, record] of Object.entries(records)) {
      const { reminderTime: time, reminderChatId } = record.reading;
      if (reminderChatId == null || !time) {
        continue;
      }

      try {
        this.scheduleReadingReminder(String(reminderChatId), userId, time);
        restored += 1;
      } catch (error) {
        log.warn('Skipping stored reading reminder', { userId, time, error: errorMessage(error) });
      }
    }

    log.info('Reading reminders restored', { restored });
    return restored;
  }

  liveTimers(ownerKey?: string): LiveTimerInfo[] {
    const groups = ownerKey ? [this.owners.get(ownerKey)] : [...this.owners.values()];
    const result: LiveTimerInfo[] = [];
    for (const timers of groups) {
      for (const timer of timers?.values() ?? []) {
        result.push({ payload: timer.payload, fireAt: timer.fireAt, dailyTime: timer.dailyTime });
      }
    }
    return result;
  }

  stopAll(): void {
    for (const ownerKey of [...this.owners.keys()]) {
      this.cancelOwner(ownerKey);
    }
  }

  private register(payload: TimerPayload, slot: Slot, when: { fireAt: Date } | { dailyTime: ClockTime }): void {
    const key = slotKey(payload.purpose, slot);
    const timers = this.owners.get(payload.ownerKey) ?? new Map<string, LiveTimer>();
    this.owners.set(payload.ownerKey, timers);

    timers.get(key)?.cancel();
    timers.delete(key);

    const token = this.nextToken++;
    const fire = () => this.fire(payload.ownerKey, key, token);
    const cancel =
      'fireAt' in when
        ? this.driver.once(when.fireAt, fire)
        : this.driver.daily(when.dailyTime, this.settings.timezone, fire);

    timers.set(key, {
      token,
      cancel,
      payload,
      fireAt: 'fireAt' in when ? when.fireAt : null,
      dailyTime: 'dailyTime' in when ? when.dailyTime.text : null
    });
  }

  private fire(ownerKey: string, key: string, token: number): void {
    const timers = this.owners.get(ownerKey);
    const timer = timers?.get(key);
    if (!timers || !timer || timer.token !== token) {
      return;
    }

    if (timer.payload.purpose === 'EVENT_ONESHOT') {
      timers.delete(key);
      if (timers.size === 0) {
        this.owners.delete(ownerKey);
      }
    }

    log.info('Reminder fired', { ...timer.payload });
    this.onFire(timer.payload).catch((error) => {
      log.error('Reminder handler failed', { ...timer.payload, error: errorMessage(error) });
    });
  }

  private cancelPurpose(ownerKey: string, purpose: TimerPurpose): number {
    const timers = this.owners.get(ownerKey);
    if (!timers) {
      return 0;
    }

    let cancelled = 0;
    for (const [key, timer] of timers) {
      if (timer.payload.purpose === purpose) {
        timer.cancel();
        timers.delete(key);
        cancelled += 1;
      }
    }

    if (timers.size === 0) {
      this.owners.delete(ownerKey);
    }
    if (cancelled > 0) {
      log.info('Reminders cancelled', { ownerKey, purpose, cancelled });
    }
    return cancelled;
  }
}
