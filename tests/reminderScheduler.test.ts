import { describe, it, expect, beforeEach } from 'vitest';
import { ReminderScheduler } from '../src/scheduler/ReminderScheduler';
import type { TimerPayload, UserRecords } from '../src/types/domain';
import { InvalidTimeFormatError, LookupFailedError } from '../src/utils/errors';
import { FakeTimerDriver, NOON_JAKARTA, SAMPLE_TIMES, TEST_TIMEZONE } from './helpers/fakes';

describe('ReminderScheduler', () => {
  let driver: FakeTimerDriver;
  let fired: TimerPayload[];
  let scheduler: ReminderScheduler;

  beforeEach(() => {
    driver = new FakeTimerDriver();
    fired = [];
    scheduler = new ReminderScheduler(
      driver,
      { timezone: TEST_TIMEZONE },
      async (payload) => {
        fired.push(payload);
      },
      () => NOON_JAKARTA
    );
  });

  it('schedules only the events still ahead today', async () => {
    const events = await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);

    expect(events.map((event) => event.eventName)).toEqual(['Ashar', 'Maghrib', 'Isya']);
    expect(events[0]).toEqual({
      eventName: 'Ashar',
      time: '15:10',
      fireAt: new Date('2026-10-19T08:10:00.000Z')
    });
    expect(driver.active().map((timer) => (timer.kind === 'once' ? timer.at.toISOString() : null))).toEqual([
      '2026-10-19T08:10:00.000Z',
      '2026-10-19T10:55:00.000Z',
      '2026-10-19T12:05:00.000Z'
    ]);
  });

  it('keeps at most one live timer per owner and event after repeated requests', async () => {
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);
    await scheduler.rescheduleEvents('100', async () => ({ ...SAMPLE_TIMES, Isya: '19:20' }));

    expect(driver.timers).toHaveLength(9);
    expect(driver.active()).toHaveLength(3);
    const isya = scheduler.liveTimers('100').find(
      (timer) => timer.payload.purpose === 'EVENT_ONESHOT' && timer.payload.eventName === 'Isya'
    );
    expect(isya?.fireAt).toEqual(new Date('2026-10-19T12:20:00.000Z'));
  });

  it('serializes concurrent requests for the same owner', async () => {
    await Promise.all([
      scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES),
      scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES)
    ]);

    expect(scheduler.liveTimers('100')).toHaveLength(3);
    expect(driver.active()).toHaveLength(3);
  });

  it('leaves existing timers alone when the lookup fails', async () => {
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);

    await expect(
      scheduler.rescheduleEvents('100', async () => {
        throw new LookupFailedError('down');
      })
    ).rejects.toBeInstanceOf(LookupFailedError);

    expect(driver.active()).toHaveLength(3);
    expect(scheduler.liveTimers('100')).toHaveLength(3);
  });

  it('registers nothing and cancels nothing when a time is malformed', async () => {
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);

    await expect(
      scheduler.rescheduleEvents('100', async () => ({ ...SAMPLE_TIMES, Maghrib: '25:99' }))
    ).rejects.toBeInstanceOf(InvalidTimeFormatError);

    expect(driver.timers).toHaveLength(3);
    expect(driver.active()).toHaveLength(3);
  });

  it('does not touch other owners', async () => {
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);
    await scheduler.rescheduleEvents('200', async () => SAMPLE_TIMES);

    expect(scheduler.liveTimers('100')).toHaveLength(3);
    expect(scheduler.liveTimers('200')).toHaveLength(3);
    expect(scheduler.liveTimers()).toHaveLength(6);
  });

  it('fires the payload once and drops the one-shot entry', async () => {
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);
    const ashar = driver.timers[0];

    ashar?.fire();
    await Promise.resolve();

    expect(fired).toEqual([{ purpose: 'EVENT_ONESHOT', ownerKey: '100', eventName: 'Ashar' }]);
    expect(scheduler.liveTimers('100')).toHaveLength(2);
  });

  it('ignores a fire from a timer that was replaced', async () => {
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);
    const stale = driver.timers[0];
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);

    stale?.fire();
    await Promise.resolve();

    expect(fired).toEqual([]);
    expect(scheduler.liveTimers('100')).toHaveLength(3);
  });

  it('replaces the daily reading reminder instead of stacking it', () => {
    scheduler.scheduleReadingReminder('100', '7', '20:00');
    const clock = scheduler.scheduleReadingReminder('100', '7', '5:30');

    expect(clock).toEqual({ hours: 5, minutes: 30, text: '05:30' });
    expect(driver.active()).toHaveLength(1);
    const [timer] = driver.active();
    expect(timer?.kind === 'daily' ? timer.clock.text : null).toBe('05:30');
    expect(timer?.kind === 'daily' ? timer.timezone : null).toBe(TEST_TIMEZONE);
    expect(scheduler.liveTimers('100')).toEqual([
      { payload: { purpose: 'READING_DAILY', ownerKey: '100', userId: '7' }, fireAt: null, dailyTime: '05:30' }
    ]);
  });

  it('keeps the daily reminder when prayer reminders are rescheduled', async () => {
    scheduler.scheduleReadingReminder('100', '7', '20:00');
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);

    expect(scheduler.liveTimers('100')).toHaveLength(4);
  });

  it('keeps a daily reminder live after it fires', () => {
    scheduler.scheduleReadingReminder('100', '7', '20:00');
    driver.timers[0]?.fire();

    expect(fired).toEqual([{ purpose: 'READING_DAILY', ownerKey: '100', userId: '7' }]);
    expect(scheduler.liveTimers('100')).toHaveLength(1);
  });

  it('rejects a malformed reading time without registering', () => {
    expect(() => scheduler.scheduleReadingReminder('100', '7', '8pm')).toThrow(InvalidTimeFormatError);
    expect(driver.timers).toHaveLength(0);
  });

  it('cancels the reading reminder', () => {
    scheduler.scheduleReadingReminder('100', '7', '20:00');

    expect(scheduler.cancelReadingReminder('100')).toBe(true);
    expect(scheduler.cancelReadingReminder('100')).toBe(false);
    expect(driver.active()).toHaveLength(0);
  });

  it('restores reading reminders from stored intent', () => {
    const reading = (reminderTime: string | null, reminderChatId: number | null) => ({
      lastPosition: null,
      updatedAt: null,
      dailyTarget: 0,
      reminderTime,
      reminderChatId
    });
    const records: UserRecords = {
      '7': { dailyChecklist: {}, reading: reading('20:00', 100) },
      '8': { dailyChecklist: {}, reading: reading('21:00', null) },
      '9': { dailyChecklist: {}, reading: reading('later', 300) },
      '10': { dailyChecklist: {}, reading: reading(null, 400) }
    };

    expect(scheduler.restoreReadingReminders(records)).toBe(1);
    expect(scheduler.liveTimers()).toEqual([
      { payload: { purpose: 'READING_DAILY', ownerKey: '100', userId: '7' }, fireAt: null, dailyTime: '20:00' }
    ]);
  });

  it('cancels a chat reminder only for the user who owns it', () => {
    scheduler.scheduleReadingReminder('-500', '7', '20:00');

    expect(scheduler.readingReminderUser('-500')).toBe('7');
    expect(scheduler.cancelReadingReminder('-500', '8')).toBe(false);
    expect(driver.active()).toHaveLength(1);
    expect(scheduler.cancelReadingReminder('-500', '7')).toBe(true);
    expect(scheduler.readingReminderUser('-500')).toBeNull();
  });

  it('stops every timer', async () => {
    await scheduler.rescheduleEvents('100', async () => SAMPLE_TIMES);
    scheduler.scheduleReadingReminder('200', '8', '20:00');

    scheduler.stopAll();

    expect(driver.active()).toHaveLength(0);
    expect(scheduler.liveTimers()).toEqual([]);
  });
});
