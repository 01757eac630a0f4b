import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import { InvalidTimeFormatError } from './errors';

dayjs.extend(utc);
dayjs.extend(timezone);

export interface ClockTime {
  hours: number;
  minutes: number;
  /** Zero-padded HH:mm form. */
  text: string;
}

export function getNowInTimezone(timezoneName: string, now: Date = new Date()): dayjs.Dayjs {
  return dayjs(now).tz(timezoneName);
}

export function isValidTimeHHmm(value: string): boolean {
  return /^([01]?\d|2[0-3]):([0-5]\d)$/.test(value.trim());
}

export function parseClock(value: string): ClockTime {
  const match = value.trim().match(/^([01]?\d|2[0-3]):([0-5]\d)$/);
  if (!match) {
    throw new InvalidTimeFormatError(value);
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  return {
    hours,
    minutes,
    text: `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`
  };
}

/** The instant at which `clock` occurs on the same local calendar day as `now`. */
export function atLocalClock(now: Date, clock: ClockTime, timezoneName: string): Date {
  const dateLocal = isoDateInTimezone(now, timezoneName);
  return dayjs.tz(`${dateLocal} ${clock.text}`, timezoneName).toDate();
}

export function isoDateInTimezone(date: Date, timezoneName: string): string {
  return dayjs(date).tz(timezoneName).format('YYYY-MM-DD');
}

export function aladhanDate(date: Date, timezoneName: string): string {
  return dayjs(date).tz(timezoneName).format('DD-MM-YYYY');
}

export function dailyCronExpression(clock: ClockTime): string {
  return `${clock.minutes} ${clock.hours} * * *`;
}
