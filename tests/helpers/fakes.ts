import type { TimeSource, TimeSourceQuery } from '../../src/prayer/prayerTimesService';
import type { StateStore } from '../../src/repos/StateStore';
import type { CancelTimer, TimerDriver } from '../../src/scheduler/timerDriver';
import type { MessageTransport, SendMessageOptions } from '../../src/services/TelegramApi';
import type { PrayerTimes, UserRecords } from '../../src/types/domain';
import { StorageError } from '../../src/utils/errors';
import type { ClockTime } from '../../src/utils/time';

export const TEST_TIMEZONE = 'Asia/Jakarta';

export const SAMPLE_TIMES: PrayerTimes = {
  Subuh: '04:30',
  Dzuhur: '11:50',
  Ashar: '15:10',
  Maghrib: '17:55',
  Isya: '19:05'
};

/** 2026-10-19 12:00 in Jakarta (UTC+7). */
export const NOON_JAKARTA = new Date('2026-10-19T05:00:00.000Z');

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => {
    if (ms > 0) {
      setTimeout(resolve, ms);
      return;
    }
    setImmediate(resolve);
  });
}

export class MemoryStateStore implements StateStore {
  failLoad = false;
  failSave = false;
  loadDelayMs = 0;
  saveDelayMs = 0;
  loads = 0;
  saves = 0;
  private data: UserRecords;

  constructor(initial: UserRecords = {}) {
    this.data = structuredClone(initial);
  }

  async load(): Promise<UserRecords> {
    this.loads += 1;
    await pause(this.loadDelayMs);
    if (this.failLoad) {
      throw new StorageError('load failed');
    }
    return structuredClone(this.data);
  }

  async save(records: UserRecords): Promise<void> {
    this.saves += 1;
    await pause(this.saveDelayMs);
    if (this.failSave) {
      throw new StorageError('save failed');
    }
    this.data = structuredClone(records);
  }

  snapshot(): UserRecords {
    return structuredClone(this.data);
  }
}

export interface SentMessage {
  chatId: number | string;
  text: string;
  options?: SendMessageOptions;
}

export interface EditedMessage extends SentMessage {
  messageId: number;
}

export class FakeTransport implements MessageTransport {
  readonly sent: SentMessage[] = [];
  readonly edited: EditedMessage[] = [];
  readonly answered: string[] = [];
  failSend = false;

  async sendMessage(chatId: number | string, text: string, options?: SendMessageOptions): Promise<void> {
    if (this.failSend) {
      throw new Error('send failed');
    }
    this.sent.push({ chatId, text, options });
  }

  async editMessageText(
    chatId: number | string,
    messageId: number,
    text: string,
    options?: SendMessageOptions
  ): Promise<void> {
    this.edited.push({ chatId, messageId, text, options });
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    this.answered.push(callbackQueryId);
  }

  lastText(): string | undefined {
    return this.sent[this.sent.length - 1]?.text;
  }

  lastEdit(): EditedMessage | undefined {
    return this.edited[this.edited.length - 1];
  }
}

export type FakeTimer =
  | { kind: 'once'; at: Date; fire: () => void; cancelled: boolean }
  | { kind: 'daily'; clock: ClockTime; timezone: string; fire: () => void; cancelled: boolean };

export class FakeTimerDriver implements TimerDriver {
  readonly timers: FakeTimer[] = [];

  once(at: Date, fire: () => void): CancelTimer {
    const timer: FakeTimer = { kind: 'once', at, fire, cancelled: false };
    this.timers.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }

  daily(clock: ClockTime, timezone: string, fire: () => void): CancelTimer {
    const timer: FakeTimer = { kind: 'daily', clock, timezone, fire, cancelled: false };
    this.timers.push(timer);
    return () => {
      timer.cancelled = true;
    };
  }

  active(): FakeTimer[] {
    return this.timers.filter((timer) => !timer.cancelled);
  }
}

export class FakeTimeSource implements TimeSource {
  readonly queries: TimeSourceQuery[] = [];
  times: PrayerTimes | Error = SAMPLE_TIMES;
  place: string | Error = 'Bekasi';

  async fetchTimes(_date: Date, query: TimeSourceQuery): Promise<PrayerTimes> {
    this.queries.push(query);
    if (this.times instanceof Error) {
      throw this.times;
    }
    return { ...this.times };
  }

  async reverseGeocode(): Promise<string> {
    if (this.place instanceof Error) {
      throw this.place;
    }
    return this.place;
  }
}
