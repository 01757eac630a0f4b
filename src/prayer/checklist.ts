import { emptyDayStatus } from '../repos/recordCodec';
import { PRAYER_NAMES } from '../types/domain';
import type { DayStatus, PrayerName, UserRecord } from '../types/domain';
import { UnknownEventError } from '../utils/errors';

export interface ChecklistSummary {
  doneCount: number;
  doneNames: PrayerName[];
  missedNames: PrayerName[];
}

export function isPrayerName(value: string): value is PrayerName {
  return PRAYER_NAMES.some((name) => name === value);
}

export class ChecklistManager {
  getOrInit(record: UserRecord, date: string): DayStatus {
    const existing = record.dailyChecklist[date];
    if (existing) {
      return existing;
    }

    const created = emptyDayStatus();
    record.dailyChecklist[date] = created;
    return created;
  }

  toggle(dayStatus: DayStatus, eventName: string): DayStatus {
    if (!isPrayerName(eventName)) {
      throw new UnknownEventError(eventName);
    }

    dayStatus[eventName] = !dayStatus[eventName];
    return dayStatus;
  }

  summary(dayStatus: DayStatus): ChecklistSummary {
    const doneNames = PRAYER_NAMES.filter((name) => dayStatus[name]);
    const missedNames = PRAYER_NAMES.filter((name) => !dayStatus[name]);
    return { doneCount: doneNames.length, doneNames, missedNames };
  }
}
