import { PRAYER_NAMES } from '../types/domain';
import type { DayStatus, ReadingPosition, ReadingState, UserLocation, UserRecord, UserRecords } from '../types/domain';
import { isValidTimeHHmm } from '../utils/time';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const SURAH_COUNT = 114;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asFiniteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function asPositiveInt(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : null;
}

export function emptyDayStatus(): DayStatus {
  return { Subuh: false, Dzuhur: false, Ashar: false, Maghrib: false, Isya: false };
}

export function emptyUserRecord(): UserRecord {
  return {
    dailyChecklist: {},
    reading: {
      lastPosition: null,
      updatedAt: null,
      dailyTarget: 0,
      reminderTime: null,
      reminderChatId: null
    }
  };
}

function decodeLocation(raw: unknown): UserLocation | undefined {
  if (!isObject(raw)) {
    return undefined;
  }

  const latitude = asFiniteNumber(raw.latitude);
  const longitude = asFiniteNumber(raw.longitude);
  if (latitude == null || longitude == null) {
    return undefined;
  }

  const placeLabel =
    typeof raw.placeLabel === 'string' && raw.placeLabel.trim()
      ? raw.placeLabel.trim()
      : `${latitude.toFixed(4)}, ${longitude.toFixed(4)}`;

  return { latitude, longitude, placeLabel };
}

function decodeDayStatus(raw: unknown): DayStatus {
  const status = emptyDayStatus();
  if (!isObject(raw)) {
    return status;
  }

  for (const name of PRAYER_NAMES) {
    status[name] = raw[name] === true;
  }
  return status;
}

function decodeChecklist(raw: unknown): Record<string, DayStatus> {
  const checklist: Record<string, DayStatus> = {};
  if (!isObject(raw)) {
    return checklist;
  }

  for (const [date, value] of Object.entries(raw)) {
    if (ISO_DATE.test(date)) {
      checklist[date] = decodeDayStatus(value);
    }
  }
  return checklist;
}

function decodePosition(raw: unknown): ReadingPosition | null {
  if (!isObject(raw)) {
    return null;
  }

  const sectionId = asPositiveInt(raw.sectionId);
  const subPosition = asPositiveInt(raw.subPosition);
  if (sectionId == null || sectionId > SURAH_COUNT || subPosition == null) {
    return null;
  }
  return { sectionId, subPosition };
}

function asChatId(value: unknown): number | null {
  return typeof value === 'number' && Number.isSafeInteger(value) ? value : null;
}

// Records written before `reminderChatId` existed kept the chat on the record itself.
function decodeReading(raw: unknown, legacyChatId: number | null): ReadingState {
  const reading = emptyUserRecord().reading;
  if (!isObject(raw)) {
    return reading;
  }

  const target = raw.dailyTarget;
  const reminderTime =
    typeof raw.reminderTime === 'string' && isValidTimeHHmm(raw.reminderTime) ? raw.reminderTime.trim() : null;
  const reminderChatId = 'reminderChatId' in raw ? asChatId(raw.reminderChatId) : legacyChatId;

  return {
    lastPosition: decodePosition(raw.lastPosition),
    updatedAt: typeof raw.updatedAt === 'string' && raw.updatedAt ? raw.updatedAt : null,
    dailyTarget: typeof target === 'number' && Number.isInteger(target) && target >= 0 ? target : 0,
    reminderTime: reminderTime && reminderChatId != null ? reminderTime : null,
    reminderChatId: reminderTime ? reminderChatId : null
  };
}

/**
 * Reads one stored record. Unknown fields are dropped and missing or
 * malformed ones take their defaults.
 */
export function decodeUserRecord(raw: unknown): UserRecord {
  if (!isObject(raw)) {
    return emptyUserRecord();
  }

  const record: UserRecord = {
    dailyChecklist: decodeChecklist(raw.dailyChecklist),
    reading: decodeReading(raw.reading, asChatId(raw.chatId))
  };

  const location = decodeLocation(raw.location);
  if (location) {
    record.location = location;
  }

  return record;
}

export function decodeUserRecords(raw: unknown): UserRecords {
  const records: UserRecords = {};
  if (!isObject(raw)) {
    return records;
  }

  for (const [userId, value] of Object.entries(raw)) {
    records[userId] = decodeUserRecord(value);
  }
  return records;
}
