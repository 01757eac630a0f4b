export const PRAYER_NAMES = ['Subuh', 'Dzuhur', 'Ashar', 'Maghrib', 'Isya'] as const;

export type PrayerName = (typeof PRAYER_NAMES)[number];

export const PRAYER_EMOJI: Record<PrayerName, string> = {
  Subuh: '🌅',
  Dzuhur: '☀️',
  Ashar: '🌤️',
  Maghrib: '🌇',
  Isya: '🌙'
};

export type DayStatus = Record<PrayerName, boolean>;

/** Local clock strings (HH:mm) as returned by the prayer-time service. */
export type PrayerTimes = Record<PrayerName, string>;

export interface UserLocation {
  latitude: number;
  longitude: number;
  placeLabel: string;
}

export interface ReadingPosition {
  /** Surah number, 1..114. */
  sectionId: number;
  /** Ayah within the surah, starting at 1. */
  subPosition: number;
}

export interface ReadingState {
  lastPosition: ReadingPosition | null;
  updatedAt: string | null;
  /** Ayahs per day; 0 means no target. */
  dailyTarget: number;
  reminderTime: string | null;
  /** Chat the daily reminder is delivered to; set together with `reminderTime`. */
  reminderChatId: number | null;
}

export interface UserRecord {
  location?: UserLocation;
  dailyChecklist: Record<string, DayStatus>;
  reading: ReadingState;
}

export type UserRecords = Record<string, UserRecord>;

export interface WorshipSettings {
  timezone: string;
  defaultCity: string;
  defaultCountry: string;
}

export type TimerPurpose = 'EVENT_ONESHOT' | 'READING_DAILY';

export type TimerPayload =
  | { purpose: 'EVENT_ONESHOT'; ownerKey: string; eventName: PrayerName }
  | { purpose: 'READING_DAILY'; ownerKey: string; userId: string };

export type SelectionStage = 'CHOOSING_ITEM' | 'AWAITING_VALUE';

export interface SelectionSession {
  stage: SelectionStage;
  chosenItem: number | null;
  page: number;
}
