import type { PrayerName, PrayerTimes } from '../types/domain';
import { LookupFailedError, errorMessage } from '../utils/errors';
import { aladhanDate } from '../utils/time';

export type TimeSourceQuery =
  | { latitude: number; longitude: number }
  | { city: string; country: string };

export interface TimeSource {
  fetchTimes(date: Date, query: TimeSourceQuery): Promise<PrayerTimes>;
  reverseGeocode(latitude: number, longitude: number): Promise<string>;
}

export interface PrayerTimesServiceOptions {
  timezone: string;
  method: number;
  timeoutMs: number;
  userAgent: string;
}

const ALADHAN_BASE = 'https://api.aladhan.com/v1';
const NOMINATIM_REVERSE = 'https://nominatim.openstreetmap.org/reverse';

const ALADHAN_KEYS: Record<PrayerName, string> = {
  Subuh: 'Fajr',
  Dzuhur: 'Dhuhr',
  Ashar: 'Asr',
  Maghrib: 'Maghrib',
  Isya: 'Isha'
};

function readString(value: unknown): string | null {
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return null;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class PrayerTimesService implements TimeSource {
  constructor(private readonly options: PrayerTimesServiceOptions) {}

  async fetchTimes(date: Date, query: TimeSourceQuery): Promise<PrayerTimes> {
    const day = aladhanDate(date, this.options.timezone);
    const url =
      'latitude' in query
        ? new URL(`${ALADHAN_BASE}/timings/${day}`)
        : new URL(`${ALADHAN_BASE}/timingsByCity/${day}`);

    if ('latitude' in query) {
      url.searchParams.set('latitude', String(query.latitude));
      url.searchParams.set('longitude', String(query.longitude));
    } else {
      url.searchParams.set('city', query.city);
      url.searchParams.set('country', query.country);
    }
    url.searchParams.set('method', String(this.options.method));

    const payload = await this.getJson(url, 'Prayer times');
    const data = isObject(payload) ? payload.data : undefined;
    const timings = isObject(data) ? data.timings : undefined;
    if (!isObject(timings)) {
      throw new LookupFailedError('Prayer times response has no timings');
    }

    return {
      Subuh: this.readTiming(timings, 'Subuh'),
      Dzuhur: this.readTiming(timings, 'Dzuhur'),
      Ashar: this.readTiming(timings, 'Ashar'),
      Maghrib: this.readTiming(timings, 'Maghrib'),
      Isya: this.readTiming(timings, 'Isya')
    };
  }

  async reverseGeocode(latitude: number, longitude: number): Promise<string> {
    const url = new URL(NOMINATIM_REVERSE);
    url.searchParams.set('format', 'jsonv2');
    url.searchParams.set('lat', String(latitude));
    url.searchParams.set('lon', String(longitude));
    url.searchParams.set('zoom', '10');
    url.searchParams.set('accept-language', 'id');

    const payload = await this.getJson(url, 'Reverse geocoding', { 'User-Agent': this.options.userAgent });
    if (!isObject(payload)) {
      throw new LookupFailedError('Reverse geocoding returned no place');
    }

    const address = isObject(payload.address) ? payload.address : {};
    const label =
      readString(address.city) ??
      readString(address.town) ??
      readString(address.village) ??
      readString(address.county) ??
      readString(address.state) ??
      readString(payload.display_name);

    if (!label) {
      throw new LookupFailedError('Reverse geocoding returned no place');
    }
    return label;
  }

  private readTiming(timings: Record<string, unknown>, prayer: PrayerName): string {
    const value = readString(timings[ALADHAN_KEYS[prayer]]);
    if (!value) {
      throw new LookupFailedError(`Prayer times response is missing ${ALADHAN_KEYS[prayer]}`);
    }
    return value;
  }

  private async getJson(url: URL, label: string, headers: Record<string, string> = {}): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url.toString(), {
        method: 'GET',
        headers: { Accept: 'application/json', ...headers },
        signal: controller.signal
      });

      if (!response.ok) {
        throw new LookupFailedError(`${label} HTTP ${response.status}`);
      }

      return await response.json();
    } catch (error) {
      if (error instanceof LookupFailedError) {
        throw error;
      }
      throw new LookupFailedError(`${label} request failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
