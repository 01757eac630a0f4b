import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PrayerTimesService } from '../src/prayer/prayerTimesService';
import { LookupFailedError } from '../src/utils/errors';
import { NOON_JAKARTA, TEST_TIMEZONE } from './helpers/fakes';

const fetchMock = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => new Response('{}'));

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const TIMINGS = {
  Fajr: '04:02',
  Sunrise: '05:13',
  Dhuhr: '11:34',
  Asr: '14:40',
  Maghrib: '17:43',
  Isha: '18:53'
};

describe('PrayerTimesService', () => {
  const service = new PrayerTimesService({
    timezone: TEST_TIMEZONE,
    method: 11,
    timeoutMs: 50,
    userAgent: 'worship-tracker-test'
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('looks up by coordinates and maps the five prayers', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ code: 200, data: { timings: TIMINGS } }));

    const times = await service.fetchTimes(NOON_JAKARTA, { latitude: -6.2383, longitude: 106.9756 });

    expect(times).toEqual({ Subuh: '04:02', Dzuhur: '11:34', Ashar: '14:40', Maghrib: '17:43', Isya: '18:53' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.aladhan.com/v1/timings/19-10-2026?latitude=-6.2383&longitude=106.9756&method=11'
    );
  });

  it('looks up by city when no coordinates are known', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ code: 200, data: { timings: TIMINGS } }));

    await service.fetchTimes(NOON_JAKARTA, { city: 'Bekasi', country: 'ID' });

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.aladhan.com/v1/timingsByCity/19-10-2026?city=Bekasi&country=ID&method=11'
    );
  });

  it('fails on an HTTP error', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ code: 500 }, 500));

    await expect(service.fetchTimes(NOON_JAKARTA, { city: 'Bekasi', country: 'ID' })).rejects.toThrow(
      'Prayer times HTTP 500'
    );
  });

  it('fails when a prayer is missing from the response', async () => {
    const { Isha: _isha, ...partial } = TIMINGS;
    fetchMock.mockResolvedValueOnce(jsonResponse({ code: 200, data: { timings: partial } }));

    await expect(service.fetchTimes(NOON_JAKARTA, { city: 'Bekasi', country: 'ID' })).rejects.toThrow(
      'Prayer times response is missing Isha'
    );
  });

  it('fails when the response has no timings at all', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ code: 200, data: 'rate limited' }));

    await expect(service.fetchTimes(NOON_JAKARTA, { city: 'Bekasi', country: 'ID' })).rejects.toBeInstanceOf(
      LookupFailedError
    );
  });

  it('gives up after the timeout', async () => {
    fetchMock.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    await expect(service.fetchTimes(NOON_JAKARTA, { city: 'Bekasi', country: 'ID' })).rejects.toThrow(
      'Prayer times request failed: aborted'
    );
  });

  it('labels a place from the most specific address part', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ display_name: 'Bekasi, Jawa Barat, Indonesia', address: { city: 'Bekasi', state: 'Jawa Barat' } })
    );

    const label = await service.reverseGeocode(-6.2383, 106.9756);

    expect(label).toBe('Bekasi');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(
      'https://nominatim.openstreetmap.org/reverse?format=jsonv2&lat=-6.2383&lon=106.9756&zoom=10&accept-language=id'
    );
    expect(init?.headers).toEqual({ Accept: 'application/json', 'User-Agent': 'worship-tracker-test' });
  });

  it('falls back to the display name', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ display_name: 'Samudra Hindia' }));

    expect(await service.reverseGeocode(-10, 100)).toBe('Samudra Hindia');
  });

  it('fails when no place can be named', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'Unable to geocode' }));

    await expect(service.reverseGeocode(0, 0)).rejects.toThrow('Reverse geocoding returned no place');
  });
});
