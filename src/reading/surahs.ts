import surahsJson from '../content/quran/surahs.json';

export interface Surah {
  number: number;
  name: string;
  ayahs: number;
}

export const SURAHS: readonly Surah[] = surahsJson;

export const SURAH_PAGE_SIZE = 10;

export interface SurahPage {
  page: number;
  lastPage: number;
  items: Surah[];
  hasPrev: boolean;
  hasNext: boolean;
}

export function lastPageIndex(catalog: readonly Surah[] = SURAHS): number {
  return Math.max(Math.ceil(catalog.length / SURAH_PAGE_SIZE) - 1, 0);
}

export function clampPage(page: number, catalog: readonly Surah[] = SURAHS): number {
  if (!Number.isFinite(page)) {
    return 0;
  }
  return Math.min(Math.max(Math.trunc(page), 0), lastPageIndex(catalog));
}

export function surahPage(page: number, catalog: readonly Surah[] = SURAHS): SurahPage {
  const index = clampPage(page, catalog);
  const lastPage = lastPageIndex(catalog);
  const start = index * SURAH_PAGE_SIZE;
  return {
    page: index,
    lastPage,
    items: catalog.slice(start, start + SURAH_PAGE_SIZE),
    hasPrev: index > 0,
    hasNext: index < lastPage
  };
}

export function findSurah(number: number, catalog: readonly Surah[] = SURAHS): Surah | null {
  return catalog.find((surah) => surah.number === number) ?? null;
}
