import { UserRecordRepo } from '../repos/UserRecordRepo';
import type { ReadingPosition, SelectionSession } from '../types/domain';
import { logger } from '../utils/logger';
import { SURAHS, clampPage, findSurah, surahPage, type Surah, type SurahPage } from './surahs';

export type ValueError = 'NOT_A_NUMBER' | 'NOT_POSITIVE' | 'BEYOND_SURAH';

export type SelectionOutcome =
  | { kind: 'CHOOSING_ITEM'; session: SelectionSession; page: SurahPage }
  | { kind: 'AWAITING_VALUE'; session: SelectionSession; surah: Surah; error: ValueError | null }
  | { kind: 'COMPLETED'; surah: Surah; position: ReadingPosition }
  | { kind: 'CANCELLED'; hadSession: boolean }
  | { kind: 'IDLE' };

const log = logger.child('selection');

/**
 * "Pick a surah from a paged list, then type the ayah." Sessions live in
 * memory only and are discarded on completion or cancellation.
 */
export class SelectionFlow {
  private readonly sessions = new Map<string, SelectionSession>();

  constructor(
    private readonly repo: UserRecordRepo,
    private readonly catalog: readonly Surah[] = SURAHS,
    private readonly now: () => Date = () => new Date()
  ) {}

  session(userId: string): SelectionSession | null {
    const session = this.sessions.get(userId);
    return session ? { ...session } : null;
  }

  start(userId: string): SelectionOutcome {
    const session: SelectionSession = { stage: 'CHOOSING_ITEM', chosenItem: null, page: 0 };
    this.sessions.set(userId, session);
    return this.choosing(session);
  }

  navigate(userId: string, page: number): SelectionOutcome {
    const session = this.sessions.get(userId);
    if (!session) {
      return this.start(userId);
    }
    if (session.stage !== 'CHOOSING_ITEM') {
      return this.current(session);
    }

    session.page = clampPage(page, this.catalog);
    return this.choosing(session);
  }

  pick(userId: string, item: number): SelectionOutcome {
    const session = this.sessions.get(userId);
    if (!session) {
      return this.start(userId);
    }
    if (session.stage !== 'CHOOSING_ITEM') {
      return this.current(session);
    }

    const surah = findSurah(item, this.catalog);
    if (!surah) {
      return this.choosing(session);
    }

    session.stage = 'AWAITING_VALUE';
    session.chosenItem = surah.number;
    return { kind: 'AWAITING_VALUE', session: { ...session }, surah, error: null };
  }

  /**
   * Commits the ayah for the chosen surah. If saving fails the session is
   * left at AWAITING_VALUE and the error propagates.
   */
  async submitValue(userId: string, text: string): Promise<SelectionOutcome> {
    const session = this.sessions.get(userId);
    if (!session) {
      return { kind: 'IDLE' };
    }

    const surah = session.chosenItem == null ? null : findSurah(session.chosenItem, this.catalog);
    if (session.stage !== 'AWAITING_VALUE' || !surah) {
      return this.current(session);
    }

    const trimmed = text.trim();
    let error: ValueError | null = null;
    if (!/^\d+$/.test(trimmed)) {
      error = 'NOT_A_NUMBER';
    } else if (Number(trimmed) <= 0) {
      error = 'NOT_POSITIVE';
    } else if (Number(trimmed) > surah.ayahs) {
      error = 'BEYOND_SURAH';
    }

    if (error) {
      return { kind: 'AWAITING_VALUE', session: { ...session }, surah, error };
    }

    const position: ReadingPosition = { sectionId: surah.number, subPosition: Number(trimmed) };
    const updatedAt = this.now().toISOString();
    await this.repo.update(userId, (record) => {
      record.reading.lastPosition = position;
      record.reading.updatedAt = updatedAt;
    });

    // A /batal or /baca that arrived during the save owns the slot now.
    if (this.sessions.get(userId) === session) {
      this.sessions.delete(userId);
    }
    log.info('Reading position saved', { userId, ...position });
    return { kind: 'COMPLETED', surah, position };
  }

  cancel(userId: string): SelectionOutcome {
    const hadSession = this.sessions.delete(userId);
    return { kind: 'CANCELLED', hadSession };
  }

  private current(session: SelectionSession): SelectionOutcome {
    const surah = session.chosenItem == null ? null : findSurah(session.chosenItem, this.catalog);
    if (session.stage === 'AWAITING_VALUE' && surah) {
      return { kind: 'AWAITING_VALUE', session: { ...session }, surah, error: null };
    }
    return this.choosing(session);
  }

  private choosing(session: SelectionSession): SelectionOutcome {
    return { kind: 'CHOOSING_ITEM', session: { ...session }, page: surahPage(session.page, this.catalog) };
  }
}
