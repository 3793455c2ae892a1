import { and, asc, eq, inArray, isNull, lte, notInArray, sql } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from './db';
import { NotFoundError, ValidationError, ensure, withStorage } from './errors';
import { logger } from './logger';
import {
  MAX_PERIOD,
  MAX_SESSION_COUNT,
  MIN_PERIOD,
  MIN_SESSION_COUNT,
  addDays,
  systemClock,
  toIsoDate,
  type Clock,
} from './logic';
import { dictionaryHistory, words } from './schema';
import {
  IdSchema,
  parseLocale,
  type Locale,
  type ScheduledReview,
  type WordResponse,
  type WordResult,
} from './types';

// Each locale reads its own translation columns
const TRANSLATION_COLUMNS = {
  en: {
    translation: words.englishTranslation,
    exampleTranslation: words.exampleEnglishTranslation,
  },
  ru: {
    translation: words.russianTranslation,
    exampleTranslation: words.exampleRussianTranslation,
  },
  de: {
    translation: words.germanTranslation,
    exampleTranslation: words.exampleGermanTranslation,
  },
} satisfies Record<Locale, object>;

const randomOrder = sql`random()`;

export class WordStore {
  constructor(private readonly db: Database) {}

  private selectWords(locale: Locale) {
    const columns = TRANSLATION_COLUMNS[locale];
    return this.db
      .select({
        id: words.id,
        word: words.word,
        phoneticClues: words.phoneticClues,
        example: words.example,
        translation: columns.translation,
        exampleTranslation: columns.exampleTranslation,
        easyPeriod: words.easyPeriod,
        normalPeriod: words.normalPeriod,
        hardPeriod: words.hardPeriod,
        extraHardPeriod: words.extraHardPeriod,
      })
      .from(words);
  }

  /** Hydrates ids in the order given; unknown ids are skipped. */
  async getByIds(ids: number[], locale: Locale): Promise<WordResponse[]> {
    if (ids.length === 0) return [];

    const rows = await withStorage('get words', () =>
      this.selectWords(locale).where(inArray(words.id, ids)),
    );
    const byId = new Map(rows.map((row) => [row.id, row]));
    return ids.flatMap((id) => byId.get(id) ?? []);
  }

  async getById(id: number, locale: Locale): Promise<WordResponse | undefined> {
    const [row] = await withStorage('get word', () =>
      this.selectWords(locale).where(eq(words.id, id)).limit(1),
    );
    return row;
  }

  async existingIds(ids: number[]): Promise<Set<number>> {
    if (ids.length === 0) return new Set();

    const rows = await withStorage('validate word ids', () =>
      this.db.select({ id: words.id }).from(words).where(inArray(words.id, ids)),
    );
    return new Set(rows.map((row) => row.id));
  }

  /**
   * Picks up to `limit` word ids outside `excludeIds`: words the user has never
   * reviewed first, then random words among the rest.
   */
  async pickFresh(userId: number, excludeIds: number[], limit: number): Promise<number[]> {
    if (limit <= 0) return [];

    const unseen = await withStorage('get unseen words', () =>
      this.db
        .select({ id: words.id })
        .from(words)
        .leftJoin(
          dictionaryHistory,
          and(eq(dictionaryHistory.wordId, words.id), eq(dictionaryHistory.userId, userId)),
        )
        .where(and(isNull(dictionaryHistory.id), notInArray(words.id, excludeIds)))
        .orderBy(randomOrder)
        .limit(limit),
    );
    const picked = unseen.map((row) => row.id);
    if (picked.length >= limit) return picked;

    const taken = [...excludeIds, ...picked];
    const rest = await withStorage('get random words', () =>
      this.db
        .select({ id: words.id })
        .from(words)
        .where(notInArray(words.id, taken))
        .orderBy(randomOrder)
        .limit(limit - picked.length),
    );
    return [...picked, ...rest.map((row) => row.id)];
  }
}

export class DictionaryHistoryStore {
  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock,
  ) {}

  today(): string {
    return toIsoDate(this.clock());
  }

  /** Word ids whose next appearance has arrived, most overdue first. */
  async getDue(userId: number, limit: number): Promise<number[]> {
    const rows = await withStorage('get due words', () =>
      this.db
        .select({ wordId: dictionaryHistory.wordId })
        .from(dictionaryHistory)
        .where(
          and(
            eq(dictionaryHistory.userId, userId),
            lte(dictionaryHistory.nextAppearance, this.today()),
          ),
        )
        .orderBy(asc(dictionaryHistory.nextAppearance))
        .limit(limit),
    );
    return rows.map((row) => row.wordId);
  }

  /**
   * Schedules each word `period` days from today, creating rows as needed.
   * A word listed twice keeps its last period.
   */
  async upsertResults(userId: number, results: ScheduledReview[]): Promise<void> {
    if (results.length === 0) {
      throw new ValidationError('results list cannot be empty');
    }

    const today = this.today();
    const latest = new Map(results.map((result) => [result.wordId, result.period]));
    const rows = [...latest].map(([wordId, period]) => ({
      userId,
      wordId,
      nextAppearance: addDays(today, period),
    }));

    await withStorage('upsert dictionary history', () =>
      this.db.transaction(async (tx) => {
        await tx
          .insert(dictionaryHistory)
          .values(rows)
          .onConflictDoUpdate({
            target: [dictionaryHistory.userId, dictionaryHistory.wordId],
            set: { nextAppearance: sql`excluded.next_appearance` },
          });
      }),
    );
  }
}

const SessionCountSchema = z.number().int().min(MIN_SESSION_COUNT).max(MAX_SESSION_COUNT);
const PeriodSchema = z.number().int().min(MIN_PERIOD).max(MAX_PERIOD);

export class VocabularyService {
  constructor(
    private readonly wordStore: WordStore,
    private readonly historyStore: DictionaryHistoryStore,
  ) {}

  /**
   * Builds a review session: due words first (most overdue first), then words
   * the user has not seen, topped up with random ones. The slots due words
   * leave unused go to fresh words.
   */
  async buildSession(
    userId: number,
    newCount: number,
    oldCount: number,
    locale: string,
  ): Promise<WordResponse[]> {
    const range = `must be between ${MIN_SESSION_COUNT} and ${MAX_SESSION_COUNT}`;
    ensure(SessionCountSchema, newCount, `newCount ${range}`);
    ensure(SessionCountSchema, oldCount, `oldCount ${range}`);
    const resolvedLocale = parseLocale(locale);

    const dueIds = await this.historyStore.getDue(userId, oldCount);
    const freshIds = await this.wordStore.pickFresh(
      userId,
      dueIds,
      newCount + (oldCount - dueIds.length),
    );

    logger.debug('built vocabulary session', {
      userId,
      due: dueIds.length,
      fresh: freshIds.length,
    });
    return this.wordStore.getByIds([...dueIds, ...freshIds], resolvedLocale);
  }

  async getWord(id: number, locale: string): Promise<WordResponse> {
    ensure(IdSchema, id, 'invalid word id');
    const word = await this.wordStore.getById(id, parseLocale(locale));
    if (!word) throw new NotFoundError(`word ${id} not found`);
    return word;
  }

  /** Validates submitted periods and word ids, then reschedules every word in one batch. */
  async submitResults(userId: number, results: WordResult[]): Promise<void> {
    if (results.length === 0) {
      throw new ValidationError('results list cannot be empty');
    }

    const scheduled = results.map(({ wordId, period }): ScheduledReview => {
      ensure(IdSchema, wordId, `invalid word id: ${wordId}`);
      if (period === undefined) {
        throw new ValidationError(`period is required for word ${wordId}`);
      }
      ensure(PeriodSchema, period, `period must be between ${MIN_PERIOD} and ${MAX_PERIOD}, got: ${period}`);
      return { wordId, period };
    });

    const ids = [...new Set(scheduled.map((result) => result.wordId))];
    const known = await this.wordStore.existingIds(ids);
    const missing = ids.filter((id) => !known.has(id));
    if (missing.length > 0) {
      throw new NotFoundError(`unknown word ids: ${missing.join(', ')}`);
    }

    await this.historyStore.upsertResults(userId, scheduled);
    logger.debug('scheduled word reviews', { userId, count: scheduled.length });
  }
}
