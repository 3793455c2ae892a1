import { and, asc, eq, inArray, isNotNull, isNull, ne, or, sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from './db';
import { NotFoundError, ValidationError, ensure, withStorage } from './errors';
import { logger } from './logger';
import {
  DEFAULT_TEST_COUNT,
  DISTRACTOR_COUNT,
  pickDistractors,
  scoreField,
  type Random,
} from './logic';
import { characterLearnHistory, characters } from './schema';
import {
  IdSchema,
  parseLocale,
  parseScript,
  parseSkill,
  type CharacterDetails,
  type CharacterResponse,
  type Locale,
  type ListeningTestItem,
  type ReadingTestItem,
  type Script,
  type ScoreField,
  type TestItem,
  type WritingTestItem,
} from './types';

const GLYPH_COLUMNS = {
  hiragana: characters.hiragana,
  katakana: characters.katakana,
} satisfies Record<Script, object>;

// Characters carry no German reading, "de" reads the English one
const READING_COLUMNS = {
  en: characters.englishReading,
  ru: characters.russianReading,
  de: characters.englishReading,
} satisfies Record<Locale, object>;

const randomOrder = sql`random()`;

type CharacterRow = typeof characters.$inferSelect;

export interface RankOptions {
  userId: number;
  script: Script;
  withAudio: boolean;
  limit: number;
}

const hasAudio = and(isNotNull(characters.audio), ne(characters.audio, ''));

const testable = (script: Script, withAudio: boolean): SQL | undefined =>
  and(ne(GLYPH_COLUMNS[script], ''), withAudio ? hasAudio : undefined);

export class CharacterStore {
  constructor(private readonly db: Database) {}

  private selectResponses(script: Script, locale: Locale) {
    return this.db
      .select({
        id: characters.id,
        consonant: characters.consonant,
        vowel: characters.vowel,
        character: GLYPH_COLUMNS[script],
        reading: READING_COLUMNS[locale],
      })
      .from(characters);
  }

  async list(script: Script, locale: Locale): Promise<CharacterResponse[]> {
    return withStorage('list characters', () =>
      this.selectResponses(script, locale).orderBy(asc(characters.id)),
    );
  }

  /** Characters of one consonant row or vowel column. */
  async listByGroup(script: Script, locale: Locale, group: string): Promise<CharacterResponse[]> {
    return withStorage('list characters by group', () =>
      this.selectResponses(script, locale)
        .where(or(eq(characters.consonant, group), eq(characters.vowel, group)))
        .orderBy(asc(characters.id)),
    );
  }

  async getById(id: number): Promise<CharacterRow | undefined> {
    const [row] = await withStorage('get character', () =>
      this.db.select().from(characters).where(eq(characters.id, id)).limit(1),
    );
    return row;
  }

  async getByIds(ids: number[]): Promise<CharacterRow[]> {
    if (ids.length === 0) return [];

    return withStorage('get characters', () =>
      this.db.select().from(characters).where(inArray(characters.id, ids)),
    );
  }

  async existingIds(ids: number[]): Promise<Set<number>> {
    if (ids.length === 0) return new Set();

    const rows = await withStorage('validate character ids', () =>
      this.db.select({ id: characters.id }).from(characters).where(inArray(characters.id, ids)),
    );
    return new Set(rows.map((row) => row.id));
  }

  /** Testable characters the user has no mastery row for, in random order. */
  async rankUnseen({ userId, script, withAudio, limit }: RankOptions): Promise<number[]> {
    const rows = await withStorage('get untested characters', () =>
      this.db
        .select({ id: characters.id })
        .from(characters)
        .leftJoin(
          characterLearnHistory,
          and(
            eq(characterLearnHistory.characterId, characters.id),
            eq(characterLearnHistory.userId, userId),
          ),
        )
        .where(and(isNull(characterLearnHistory.id), testable(script, withAudio)))
        .orderBy(randomOrder)
        .limit(limit),
    );
    return rows.map((row) => row.id);
  }

  /** Tested characters, weakest `field` score first, ties in random order. */
  async rankWeakest(options: RankOptions & { field: ScoreField }): Promise<number[]> {
    const { userId, script, withAudio, limit, field } = options;
    const rows = await withStorage('get weakest characters', () =>
      this.db
        .select({ id: characters.id })
        .from(characters)
        .innerJoin(
          characterLearnHistory,
          and(
            eq(characterLearnHistory.characterId, characters.id),
            eq(characterLearnHistory.userId, userId),
          ),
        )
        .where(testable(script, withAudio))
        .orderBy(asc(characterLearnHistory[field]), randomOrder)
        .limit(limit),
    );
    return rows.map((row) => row.id);
  }

  /** Every glyph of the script a distractor may be drawn from. */
  async glyphPool(script: Script, withAudio: boolean): Promise<string[]> {
    const glyph = GLYPH_COLUMNS[script];
    const rows = await withStorage('get distractor pool', () =>
      this.db.select({ glyph }).from(characters).where(testable(script, withAudio)),
    );
    return rows.map((row) => row.glyph);
  }
}

const CountSchema = z.number().int().positive();

const readingOf = (row: CharacterRow, locale: Locale): string =>
  locale === 'ru' ? row.russianReading : row.englishReading;

const toDetails = (row: CharacterRow, locale: Locale): CharacterDetails => ({
  id: row.id,
  consonant: row.consonant,
  vowel: row.vowel,
  hiragana: row.hiragana,
  katakana: row.katakana,
  reading: readingOf(row, locale),
  audio: row.audio,
});

export class CharacterService {
  constructor(
    private readonly store: CharacterStore,
    private readonly random: Random = Math.random,
  ) {}

  async listCharacters(script: string, locale: string): Promise<CharacterResponse[]> {
    return this.store.list(parseScript(script), parseLocale(locale));
  }

  async listByRowColumn(script: string, locale: string, group: string): Promise<CharacterResponse[]> {
    const resolvedScript = parseScript(script);
    const resolvedLocale = parseLocale(locale);
    if (group.trim() === '') {
      throw new ValidationError('character parameter is required');
    }
    return this.store.listByGroup(resolvedScript, resolvedLocale, group.trim());
  }

  async getCharacter(id: number, locale: string): Promise<CharacterDetails> {
    ensure(IdSchema, id, 'invalid character id');
    const resolvedLocale = parseLocale(locale);
    const row = await this.store.getById(id);
    if (!row) throw new NotFoundError(`character ${id} not found`);
    return toDetails(row, resolvedLocale);
  }

  /**
   * Builds a test of up to `count` characters: never-tested ones first, then
   * the weakest for this script and skill. Reading and listening items carry
   * two distractor glyphs; writing items ask for the reading of a glyph.
   */
  async buildTest(
    userId: number,
    script: string,
    skill: string,
    locale: string,
    count: number = DEFAULT_TEST_COUNT,
  ): Promise<TestItem[]> {
    const resolvedScript = parseScript(script);
    const resolvedSkill = parseSkill(skill);
    const resolvedLocale = parseLocale(locale);
    ensure(CountSchema, count, 'count must be a positive integer');

    const ranking: RankOptions = {
      userId,
      script: resolvedScript,
      withAudio: resolvedSkill === 'listening',
      limit: count,
    };
    const ids = await this.store.rankUnseen(ranking);
    if (ids.length < count) {
      const weakest = await this.store.rankWeakest({
        ...ranking,
        limit: count - ids.length,
        field: scoreField(resolvedScript, resolvedSkill),
      });
      ids.push(...weakest);
    }

    const byId = new Map((await this.store.getByIds(ids)).map((row) => [row.id, row]));
    const rows = ids.flatMap((id) => byId.get(id) ?? []);
    const glyph = (row: CharacterRow) => row[resolvedScript];

    logger.debug('built character test', {
      userId,
      script: resolvedScript,
      skill: resolvedSkill,
      count: rows.length,
    });

    if (resolvedSkill === 'writing') {
      return rows.map(
        (row): WritingTestItem => ({
          id: row.id,
          character: glyph(row),
          correctReading: readingOf(row, resolvedLocale),
        }),
      );
    }

    const pool = await this.store.glyphPool(resolvedScript, ranking.withAudio);
    const distractorsFor = (correct: string): string[] => {
      const options = pickDistractors(pool, correct, this.random);
      if (options.length < DISTRACTOR_COUNT) {
        throw new NotFoundError(`not enough ${resolvedScript} characters to draw distractors`);
      }
      return options;
    };

    if (resolvedSkill === 'listening') {
      return rows.flatMap((row): ListeningTestItem[] =>
        row.audio
          ? [
              {
                id: row.id,
                audioUrl: row.audio,
                correctChar: glyph(row),
                wrongOptions: distractorsFor(glyph(row)),
              },
            ]
          : [],
      );
    }

    return rows.map(
      (row): ReadingTestItem => ({
        id: row.id,
        reading: readingOf(row, resolvedLocale),
        correctChar: glyph(row),
        wrongOptions: distractorsFor(glyph(row)),
      }),
    );
  }
}
