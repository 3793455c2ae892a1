import { and, asc, count, eq, inArray, sql, type SQL } from 'drizzle-orm';
import type { Database } from './db';
import { ValidationError, withStorage } from './errors';
import { DECAY_STEP, clampScore } from './logic';
import { characterLearnHistory, characters } from './schema';
import type {
  MasteryProgress,
  MasteryRecord,
  MasteryScores,
  ScoreField,
  UserHistoryEntry,
} from './types';

const scoreColumns = {
  hiraganaReading: characterLearnHistory.hiraganaReading,
  hiraganaWriting: characterLearnHistory.hiraganaWriting,
  hiraganaListening: characterLearnHistory.hiraganaListening,
  katakanaReading: characterLearnHistory.katakanaReading,
  katakanaWriting: characterLearnHistory.katakanaWriting,
  katakanaListening: characterLearnHistory.katakanaListening,
};

export interface FieldScore {
  characterId: number;
  score: number;
}

const decayed = (column: (typeof scoreColumns)[keyof typeof scoreColumns]) =>
  sql`greatest(0, ${column} - ${DECAY_STEP}::real)`;

/**
 * Per-user, per-character mastery: six scores in [0, 1].
 * A character without a row has never been tested and scores 0 everywhere.
 */
export class MasteryStore {
  constructor(private readonly db: Database) {}

  /**
   * Runs `work` against a store bound to one transaction. Rows read with
   * `lock` stay locked until it commits.
   */
  async transaction<T>(work: (store: MasteryStore) => Promise<T>): Promise<T> {
    return withStorage('mastery transaction', () =>
      this.db.transaction((tx) => work(new MasteryStore(tx))),
    );
  }

  async getScores(
    userId: number,
    characterIds: number[],
    { lock = false }: { lock?: boolean } = {},
  ): Promise<MasteryRecord[]> {
    if (characterIds.length === 0) return [];

    return withStorage('get mastery scores', async () => {
      const query = this.db
        .select({
          userId: characterLearnHistory.userId,
          characterId: characterLearnHistory.characterId,
          ...scoreColumns,
        })
        .from(characterLearnHistory)
        .where(
          and(
            eq(characterLearnHistory.userId, userId),
            inArray(characterLearnHistory.characterId, characterIds),
          ),
        );
      if (lock) return await query.for('update');
      return await query;
    });
  }

  async getUserHistory(userId: number): Promise<UserHistoryEntry[]> {
    return withStorage('get user history', () =>
      this.db
        .select({
          characterId: characters.id,
          characterHiragana: characters.hiragana,
          characterKatakana: characters.katakana,
          ...scoreColumns,
        })
        .from(characterLearnHistory)
        .innerJoin(characters, eq(characterLearnHistory.characterId, characters.id))
        .where(eq(characterLearnHistory.userId, userId))
        .orderBy(asc(characters.id)),
    );
  }

  /**
   * Creates or overwrites every record in one transaction. Scores are clamped to
   * [0, 1]; a (user, character) pair listed twice keeps its last record.
   */
  async upsert(records: MasteryRecord[]): Promise<void> {
    if (records.length === 0) {
      throw new ValidationError('no mastery records to upsert');
    }

    const latest = new Map<string, MasteryRecord>();
    for (const record of records) {
      latest.set(`${record.userId}:${record.characterId}`, record);
    }
    const rows = [...latest.values()].map((record) => ({
      userId: record.userId,
      characterId: record.characterId,
      hiraganaReading: clampScore(record.hiraganaReading),
      hiraganaWriting: clampScore(record.hiraganaWriting),
      hiraganaListening: clampScore(record.hiraganaListening),
      katakanaReading: clampScore(record.katakanaReading),
      katakanaWriting: clampScore(record.katakanaWriting),
      katakanaListening: clampScore(record.katakanaListening),
    }));

    await withStorage('upsert mastery', () =>
      this.db.transaction(async (tx) => {
        await tx
          .insert(characterLearnHistory)
          .values(rows)
          .onConflictDoUpdate({
            target: [characterLearnHistory.userId, characterLearnHistory.characterId],
            set: {
              hiraganaReading: sql`excluded.hiragana_reading`,
              hiraganaWriting: sql`excluded.hiragana_writing`,
              hiraganaListening: sql`excluded.hiragana_listening`,
              katakanaReading: sql`excluded.katakana_reading`,
              katakanaWriting: sql`excluded.katakana_writing`,
              katakanaListening: sql`excluded.katakana_listening`,
            },
          });
      }),
    );
  }

  /**
   * Writes one score field per character. New rows start at 0 elsewhere;
   * existing rows keep every other field as stored.
   */
  async upsertField(userId: number, field: ScoreField, scores: FieldScore[]): Promise<void> {
    if (scores.length === 0) {
      throw new ValidationError('no mastery records to upsert');
    }

    const latest = new Map(scores.map((entry) => [entry.characterId, entry.score]));
    const rows = [...latest].map(([characterId, score]) => {
      const patch: Partial<MasteryScores> = {};
      patch[field] = clampScore(score);
      return { userId, characterId, ...patch };
    });
    const set: Partial<Record<ScoreField, SQL>> = {};
    set[field] = sql`excluded.${sql.identifier(scoreColumns[field].name)}`;

    await withStorage('upsert mastery field', () =>
      this.db
        .insert(characterLearnHistory)
        .values(rows)
        .onConflictDoUpdate({
          target: [characterLearnHistory.userId, characterLearnHistory.characterId],
          set,
        }),
    );
  }

  /** Lowers every score of the user's rows by DECAY_STEP, never below 0. */
  async decay(userId: number): Promise<void> {
    await withStorage('decay mastery', () =>
      this.db
        .update(characterLearnHistory)
        .set({
          hiraganaReading: decayed(characterLearnHistory.hiraganaReading),
          hiraganaWriting: decayed(characterLearnHistory.hiraganaWriting),
          hiraganaListening: decayed(characterLearnHistory.hiraganaListening),
          katakanaReading: decayed(characterLearnHistory.katakanaReading),
          katakanaWriting: decayed(characterLearnHistory.katakanaWriting),
          katakanaListening: decayed(characterLearnHistory.katakanaListening),
        })
        .where(eq(characterLearnHistory.userId, userId)),
    );
  }

  /** Character count and the sum of all six scores over the user's rows. */
  async progress(userId: number): Promise<MasteryProgress> {
    return withStorage('get mastery progress', async () => {
      const [{ total }] = await this.db.select({ total: count() }).from(characters);
      const [{ sum }] = await this.db
        .select({
          sum: sql<number>`coalesce(sum(
            ${characterLearnHistory.hiraganaReading} + ${characterLearnHistory.hiraganaWriting} +
            ${characterLearnHistory.hiraganaListening} + ${characterLearnHistory.katakanaReading} +
            ${characterLearnHistory.katakanaWriting} + ${characterLearnHistory.katakanaListening}
          )::double precision, 0)`.mapWith(Number),
        })
        .from(characterLearnHistory)
        .where(eq(characterLearnHistory.userId, userId));
      return { totalCharacters: total, scoreSum: sum };
    });
  }
}
