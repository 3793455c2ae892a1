import { readFile } from 'node:fs/promises';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import type { Database } from '../src/db';
import type { Clock, Random } from '../src/logic';
import * as schema from '../src/schema';
import { characters, words } from '../src/schema';

export interface TestDatabase {
  db: Database;
  query: <Row>(text: string, params?: unknown[]) => Promise<Row[]>;
  reset: () => Promise<void>;
  close: () => Promise<void>;
}

// In-process Postgres, one per suite
export const createTestDatabase = async (): Promise<TestDatabase> => {
  const client = new PGlite();
  await client.exec(await readFile(new URL('./schema.sql', import.meta.url), 'utf8'));

  return {
    db: drizzle(client, { schema }),
    query: async <Row>(text: string, params?: unknown[]) => (await client.query<Row>(text, params)).rows,
    reset: async () => {
      await client.exec(
        'TRUNCATE words, dictionary_history, characters, character_learn_history RESTART IDENTITY CASCADE',
      );
    },
    close: () => client.close(),
  };
};

/** A clock stuck at noon UTC of the given day. */
export const fixedClock =
  (isoDate: string): Clock =>
  () =>
    new Date(`${isoDate}T12:00:00Z`);

// mulberry32
export const seededRandom = (seed: number): Random => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

type WordInsert = typeof words.$inferInsert;

/** Inserts `count` words numbered from 1; ids follow insertion order. */
export const insertWords = async (
  db: Database,
  count: number,
  overrides: Partial<WordInsert> = {},
): Promise<number[]> => {
  const rows = Array.from({ length: count }, (_, i): WordInsert => ({
    word: `word-${i + 1}`,
    phoneticClues: `clue-${i + 1}`,
    englishTranslation: `english-${i + 1}`,
    russianTranslation: `russian-${i + 1}`,
    germanTranslation: `german-${i + 1}`,
    example: `example-${i + 1}`,
    exampleEnglishTranslation: `example-english-${i + 1}`,
    exampleRussianTranslation: `example-russian-${i + 1}`,
    exampleGermanTranslation: `example-german-${i + 1}`,
    easyPeriod: 2,
    normalPeriod: 5,
    hardPeriod: 10,
    extraHardPeriod: 20,
    ...overrides,
  }));
  const inserted = await db.insert(words).values(rows).returning({ id: words.id });
  return inserted.map((row) => row.id);
};

// Ids 1..5 in this order; only the vowels carry audio
export const SAMPLE_KANA: (typeof characters.$inferInsert)[] = [
  { consonant: '', vowel: 'a', hiragana: 'あ', katakana: 'ア', englishReading: 'a', russianReading: 'а', audio: '/audio/a.mp3' },
  { consonant: '', vowel: 'i', hiragana: 'い', katakana: 'イ', englishReading: 'i', russianReading: 'и', audio: '/audio/i.mp3' },
  { consonant: '', vowel: 'u', hiragana: 'う', katakana: 'ウ', englishReading: 'u', russianReading: 'у', audio: '/audio/u.mp3' },
  { consonant: 'k', vowel: 'a', hiragana: 'か', katakana: 'カ', englishReading: 'ka', russianReading: 'ка', audio: null },
  { consonant: 'k', vowel: 'i', hiragana: 'き', katakana: 'キ', englishReading: 'ki', russianReading: 'ки', audio: null },
];

export const insertCharacters = async (
  db: Database,
  rows: (typeof characters.$inferInsert)[] = SAMPLE_KANA,
): Promise<number[]> => {
  const inserted = await db.insert(characters).values(rows).returning({ id: characters.id });
  return inserted.map((row) => row.id);
};
