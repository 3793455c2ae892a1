import fs from 'node:fs/promises';
import { count, sql } from 'drizzle-orm';
import { z } from 'zod';
import { loadConfig } from './config';
import { connectDatabase, type Database } from './db';
import { logger } from './logger';
import { MAX_PERIOD, MIN_PERIOD } from './logic';
import { characters, words } from './schema';

const CHUNK_SIZE = 500;

const Period = z.number().int().min(MIN_PERIOD).max(MAX_PERIOD);

const CharacterSeed = z.object({
  consonant: z.string(),
  vowel: z.string(),
  hiragana: z.string(),
  katakana: z.string(),
  englishReading: z.string().min(1),
  russianReading: z.string().min(1),
  audio: z.string().nullable(),
});

const WordSeed = z.object({
  word: z.string().min(1),
  phoneticClues: z.string(),
  englishTranslation: z.string(),
  russianTranslation: z.string(),
  germanTranslation: z.string(),
  example: z.string(),
  exampleEnglishTranslation: z.string(),
  exampleRussianTranslation: z.string(),
  exampleGermanTranslation: z.string(),
  easyPeriod: Period,
  normalPeriod: Period,
  hardPeriod: Period,
  extraHardPeriod: Period,
});

const readSeed = async <T>(file: string, schema: z.ZodType<T>): Promise<T[]> => {
  const raw = await fs.readFile(new URL(`../data/${file}`, import.meta.url), 'utf8');
  const parsed = z.array(schema).safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new Error(`${file}: ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
};

interface SeedTarget<Row> {
  label: string;
  countExisting: () => Promise<number>;
  insert: (chunk: Row[]) => Promise<unknown>;
}

async function seedTable<Row>({ label, countExisting, insert }: SeedTarget<Row>, rows: Row[]) {
  const existing = await countExisting();
  if (existing > 0) {
    logger.info(`${label} already seeded, skipping`, { existing });
    return;
  }

  for (let i = 0; i < rows.length; i += CHUNK_SIZE) {
    await insert(rows.slice(i, i + CHUNK_SIZE));
  }
  logger.info(`inserted ${rows.length} ${label}`);
}

const countRows = async (db: Database, table: typeof words | typeof characters): Promise<number> => {
  const [{ total }] = await db.select({ total: count() }).from(table);
  return total;
};

async function main() {
  const reset = process.argv.includes('--reset');
  const config = loadConfig();
  const { db, close } = connectDatabase(config.databaseUrl);

  try {
    if (reset) {
      logger.warn('clearing catalogue and learner history');
      await db.execute(sql`TRUNCATE TABLE ${words}, ${characters} RESTART IDENTITY CASCADE`);
    }

    await seedTable(
      {
        label: 'characters',
        countExisting: () => countRows(db, characters),
        insert: (chunk) => db.insert(characters).values(chunk),
      },
      await readSeed('characters.json', CharacterSeed),
    );
    await seedTable(
      {
        label: 'words',
        countExisting: () => countRows(db, words),
        insert: (chunk) => db.insert(words).values(chunk),
      },
      await readSeed('words.json', WordSeed),
    );
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  logger.error('seed failed', { error });
  process.exitCode = 1;
});
