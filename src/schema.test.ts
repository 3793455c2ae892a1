import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core';
import { createTestDatabase, type TestDatabase } from '../test/helpers';
import { characterLearnHistory, characters, dictionaryHistory, words } from './schema';

interface ColumnInfo {
  column_name: string;
  data_type: string;
  is_nullable: 'YES' | 'NO';
}

interface IndexInfo {
  indexname: string;
  indexdef: string;
}

// information_schema reports a serial as the integer it expands to
const sqlType = (declared: string): string => (declared === 'serial' ? 'integer' : declared);

describe('test/schema.sql', () => {
  let testDb: TestDatabase;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

  describe.each<[string, PgTable]>([
    ['words', words],
    ['dictionary_history', dictionaryHistory],
    ['characters', characters],
    ['character_learn_history', characterLearnHistory],
  ])('%s', (name, table) => {
    const config = getTableConfig(table);

    it('declares the same columns as the drizzle table', async () => {
      const columns = await testDb.query<ColumnInfo>(
        `SELECT column_name, data_type, is_nullable FROM information_schema.columns
         WHERE table_name = $1`,
        [name],
      );

      const expected = config.columns
        .map((column) => ({
          column_name: column.name,
          data_type: sqlType(column.getSQLType()),
          is_nullable: column.notNull ? 'NO' : 'YES',
        }))
        .sort((a, b) => byName(a.column_name, b.column_name));
      expect([...columns].sort((a, b) => byName(a.column_name, b.column_name))).toEqual(expected);
    });

    it('declares the same indexes as the drizzle table', async () => {
      const indexes = await testDb.query<IndexInfo>(
        `SELECT indexname, indexdef FROM pg_indexes WHERE tablename = $1 AND indexname <> $2`,
        [name, `${name}_pkey`],
      );

      const declared = config.indexes.map((index) => ({
        name: index.config.name ?? '',
        unique: index.config.unique === true,
      }));
      expect(
        indexes
          .map((index) => ({ name: index.indexname, unique: index.indexdef.startsWith('CREATE UNIQUE') }))
          .sort((a, b) => byName(a.name, b.name)),
      ).toEqual(declared.sort((a, b) => byName(a.name, b.name)));
    });

    it('declares the same foreign keys as the drizzle table', async () => {
      const references = await testDb.query<{ column_name: string; foreign_table: string }>(
        `SELECT kcu.column_name, ccu.table_name AS foreign_table
         FROM information_schema.table_constraints tc
         JOIN information_schema.key_column_usage kcu ON tc.constraint_name = kcu.constraint_name
         JOIN information_schema.constraint_column_usage ccu ON tc.constraint_name = ccu.constraint_name
         WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_name = $1`,
        [name],
      );

      expect(references).toEqual(
        config.foreignKeys.map((key) => {
          const { columns, foreignTable } = key.reference();
          return {
            column_name: columns[0].name,
            foreign_table: getTableConfig(foreignTable).name,
          };
        }),
      );
    });
  });
});
