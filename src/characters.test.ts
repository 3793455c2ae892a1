import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createTestDatabase, insertCharacters, seededRandom, type TestDatabase } from '../test/helpers';
import { CharacterService, CharacterStore } from './characters';
import { NotFoundError, ValidationError } from './errors';
import { MasteryStore } from './mastery';
import type { ListeningTestItem, MasteryRecord, ReadingTestItem, TestItem, WritingTestItem } from './types';

const untested = (userId: number, characterId: number): MasteryRecord => ({
  userId,
  characterId,
  hiraganaReading: 0,
  hiraganaWriting: 0,
  hiraganaListening: 0,
  katakanaReading: 0,
  katakanaWriting: 0,
  katakanaListening: 0,
});

const isReading = (item: TestItem): item is ReadingTestItem => 'reading' in item;
const isListening = (item: TestItem): item is ListeningTestItem => 'audioUrl' in item;
const isWriting = (item: TestItem): item is WritingTestItem => 'correctReading' in item;

describe('characters', () => {
  let testDb: TestDatabase;
  let mastery: MasteryStore;
  let service: CharacterService;

  beforeAll(async () => {
    testDb = await createTestDatabase();
    mastery = new MasteryStore(testDb.db);
    service = new CharacterService(new CharacterStore(testDb.db), seededRandom(42));
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await testDb.reset();
    await insertCharacters(testDb.db);
  });

  describe('catalogue', () => {
    it('lists every character in the requested script and locale', async () => {
      const list = await service.listCharacters('katakana', 'ru');
      expect(list).toHaveLength(5);
      expect(list[3]).toEqual({ id: 4, consonant: 'k', vowel: 'a', character: 'カ', reading: 'ка' });
    });

    it('accepts the script in any case', async () => {
      const [first] = await service.listCharacters('HIRAGANA', 'en');
      expect(first.character).toBe('あ');
    });

    it('lists a consonant row or a vowel column', async () => {
      const row = await service.listByRowColumn('hiragana', 'en', 'k');
      expect(row.map((character) => character.character)).toEqual(['か', 'き']);

      const column = await service.listByRowColumn('hiragana', 'en', 'a');
      expect(column.map((character) => character.character)).toEqual(['あ', 'か']);
    });

    it('requires a row or column', async () => {
      await expect(service.listByRowColumn('hiragana', 'en', ' ')).rejects.toThrow(
        new ValidationError('character parameter is required'),
      );
    });

    it('reads the English reading for German', async () => {
      expect(await service.getCharacter(4, 'de')).toEqual({
        id: 4,
        consonant: 'k',
        vowel: 'a',
        hiragana: 'か',
        katakana: 'カ',
        reading: 'ka',
        audio: null,
      });
    });

    it('reports a missing character', async () => {
      await expect(service.getCharacter(99, 'en')).rejects.toThrow(new NotFoundError('character 99 not found'));
    });

    it('rejects an unknown script or locale', async () => {
      await expect(service.listCharacters('kanji', 'en')).rejects.toBeInstanceOf(ValidationError);
      await expect(service.listCharacters('hiragana', 'fr')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('buildTest', () => {
    it('builds reading items with two distinct distractors', async () => {
      const items = await service.buildTest(1, 'hiragana', 'reading', 'en', 3);
      expect(items).toHaveLength(3);

      const glyphs = ['あ', 'い', 'う', 'か', 'き'];
      for (const item of items) {
        if (!isReading(item)) throw new Error('expected a reading item');
        expect(item.wrongOptions).toHaveLength(2);
        expect(new Set(item.wrongOptions).size).toBe(2);
        expect(item.wrongOptions).not.toContain(item.correctChar);
        for (const option of item.wrongOptions) expect(glyphs).toContain(option);
      }
    });

    it('puts untested characters first, then the weakest', async () => {
      await mastery.upsert([
        { ...untested(1, 3), hiraganaReading: 0.2 },
        { ...untested(1, 4), hiraganaReading: 0.9 },
        { ...untested(1, 5), hiraganaReading: 0.5 },
      ]);

      const items = await service.buildTest(1, 'hiragana', 'reading', 'en', 4);
      const ids = items.map((item) => item.id);
      expect(ids.slice(0, 2).sort((a, b) => a - b)).toEqual([1, 2]);
      expect(ids.slice(2)).toEqual([3, 5]);
    });

    it('ranks by the score of the requested script and skill only', async () => {
      await mastery.upsert([1, 2, 3, 4, 5].map((id) => ({
        ...untested(1, id),
        katakanaWriting: id === 4 ? 0 : 1,
        hiraganaWriting: id === 4 ? 1 : 0,
      })));

      const [weakest] = await service.buildTest(1, 'katakana', 'writing', 'en', 1);
      expect(weakest.id).toBe(4);
    });

    it('builds writing items without distractors', async () => {
      const items = await service.buildTest(1, 'katakana', 'writing', 'ru', 5);
      expect(items).toHaveLength(5);

      const item = items.find((candidate) => candidate.id === 5);
      expect(item).toEqual({ id: 5, character: 'キ', correctReading: 'ки' });
      expect(items.every(isWriting)).toBe(true);
    });

    it('only uses characters with audio for listening', async () => {
      const items = await service.buildTest(1, 'hiragana', 'listening', 'en', 10);
      expect(items.map((item) => item.id).sort((a, b) => a - b)).toEqual([1, 2, 3]);

      for (const item of items) {
        if (!isListening(item)) throw new Error('expected a listening item');
        expect(item.audioUrl).toMatch(/^\/audio\//);
        // three voiced glyphs: the other two are always the distractors
        expect([...item.wrongOptions].sort()).toEqual(
          ['あ', 'い', 'う'].filter((glyph) => glyph !== item.correctChar).sort(),
        );
      }
    });

    it('fails when the pool cannot supply two distractors', async () => {
      await testDb.reset();
      await insertCharacters(testDb.db, [
        { consonant: '', vowel: 'a', hiragana: 'あ', katakana: 'ア', englishReading: 'a', russianReading: 'а', audio: null },
        { consonant: '', vowel: 'i', hiragana: 'い', katakana: 'イ', englishReading: 'i', russianReading: 'и', audio: null },
      ]);

      await expect(service.buildTest(1, 'hiragana', 'reading', 'en', 2)).rejects.toThrow(
        new NotFoundError('not enough hiragana characters to draw distractors'),
      );
    });

    it('rejects a count that is not a positive integer', async () => {
      await expect(service.buildTest(1, 'hiragana', 'reading', 'en', 0)).rejects.toThrow(
        'count must be a positive integer',
      );
      await expect(service.buildTest(1, 'hiragana', 'reading', 'en', 1.5)).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it('rejects an unknown script or skill', async () => {
      await expect(service.buildTest(1, 'kanji', 'reading', 'en')).rejects.toBeInstanceOf(ValidationError);
      await expect(service.buildTest(1, 'hiragana', 'speaking', 'en')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
