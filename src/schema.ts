import {
  pgTable,
  serial,
  text,
  integer,
  real,
  date,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// 1. The Word (vocabulary catalogue, authored elsewhere)
export const words = pgTable('words', {
  id: serial('id').primaryKey(),
  word: text('word').notNull(),
  phoneticClues: text('phonetic_clues').notNull(),
  englishTranslation: text('english_translation').notNull(),
  russianTranslation: text('russian_translation').notNull(),
  germanTranslation: text('german_translation').notNull(),
  example: text('example').notNull(),
  exampleEnglishTranslation: text('example_english_translation').notNull(),
  exampleRussianTranslation: text('example_russian_translation').notNull(),
  exampleGermanTranslation: text('example_german_translation').notNull(),

  // Review tiers, in days
  easyPeriod: integer('easy_period').notNull(),
  normalPeriod: integer('normal_period').notNull(),
  hardPeriod: integer('hard_period').notNull(),
  extraHardPeriod: integer('extra_hard_period').notNull(),
});

// 2. When a user sees a word again. One row per (user, word).
export const dictionaryHistory = pgTable(
  'dictionary_history',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id').notNull(),
    wordId: integer('word_id')
      .references(() => words.id, { onDelete: 'cascade' })
      .notNull(),
    nextAppearance: date('next_appearance', { mode: 'string' }).notNull(),
  },
  (table) => [
    uniqueIndex('dictionary_history_user_word_idx').on(table.userId, table.wordId),
    index('dictionary_history_next_appearance_idx').on(table.nextAppearance),
  ],
);

// 3. Kana characters
export const characters = pgTable('characters', {
  id: serial('id').primaryKey(),
  consonant: text('consonant').notNull(),
  vowel: text('vowel').notNull(),
  hiragana: text('hiragana').notNull(),
  katakana: text('katakana').notNull(),
  englishReading: text('english_reading').notNull(),
  russianReading: text('russian_reading').notNull(),
  audio: text('audio'),
});

// 4. Per-user mastery, six scores in [0, 1]. One row per (user, character).
export const characterLearnHistory = pgTable(
  'character_learn_history',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id').notNull(),
    characterId: integer('character_id')
      .references(() => characters.id, { onDelete: 'cascade' })
      .notNull(),
    hiraganaReading: real('hiragana_reading').default(0).notNull(),
    hiraganaWriting: real('hiragana_writing').default(0).notNull(),
    hiraganaListening: real('hiragana_listening').default(0).notNull(),
    katakanaReading: real('katakana_reading').default(0).notNull(),
    katakanaWriting: real('katakana_writing').default(0).notNull(),
    katakanaListening: real('katakana_listening').default(0).notNull(),
  },
  (table) => [
    uniqueIndex('character_learn_history_user_character_idx').on(table.userId, table.characterId),
    index('character_learn_history_user_idx').on(table.userId),
  ],
);

export const wordsRelations = relations(words, ({ many }) => ({
  history: many(dictionaryHistory),
}));

export const dictionaryHistoryRelations = relations(dictionaryHistory, ({ one }) => ({
  word: one(words, {
    fields: [dictionaryHistory.wordId],
    references: [words.id],
  }),
}));

export const charactersRelations = relations(characters, ({ many }) => ({
  history: many(characterLearnHistory),
}));

export const characterLearnHistoryRelations = relations(characterLearnHistory, ({ one }) => ({
  character: one(characters, {
    fields: [characterLearnHistory.characterId],
    references: [characters.id],
  }),
}));
