import { z } from 'zod';
import { ensure } from './errors';

export const LOCALES = ['en', 'ru', 'de'] as const;
export type Locale = (typeof LOCALES)[number];
export const LocaleSchema = z.enum(LOCALES);

export const SCRIPTS = ['hiragana', 'katakana'] as const;
export type Script = (typeof SCRIPTS)[number];
export const ScriptSchema = z.enum(SCRIPTS);

export const SKILLS = ['reading', 'writing', 'listening'] as const;
export type Skill = (typeof SKILLS)[number];
export const SkillSchema = z.enum(SKILLS);

// Whether the learner wants the alphabet re-queued once everything is mastered
export const REPEAT_FLAGS = ['in question', 'ignore', 'repeat'] as const;
export type RepeatFlag = (typeof REPEAT_FLAGS)[number];
export const RepeatFlagSchema = z.enum(REPEAT_FLAGS);

// Ids and user ids are int4 columns
export const MAX_ID = 2_147_483_647;
export const IdSchema = z.number().int().positive().max(MAX_ID);

export const parseLocale = (locale: string): Locale =>
  ensure(LocaleSchema, locale, `invalid locale: ${locale}, must be 'en', 'ru', or 'de'`);

export const parseScript = (script: string): Script =>
  ensure(ScriptSchema, script.toLowerCase(), `invalid script: ${script}, must be 'hiragana' or 'katakana'`);

export const parseSkill = (skill: string): Skill =>
  ensure(SkillSchema, skill.toLowerCase(), `invalid skill: ${skill}, must be 'reading', 'writing', or 'listening'`);

export const parseRepeatFlag = (flag: string): RepeatFlag =>
  ensure(RepeatFlagSchema, flag, `invalid repeat flag: ${flag}, must be 'in question', 'ignore', or 'repeat'`);

// --- Vocabulary ---

export interface WordResponse {
  id: number;
  word: string;
  phoneticClues: string;
  example: string;
  translation: string;
  exampleTranslation: string;
  easyPeriod: number;
  normalPeriod: number;
  hardPeriod: number;
  extraHardPeriod: number;
}

// What a client submits; `period` stays optional so a missing value never reads as 0
export interface WordResult {
  wordId: number;
  period?: number;
}

export interface ScheduledReview {
  wordId: number;
  period: number;
}

// --- Characters ---

export interface MasteryScores {
  hiraganaReading: number;
  hiraganaWriting: number;
  hiraganaListening: number;
  katakanaReading: number;
  katakanaWriting: number;
  katakanaListening: number;
}

export type ScoreField = keyof MasteryScores;

export interface MasteryRecord extends MasteryScores {
  userId: number;
  characterId: number;
}

export interface UserHistoryEntry extends MasteryScores {
  characterId: number;
  characterHiragana: string;
  characterKatakana: string;
}

export interface MasteryProgress {
  totalCharacters: number;
  scoreSum: number;
}

export interface CharacterResponse {
  id: number;
  consonant: string;
  vowel: string;
  character: string;
  reading: string;
}

export interface CharacterDetails {
  id: number;
  consonant: string;
  vowel: string;
  hiragana: string;
  katakana: string;
  reading: string;
  audio: string | null;
}

export interface ReadingTestItem {
  id: number;
  reading: string;
  correctChar: string;
  wrongOptions: string[];
}

export interface ListeningTestItem {
  id: number;
  audioUrl: string;
  correctChar: string;
  wrongOptions: string[];
}

export interface WritingTestItem {
  id: number;
  character: string;
  correctReading: string;
}

export type TestItem = ReadingTestItem | ListeningTestItem | WritingTestItem;

export interface TestResultItem {
  characterId: number;
  passed: boolean;
}

export interface SubmitTestResultsResult {
  askForRepeat: boolean;
}
