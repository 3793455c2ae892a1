import type { MasteryProgress, RepeatFlag, Script, ScoreField, Skill } from './types';

// CONFIGURATION: review tiers are fixed day counts chosen per word by the author,
// the learner picks one of the four after each exposure.
export const MIN_PERIOD = 1;
export const MAX_PERIOD = 30;

export const MIN_SESSION_COUNT = 10;
export const MAX_SESSION_COUNT = 40;

export const DEFAULT_TEST_COUNT = 10;
export const DISTRACTOR_COUNT = 2;

// Applied by every decay run, floored at 0
export const DECAY_STEP = 0.01;

const DAY_MS = 24 * 60 * 60 * 1000;

export type Clock = () => Date;
export type Random = () => number;

export const systemClock: Clock = () => new Date();

// --------------------------------------------------------
// 1. DATES
// --------------------------------------------------------
// Due dates are calendar days in UTC, kept as 'YYYY-MM-DD' strings
// so they compare and store without timezone drift.

export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const addDays = (isoDate: string, days: number): string => {
  const start = Date.parse(`${isoDate}T00:00:00Z`);
  return toIsoDate(new Date(start + days * DAY_MS));
};

// --------------------------------------------------------
// 2. MASTERY SCORES
// --------------------------------------------------------

const SCORE_FIELDS: Record<Script, Record<Skill, ScoreField>> = {
  hiragana: {
    reading: 'hiraganaReading',
    writing: 'hiraganaWriting',
    listening: 'hiraganaListening',
  },
  katakana: {
    reading: 'katakanaReading',
    writing: 'katakanaWriting',
    listening: 'katakanaListening',
  },
};

export const scoreField = (script: Script, skill: Skill): ScoreField => SCORE_FIELDS[script][skill];

export const clampScore = (score: number): number => {
  if (Number.isNaN(score)) return 0;
  return Math.min(1, Math.max(0, score));
};

/** Turns the prior score and one test outcome into the next score. */
export type ScoreBlend = (prior: number, passed: boolean) => number;

// A pass marks the character as known, a fail as unknown
export const replaceWithOutcome: ScoreBlend = (_prior, passed) => (passed ? 1 : 0);

// Moves the score `rate` of the way toward the outcome
export const exponentialBlend =
  (rate: number): ScoreBlend =>
  (prior, passed) =>
    prior + rate * ((passed ? 1 : 0) - prior);

/**
 * Applies a blend and holds it to the contract every blend must honour:
 * a pass never lowers the prior score, a fail never raises it.
 */
export const applyOutcome = (prior: number, passed: boolean, blend: ScoreBlend): number => {
  const start = clampScore(prior);
  const next = clampScore(blend(start, passed));
  return passed ? Math.max(start, next) : Math.min(start, next);
};

// --------------------------------------------------------
// 3. REPEAT PROMPT
// --------------------------------------------------------

export interface RepeatPolicyContext {
  userId: number;
  repeatFlag: RepeatFlag;
  loadProgress: () => Promise<MasteryProgress>;
}

/** Decides whether the client should ask the learner about re-queuing the alphabet. */
export type RepeatPolicy = (context: RepeatPolicyContext) => Promise<boolean>;

const SCORES_PER_CHARACTER = 6;
const COMPLETION_TOLERANCE = 0.001;

// Ask once every character holds a full score in all six categories,
// and only while the learner has not answered yet.
export const askWhenAlphabetComplete: RepeatPolicy = async ({ repeatFlag, loadProgress }) => {
  if (repeatFlag !== 'in question') return false;

  const { totalCharacters, scoreSum } = await loadProgress();
  if (totalCharacters === 0) return false;

  const expected = totalCharacters * SCORES_PER_CHARACTER;
  return Math.abs(scoreSum - expected) <= COMPLETION_TOLERANCE;
};

// --------------------------------------------------------
// 4. RANDOM PICKS
// --------------------------------------------------------

export const shuffle = <T>(items: readonly T[], random: Random): T[] => {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
};

/**
 * Draws up to `count` distinct glyphs from the pool, none equal to `correct`.
 * Returns fewer when the pool cannot supply enough.
 */
export const pickDistractors = (
  pool: readonly string[],
  correct: string,
  random: Random,
  count: number = DISTRACTOR_COUNT,
): string[] => {
  const candidates = [...new Set(pool)].filter((glyph) => glyph !== '' && glyph !== correct);
  return shuffle(candidates, random).slice(0, count);
};
