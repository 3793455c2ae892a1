import type { CharacterStore } from './characters';
import { NotFoundError, ValidationError, ensure } from './errors';
import { logger } from './logger';
import type { MasteryStore } from './mastery';
import {
  applyOutcome,
  askWhenAlphabetComplete,
  replaceWithOutcome,
  scoreField,
  type RepeatPolicy,
  type ScoreBlend,
} from './logic';
import {
  IdSchema,
  parseRepeatFlag,
  parseScript,
  parseSkill,
  type SubmitTestResultsResult,
  type TestResultItem,
  type UserHistoryEntry,
} from './types';

export interface TestResultPolicies {
  blend?: ScoreBlend;
  repeatPolicy?: RepeatPolicy;
}

export class TestResultService {
  private readonly blend: ScoreBlend;
  private readonly repeatPolicy: RepeatPolicy;

  constructor(
    private readonly mastery: MasteryStore,
    private readonly characterStore: CharacterStore,
    policies: TestResultPolicies = {},
  ) {
    this.blend = policies.blend ?? replaceWithOutcome;
    this.repeatPolicy = policies.repeatPolicy ?? askWhenAlphabetComplete;
  }

  /**
   * Records pass/fail outcomes for one script and skill. Only that one score
   * moves per character; all rows are written in a single batch.
   */
  async submitResults(
    userId: number,
    script: string,
    skill: string,
    results: TestResultItem[],
    repeat: string = 'in question',
  ): Promise<SubmitTestResultsResult> {
    const field = scoreField(parseScript(script), parseSkill(skill));
    const repeatFlag = parseRepeatFlag(repeat);
    if (results.length === 0) {
      throw new ValidationError('results array cannot be empty');
    }
    for (const { characterId } of results) {
      ensure(IdSchema, characterId, `invalid character id: ${characterId}`);
    }

    const ids = [...new Set(results.map((result) => result.characterId))];
    const known = await this.characterStore.existingIds(ids);
    const missing = ids.filter((id) => !known.has(id));
    if (missing.length > 0) {
      throw new NotFoundError(`unknown character ids: ${missing.join(', ')}`);
    }

    // Read and write under one transaction, touching only `field`
    const written = await this.mastery.transaction(async (store) => {
      const priors = new Map(
        (await store.getScores(userId, ids, { lock: true })).map((record) => [
          record.characterId,
          record[field],
        ]),
      );
      // Repeated ids apply in submission order; untested characters start at 0
      for (const { characterId, passed } of results) {
        priors.set(characterId, applyOutcome(priors.get(characterId) ?? 0, passed, this.blend));
      }
      const scores = [...priors].map(([characterId, score]) => ({ characterId, score }));
      await store.upsertField(userId, field, scores);
      return scores.length;
    });
    logger.debug('stored test results', { userId, field, count: written });

    const askForRepeat = await this.repeatPolicy({
      userId,
      repeatFlag,
      loadProgress: () => this.mastery.progress(userId),
    });
    return { askForRepeat };
  }

  async getUserHistory(userId: number): Promise<UserHistoryEntry[]> {
    return this.mastery.getUserHistory(userId);
  }

  /** Lowers every mastery score of the user by one decay step. No rows is not an error. */
  async dropMarks(userId: number): Promise<void> {
    ensure(IdSchema, userId, `invalid user id: ${userId}`);
    await this.mastery.decay(userId);
    logger.info('dropped user marks', { userId });
  }
}
