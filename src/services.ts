import { CharacterService, CharacterStore } from './characters';
import type { Database } from './db';
import { type Clock, type Random, exponentialBlend, systemClock } from './logic';
import { MasteryStore } from './mastery';
import { TestResultService, type TestResultPolicies } from './test-results';
import { DictionaryHistoryStore, VocabularyService, WordStore } from './vocabulary';
import type { AppServices } from './app';

export interface ServiceOptions extends TestResultPolicies {
  clock?: Clock;
  random?: Random;
  masteryBlendRate?: number;
}

/** Wires the stores and services over one database handle. */
export const createServices = (db: Database, options: ServiceOptions = {}): AppServices => {
  const { clock = systemClock, random = Math.random, masteryBlendRate } = options;
  const characterStore = new CharacterStore(db);

  return {
    vocabulary: new VocabularyService(new WordStore(db), new DictionaryHistoryStore(db, clock)),
    characters: new CharacterService(characterStore, random),
    testResults: new TestResultService(new MasteryStore(db), characterStore, {
      blend:
        options.blend ?? (masteryBlendRate === undefined ? undefined : exponentialBlend(masteryBlendRate)),
      repeatPolicy: options.repeatPolicy,
    }),
  };
};
