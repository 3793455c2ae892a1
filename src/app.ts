import { Elysia, t } from 'elysia';
import cors from '@elysiajs/cors';
import type { CharacterService } from './characters';
import { AppError, StorageError, UnauthorizedError } from './errors';
import { logger } from './logger';
import { MAX_ID } from './types';
import type { TestResultService } from './test-results';
import type { VocabularyService } from './vocabulary';

export interface AppServices {
  vocabulary: VocabularyService;
  characters: CharacterService;
  testResults: TestResultService;
}

export interface AppOptions {
  maintenanceApiKey?: string;
}

type RequestHeaders = Record<string, string | undefined>;

// Upstream auth middleware forwards the authenticated user as a header
const requireUser = (headers: RequestHeaders): number => {
  const raw = headers['x-user-id'];
  const userId = Number(raw);
  if (!raw || !Number.isInteger(userId) || userId <= 0 || userId > MAX_ID) {
    throw new UnauthorizedError('user ID not found in request');
  }
  return userId;
};

const LocaleQuery = t.Optional(t.String());

export const createApp = (
  { vocabulary, characters, testResults }: AppServices,
  { maintenanceApiKey }: AppOptions = {},
) =>
  new Elysia()
    .use(cors())

    .onError(({ code, error, set, path }) => {
      if (error instanceof AppError) {
        set.status = error.status;
        if (error instanceof StorageError) {
          logger.error(error.message, { path, cause: error.cause });
        } else {
          logger.warn(error.message, { path, code: error.code });
        }
        return { error: error.message };
      }

      if (code === 'VALIDATION' || code === 'PARSE') {
        set.status = 400;
        return { error: 'invalid request' };
      }
      if (code === 'NOT_FOUND') {
        set.status = 404;
        return { error: 'route not found' };
      }

      logger.error('unhandled error', { path, error });
      set.status = 500;
      return { error: 'internal server error' };
    })

    .onAfterResponse(({ request, path, set }) => {
      logger.http(`${request.method} ${path}`, { status: set.status });
    })

    .get('/health', () => ({ status: 'ok' }))

    // --- Character catalogue ---
    .get(
      '/characters',
      ({ query }) => characters.listCharacters(query.type ?? 'hiragana', query.locale ?? 'en'),
      { query: t.Object({ type: t.Optional(t.String()), locale: LocaleQuery }) },
    )
    .get(
      '/characters/row-column',
      ({ query }) =>
        characters.listByRowColumn(query.type ?? 'hiragana', query.locale ?? 'en', query.character ?? ''),
      {
        query: t.Object({
          type: t.Optional(t.String()),
          locale: LocaleQuery,
          character: t.Optional(t.String()),
        }),
      },
    )
    .get(
      '/characters/:id',
      ({ params, query }) => characters.getCharacter(params.id, query.locale ?? 'en'),
      { params: t.Object({ id: t.Numeric() }), query: t.Object({ locale: LocaleQuery }) },
    )

    // --- Character tests ---
    .get(
      '/tests/:type/:skill',
      ({ headers, params, query }) =>
        characters.buildTest(requireUser(headers), params.type, params.skill, query.locale ?? 'en', query.count),
      {
        params: t.Object({ type: t.String(), skill: t.String() }),
        query: t.Object({ locale: LocaleQuery, count: t.Optional(t.Numeric()) }),
      },
    )
    .post(
      '/test-results/:type/:skill',
      async ({ headers, params, body }) => {
        const { askForRepeat } = await testResults.submitResults(
          requireUser(headers),
          params.type,
          params.skill,
          body.results,
          body.repeat,
        );
        return { message: 'test results submitted successfully', askForRepeat };
      },
      {
        params: t.Object({ type: t.String(), skill: t.String() }),
        body: t.Object({
          results: t.Array(t.Object({ characterId: t.Integer(), passed: t.Boolean() })),
          repeat: t.Optional(t.String()),
        }),
      },
    )
    .get('/test-results/history', ({ headers }) => testResults.getUserHistory(requireUser(headers)))

    // --- Maintenance, called by a scheduler with the service API key ---
    .post(
      '/maintenance/drop-marks/:userId',
      async ({ params }) => {
        await testResults.dropMarks(params.userId);
        return { message: 'marks dropped successfully' };
      },
      {
        params: t.Object({ userId: t.Numeric() }),
        beforeHandle: ({ headers }) => {
          const provided = headers['x-api-key'];
          if (!maintenanceApiKey || !provided || provided !== maintenanceApiKey) {
            throw new UnauthorizedError('invalid or missing API key');
          }
        },
      },
    )

    // --- Vocabulary ---
    .get(
      '/words',
      ({ headers, query }) =>
        vocabulary.buildSession(requireUser(headers), query.newCount, query.oldCount, query.locale ?? 'en'),
      {
        query: t.Object({ newCount: t.Numeric(), oldCount: t.Numeric(), locale: LocaleQuery }),
      },
    )
    .get(
      '/words/:id',
      ({ params, query }) => vocabulary.getWord(params.id, query.locale ?? 'en'),
      { params: t.Object({ id: t.Numeric() }), query: t.Object({ locale: LocaleQuery }) },
    )
    .post(
      '/words/results',
      async ({ headers, body }) => {
        await vocabulary.submitResults(requireUser(headers), body.results);
        return { message: 'results submitted successfully' };
      },
      {
        body: t.Object({
          results: t.Array(t.Object({ wordId: t.Integer(), period: t.Optional(t.Integer()) })),
        }),
      },
    );

export type App = ReturnType<typeof createApp>;
