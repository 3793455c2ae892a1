// Decay trigger for an external scheduler: `npm run drop-marks -- 12 57`
import { z } from 'zod';
import { loadConfig } from './config';
import { connectDatabase } from './db';
import { logger } from './logger';
import { createServices } from './services';
import { IdSchema } from './types';

const UserIds = z.array(z.coerce.number().pipe(IdSchema)).min(1, 'pass at least one user id');

async function main() {
  const parsed = UserIds.safeParse(process.argv.slice(2));
  if (!parsed.success) {
    throw new Error(`usage: drop-marks <userId...> (${parsed.error.issues[0].message})`);
  }

  const config = loadConfig();
  const { db, close } = connectDatabase(config.databaseUrl);
  const { testResults } = createServices(db);

  try {
    for (const userId of parsed.data) {
      await testResults.dropMarks(userId);
    }
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  logger.error('drop-marks failed', { error });
  process.exitCode = 1;
});
