// index.ts
import { Elysia } from 'elysia';
import { node } from '@elysiajs/node';
import { createApp } from './app';
import { loadConfig } from './config';
import { connectDatabase } from './db';
import { logger } from './logger';
import { createServices } from './services';

const config = loadConfig();
const { db, close } = connectDatabase(config.databaseUrl);

if (!config.maintenanceApiKey) {
  logger.warn('MAINTENANCE_API_KEY is not set, maintenance routes will reject every call');
}

const services = createServices(db, { masteryBlendRate: config.masteryBlendRate });

const app = new Elysia({ adapter: node() })
  .use(createApp(services, { maintenanceApiKey: config.maintenanceApiKey }))
  .listen(config.port);

logger.info(`kana-review API is running on port ${config.port}`);

const shutdown = async (signal: string) => {
  logger.info(`received ${signal}, shutting down`);
  await app.stop();
  await close();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('shutdown failed', { error });
      process.exit(1);
    });
  });
}
