import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema';

export type Schema = typeof schema;

// Dialect-level handle, so the stores run on postgres-js and on PGlite alike
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

export interface DatabaseConnection {
  db: Database;
  close: () => Promise<void>;
}

export const connectDatabase = (url: string): DatabaseConnection => {
  const client = postgres(url);
  return {
    db: drizzle(client, { schema }),
    close: () => client.end(),
  };
};
