import 'dotenv/config';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'debug', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is undefined' }).url(),
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  MAINTENANCE_API_KEY: z.string().min(1).optional(),
  // When set, mastery scores move toward the outcome by this fraction instead of jumping to it
  MASTERY_BLEND_RATE: z.coerce.number().gt(0).lte(1).optional(),
});

export interface AppConfig {
  databaseUrl: string;
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  maintenanceApiKey?: string;
  masteryBlendRate?: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const { data } = parsed;
  return {
    databaseUrl: data.DATABASE_URL,
    port: data.PORT,
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    maintenanceApiKey: data.MAINTENANCE_API_KEY,
    masteryBlendRate: data.MASTERY_BLEND_RATE,
  };
}
