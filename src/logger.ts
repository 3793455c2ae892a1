import winston from 'winston';
import { LogLevelSchema } from './config';

const level = LogLevelSchema.catch('info').parse(process.env.LOG_LEVEL);
const production = process.env.NODE_ENV === 'production';

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, version, ...meta }) => {
    let line = `${timestamp} [${service}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    return line;
  }),
);

export const logger = winston.createLogger({
  level: level === 'silent' ? 'error' : level,
  silent: level === 'silent',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service: 'kana-review',
    version: process.env.npm_package_version ?? '0.1.0',
  },
  transports: [new winston.transports.Console(production ? {} : { format: consoleFormat })],
});
