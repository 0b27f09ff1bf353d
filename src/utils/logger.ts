import winston from 'winston';
import { getEnv, type Env } from '../config/env';

export const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

export const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  }),
);

export const createLogger = (env: Env): winston.Logger =>
  winston.createLogger({
    level: env.LOG_LEVEL,
    silent: env.NODE_ENV === 'test',
    transports: [
      // Reports go to stdout; keep logs on stderr.
      new winston.transports.Console({
        format: env.LOG_FORMAT === 'json' ? jsonFormat : consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
  });

let activeLogger: winston.Logger | null = null;

export const configureLogger = (env: Env): winston.Logger => {
  activeLogger = createLogger(env);
  return activeLogger;
};

// Built on first use unless the CLI has already configured it.
export const getLogger = (): winston.Logger => activeLogger ?? configureLogger(getEnv());
