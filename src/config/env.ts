/**
 * Environment variable schema.
 *
 * Parsed once at startup; the logger and CLI read the typed result instead of
 * touching `process.env` directly.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const LogFormatSchema = z.enum(['pretty', 'json']);

export const EnvSchema = z.object({
  NODE_ENV: NodeEnvSchema.default('development'),
  LOG_LEVEL: LogLevelSchema.default('info'),
  LOG_FORMAT: LogFormatSchema.default('pretty'),
});

export type Env = z.infer<typeof EnvSchema>;

export const formatIssues = (issues: z.ZodIssue[]): string[] =>
  issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`);

export const parseEnv = (raw: Record<string, string | undefined>): Env => {
  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error.issues));
  }
  return result.data;
};

let cachedEnv: Env | null = null;

export const getEnv = (): Env => {
  if (cachedEnv) {
    return cachedEnv;
  }

  // Tests set their own variables; a local .env must not override them.
  if (process.env.NODE_ENV !== 'test') {
    dotenv.config();
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
};
