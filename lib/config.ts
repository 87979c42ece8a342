/**
 * Ingest configuration, read from the environment
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { TwitterCredentials } from './twitter/timeline';

export const DEFAULT_ACCOUNT = 'HRFE_Incidents';
export const DEFAULT_DUCKDB_PATH = path.join('data', 'incidents.duckdb');

export interface IngestConfig {
  twitter: TwitterCredentials;
  account: string;
  pageSize?: number;
  duckdbPath: string;
}

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const EnvSchema = z.object({
  TWITTER_CONSUMER_KEY: required('TWITTER_CONSUMER_KEY'),
  TWITTER_CONSUMER_SECRET: required('TWITTER_CONSUMER_SECRET'),
  TWITTER_APP_TOKEN: required('TWITTER_APP_TOKEN'),
  TWITTER_APP_SECRET: required('TWITTER_APP_SECRET'),
  INCIDENTS_ACCOUNT: z.string().trim().min(1).default(DEFAULT_ACCOUNT),
  TWITTER_PAGE_SIZE: z.coerce
    .number()
    .int('TWITTER_PAGE_SIZE must be an integer')
    .min(1, 'TWITTER_PAGE_SIZE must be between 1 and 200')
    .max(200, 'TWITTER_PAGE_SIZE must be between 1 and 200')
    .optional(),
  DUCKDB_PATH: z.string().trim().min(1).optional(),
});

// Resolve DuckDB path relative to the working directory, like the other scripts
export function resolveDuckDBPath(value: string | undefined, cwd: string = process.cwd()): string {
  const dbPath = value ?? DEFAULT_DUCKDB_PATH;
  return path.isAbsolute(dbPath) ? dbPath : path.join(cwd, dbPath);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): IngestConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message));
  }

  const vars = parsed.data;
  return {
    twitter: {
      appKey: vars.TWITTER_CONSUMER_KEY,
      appSecret: vars.TWITTER_CONSUMER_SECRET,
      accessToken: vars.TWITTER_APP_TOKEN,
      accessSecret: vars.TWITTER_APP_SECRET,
    },
    account: vars.INCIDENTS_ACCOUNT,
    pageSize: vars.TWITTER_PAGE_SIZE,
    duckdbPath: resolveDuckDBPath(vars.DUCKDB_PATH, cwd),
  };
}
