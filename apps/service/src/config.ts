import { z } from 'zod';

import { ConfigError, formatIssues } from '@ngo-contacts/core';

import type { FetchSettings } from './pages/fetcher.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvironmentSchema = z.object({
  NGO_CONTACTS_USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  NGO_CONTACTS_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  NGO_CONTACTS_OUTPUT_DIR: z.string().trim().min(1).default('out'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000)
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ServiceSettings {
  readonly fetch: FetchSettings;
  readonly outputDirectory: string;
  readonly logLevel: LogLevel;
  readonly port: number;
}

/** Reads service settings from the environment; unset keys take their defaults. */
export const loadServiceSettings = (env: NodeJS.ProcessEnv = process.env): ServiceSettings => {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError('environment', formatIssues(result.error));
  }

  const values = result.data;
  return Object.freeze({
    fetch: Object.freeze({
      userAgent: values.NGO_CONTACTS_USER_AGENT,
      timeoutMs: values.NGO_CONTACTS_FETCH_TIMEOUT_MS
    }),
    outputDirectory: values.NGO_CONTACTS_OUTPUT_DIR,
    logLevel: values.LOG_LEVEL,
    port: values.PORT
  });
};
