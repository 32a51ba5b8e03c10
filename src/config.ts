/**
 * Runtime configuration read from environment variables
 */

import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './utils/logger';
import type { EvaluationOptions } from './types';

export const DEFAULT_SNAPSHOT_PATH = fileURLToPath(new URL('../data/reference-snapshot.json', import.meta.url));

// Uploads above this size are rejected before parsing
export const DEFAULT_MAX_DOCUMENT_BYTES = 16 * 1024 * 1024;

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvironmentSchema = z.object({
  ROSTER_SNAPSHOT_PATH: z.string().min(1).default(DEFAULT_SNAPSHOT_PATH),
  ROSTER_MAX_DOCUMENT_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_DOCUMENT_BYTES),
  ROSTER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ROSTER_INCLUDE_CORE: BooleanFlagSchema.default('true'),
  ROSTER_EXCLUDED_TYPES: z.string().default('')
});

export interface AppConfig {
  snapshotPath: string;
  maxDocumentBytes: number;
  logLevel: LogLevel;
  evaluation: EvaluationOptions;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const settings = parsed.data;
  return {
    snapshotPath: settings.ROSTER_SNAPSHOT_PATH,
    maxDocumentBytes: settings.ROSTER_MAX_DOCUMENT_BYTES,
    logLevel: settings.ROSTER_LOG_LEVEL,
    evaluation: {
      includeCore: settings.ROSTER_INCLUDE_CORE,
      excludedTypes: splitList(settings.ROSTER_EXCLUDED_TYPES)
    }
  };
}
