/**
 * CLI configuration.
 *
 * Each setting resolves with precedence:
 * 1. CLI flag
 * 2. Environment variable (also read from .env)
 * 3. Default
 */

import { z } from 'zod';
import { formatZodError } from '@duesledger/types';
import { DEFAULT_LEDGER_PATH, DEFAULT_MAPPINGS_PATH } from '@duesledger/store';
import { DEFAULT_DELIMITER } from '@duesledger/statement-parser';

export const ENV_KEYS = {
  LEDGER_PATH: 'DUES_LEDGER_PATH',
  MAPPINGS_PATH: 'DUES_MAPPINGS_PATH',
  DELIMITER: 'DUES_STATEMENT_DELIMITER',
  VERBOSE: 'DUES_VERBOSE',
} as const;

export const AppConfigSchema = z.object({
  ledgerPath: z.string().min(1),
  mappingsPath: z.string().min(1),
  delimiter: z.string().length(1, 'Delimiter must be a single character'),
  verbose: z.boolean(),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface ConfigOverrides {
  ledger?: string | undefined;
  mappings?: string | undefined;
  delimiter?: string | undefined;
  verbose?: boolean | undefined;
}

type Env = Record<string, string | undefined>;

function pick(cliValue: string | undefined, env: Env, key: string, fallback: string): string {
  if (cliValue !== undefined && cliValue !== '') return cliValue;
  const envValue = env[key];
  if (envValue !== undefined && envValue !== '') return envValue;
  return fallback;
}

const envBool = (env: Env, key: string, defaultVal: boolean): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const candidate = {
    ledgerPath: pick(overrides.ledger, env, ENV_KEYS.LEDGER_PATH, DEFAULT_LEDGER_PATH),
    mappingsPath: pick(overrides.mappings, env, ENV_KEYS.MAPPINGS_PATH, DEFAULT_MAPPINGS_PATH),
    delimiter: pick(overrides.delimiter, env, ENV_KEYS.DELIMITER, DEFAULT_DELIMITER),
    verbose: overrides.verbose === true || envBool(env, ENV_KEYS.VERBOSE, false),
  };

  const parsed = AppConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
