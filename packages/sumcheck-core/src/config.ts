/**
 * Configuration builder.
 *
 * Reads from environment variables with defaults.
 * All values can be overridden programmatically.
 */

import type { LevelWithSilent } from 'pino';

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export interface SumcheckConfig {
  /** pino level for diagnostics on stderr */
  logLevel: LevelWithSilent;
  /** Prefix manifest result lines with "(i/n p%)" */
  showProgress: boolean;
}

export const DEFAULT_CONFIG: SumcheckConfig = {
  logLevel: 'warn',
  showProgress: true,
};

export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

function getEnvLogLevel(key: string, fallback: LevelWithSilent): LevelWithSilent {
  const raw = process.env[key]?.trim().toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : fallback;
}

/**
 * Build config from environment variables and optional overrides.
 *
 * Environment variables:
 * - SUMCHECK_LOG_LEVEL: pino level or "silent" (default: warn)
 * - SUMCHECK_PROGRESS: show progress prefixes (default: true)
 */
export function buildConfig(overrides?: Partial<SumcheckConfig>): SumcheckConfig {
  return {
    logLevel: overrides?.logLevel ?? getEnvLogLevel('SUMCHECK_LOG_LEVEL', DEFAULT_CONFIG.logLevel),
    showProgress: overrides?.showProgress ?? getEnvBoolean('SUMCHECK_PROGRESS', DEFAULT_CONFIG.showProgress),
  };
}
