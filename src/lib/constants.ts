import { isLogLevel, type LogLevel } from './logger.js';

type EnvParseResult = number | null | undefined;

function parseEnvIntValue(envVar: string, min: number): EnvParseResult {
  const value = process.env[envVar];
  if (!value) return undefined;

  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    return null;
  }

  return parsed;
}

// Helper function for parsing and validating integer environment variables
function parseEnvInt(
  envVar: string,
  defaultValue: number,
  min: number
): number {
  const parsed = parseEnvIntValue(envVar, min);
  if (parsed === undefined) return defaultValue;
  if (parsed === null) {
    const value = process.env[envVar] ?? '';
    console.error(
      `[WARNING] Invalid ${envVar} value: ${value} (must be an integer >= ${min}). Using default: ${defaultValue}`
    );
    return defaultValue;
  }
  return parsed;
}

export function parseEnvFlag(envVar: string, defaultValue: boolean): boolean {
  const raw = process.env[envVar];
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  console.error(
    `[WARNING] Invalid ${envVar} value: ${raw} (expected true/false). Using default: ${String(defaultValue)}`
  );
  return defaultValue;
}

function parseEnvLogLevel(envVar: string, defaultValue: LogLevel): LogLevel {
  const raw = process.env[envVar]?.trim().toLowerCase();
  if (!raw) return defaultValue;
  if (isLogLevel(raw)) return raw;
  console.error(
    `[WARNING] Invalid ${envVar} value: ${raw}. Using default: ${defaultValue}`
  );
  return defaultValue;
}

export const DEFAULT_WORKER_COUNT = parseEnvInt('RULE_SCAN_WORKERS', 4, 1);

export const WORKER_THREADS_ENABLED = parseEnvFlag(
  'RULE_SCAN_WORKER_THREADS',
  true
);

export const LOG_LEVEL = parseEnvLogLevel('RULE_SCAN_LOG_LEVEL', 'info');

// Maximum respawns per worker slot before the slot is disabled
export const MAX_WORKER_RESPAWNS = 3;
