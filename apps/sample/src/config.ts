import { z } from 'zod';

export interface SampleConfig {
  logLevel: string;
  failureRatePercent: number;
  fastIntervalMs: number;
  removeOnFailure: boolean;
}

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function readLogLevel(envValue: string | undefined, fallback: string): string {
  const value = envValue?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }

  const parsed = logLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`LOG_LEVEL must be one of ${logLevelSchema.options.join(', ')} (got "${value}")`);
  }
  return parsed.data;
}

function readIntInRange(
  envValue: string | undefined,
  fallback: number,
  envName: string,
  range: { min: number; max?: number },
): number {
  const value = envValue?.trim();
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  const tooHigh = range.max !== undefined && parsed > range.max;
  if (!Number.isSafeInteger(parsed) || parsed < range.min || tooHigh) {
    const bounds = range.max === undefined ? `>= ${range.min}` : `between ${range.min} and ${range.max}`;
    throw new Error(`${envName} must be an integer ${bounds} (got "${value}")`);
  }

  return parsed;
}

function readBoolean(envValue: string | undefined, fallback: boolean, envName: string): boolean {
  const value = envValue?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }
  if (['true', '1', 'yes', 'on'].includes(value)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(value)) {
    return false;
  }
  throw new Error(`${envName} must be a boolean (got "${value}")`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SampleConfig {
  return {
    logLevel: readLogLevel(env.LOG_LEVEL, 'info'),
    failureRatePercent: readIntInRange(env.SAMPLE_FAILURE_RATE_PERCENT, 11, 'SAMPLE_FAILURE_RATE_PERCENT', {
      min: 0,
      max: 100,
    }),
    fastIntervalMs: readIntInRange(env.SAMPLE_FAST_INTERVAL_MS, 5000, 'SAMPLE_FAST_INTERVAL_MS', {
      min: 1,
    }),
    removeOnFailure: readBoolean(env.SAMPLE_REMOVE_ON_FAILURE, false, 'SAMPLE_REMOVE_ON_FAILURE'),
  };
}

let config: SampleConfig | null = null;

export function getConfig(): SampleConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

export function resetConfigForTests(): void {
  config = null;
}
