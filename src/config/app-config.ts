import type { LogLevel } from '@nestjs/common';
import { join } from 'path';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
  port: number;
  databasePath: string;
  providerTimeoutMs: number;
  offersFile: string;
  projectionCatchUp: boolean;
  logLevels: LogLevel[];
}

const DEFAULT_PORT = 8080;
const DEFAULT_PROVIDER_TIMEOUT_MS = 5_000;
const DEFAULT_DATA_DIR = join(process.cwd(), 'data');

// Most severe first; LOG_LEVEL=warn enables fatal, error and warn.
const LOG_LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    databasePath: env.DATABASE_PATH || join(DEFAULT_DATA_DIR, 'booking-ledger.sqlite'),
    providerTimeoutMs: readPositiveInt(env, 'PROVIDER_TIMEOUT_MS', DEFAULT_PROVIDER_TIMEOUT_MS),
    offersFile: env.OFFERS_FILE || join(DEFAULT_DATA_DIR, 'offers.json'),
    projectionCatchUp: readBoolean(env, 'PROJECTION_CATCH_UP', true),
    logLevels: readLogLevels(env.LOG_LEVEL)
  };
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }

  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new Error(`${key} must be true or false, got "${raw}"`);
  }
}

function readLogLevels(raw: string | undefined): LogLevel[] {
  if (!raw) {
    return LOG_LEVEL_ORDER.slice(0, LOG_LEVEL_ORDER.indexOf('log') + 1);
  }

  const index = LOG_LEVEL_ORDER.findIndex((level) => level === raw.toLowerCase());
  if (index === -1) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVEL_ORDER.join(', ')}, got "${raw}"`);
  }

  return LOG_LEVEL_ORDER.slice(0, index + 1);
}
