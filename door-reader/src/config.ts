import dotenv from 'dotenv';

import type { RelayDriverKind } from './types.js';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const logLevels: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
};

const parseNonNegativeInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
};

const parseLogLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return logLevels.find((level) => level === normalized) ?? fallback;
};

const parseRelayDriver = (value: string | undefined, fallback: RelayDriverKind): RelayDriverKind => {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'gpio' || normalized === 'onoff') {
    return 'gpio';
  }

  if (normalized === 'simulated' || normalized === 'mock') {
    return 'simulated';
  }

  return fallback;
};

const trimBaseUrl = (value: string): string => value.trim().replace(/\/+$/, '');

export interface AuthorityConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly apiKey?: string;
}

export interface RelayConfig {
  readonly driver: RelayDriverKind;
  readonly pin: number;
  readonly unlockDurationMs: number;
  readonly flashCount: number;
  readonly flashIntervalMs: number;
}

export interface ReaderConfig {
  readonly logLevel: LogLevel;
  readonly authority: AuthorityConfig;
  readonly relay: RelayConfig;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ReaderConfig => {
  const authority: AuthorityConfig = {
    baseUrl: trimBaseUrl(env.AUTHORITY_BASE_URL || 'http://localhost:3000/api'),
    timeoutMs: parsePositiveInt(env.AUTHORITY_TIMEOUT_MS, 5000),
    apiKey: env.AUTHORITY_API_KEY || undefined
  };

  const relay: RelayConfig = {
    driver: parseRelayDriver(env.RELAY_DRIVER, 'gpio'),
    pin: parseNonNegativeInt(env.RELAY_PIN, 17),
    unlockDurationMs: parsePositiveInt(env.UNLOCK_DURATION_MS, 5000),
    flashCount: parseNonNegativeInt(env.DENIAL_FLASH_COUNT, 6),
    flashIntervalMs: parseNonNegativeInt(env.DENIAL_FLASH_INTERVAL_MS, 150)
  };

  return Object.freeze({
    logLevel: parseLogLevel(env.LOG_LEVEL, 'info'),
    authority: Object.freeze(authority),
    relay: Object.freeze(relay)
  });
};

export const config: ReaderConfig = loadConfig();
