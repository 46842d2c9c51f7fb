import { config } from 'dotenv';

import { AppError } from '@/src/types/errors';

config();

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

// Base URLs carry no trailing slash; callers append paths.
const policeApiBaseUrl = (process.env.POLICE_API_URL ?? 'https://data.police.uk/api').replace(/\/+$/, '');
const osmBaseUrl = (process.env.OSM_BASE_URL ?? 'https://nominatim.openstreetmap.org').replace(/\/+$/, '');
// Nominatim's usage policy requires an identifying User-Agent.
const osmUserAgent = process.env.OSM_USER_AGENT ?? '';
const osmEmail = process.env.OSM_EMAIL ?? '';
const logLevel = parseLogLevel(process.env.LOG_LEVEL);
const httpTimeoutMs = parsePositiveInt(process.env.HTTP_TIMEOUT_MS, 15_000);

export const env = {
  policeApiBaseUrl,
  osmBaseUrl,
  osmUserAgent,
  osmEmail,
  logLevel,
  httpTimeoutMs,
};

export const requireOsmUserAgent = (): string => {
  if (!env.osmUserAgent) {
    if (process.env.NODE_ENV === 'production') {
      throw new AppError(
        'config_missing_user_agent',
        'Missing OSM_USER_AGENT. Set it in .env or the process environment.'
      );
    }

    return 'nearby-incidents (dev)';
  }

  return env.osmUserAgent;
};
