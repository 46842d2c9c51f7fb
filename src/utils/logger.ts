/**
 * logger.ts
 *
 * Tagged console logging shared by every service. Lines look like
 * `[PoliceAPI] GET 2025-06 tile=nw` so output from concurrent calls stays
 * greppable by area. The threshold comes from LOG_LEVEL.
 */

import { env, type LogLevel } from '@/src/config/env';

export type Logger = {
  debug: (message: string, ...extra: unknown[]) => void;
  info: (message: string, ...extra: unknown[]) => void;
  warn: (message: string, ...extra: unknown[]) => void;
  error: (message: string, ...extra: unknown[]) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const createLogger = (tag: string, level: LogLevel = env.logLevel): Logger => {
  const threshold = LEVEL_RANK[level];
  const prefix = `[${tag}]`;
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_RANK[messageLevel] >= threshold;

  return {
    debug: (message, ...extra) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...extra);
    },
    info: (message, ...extra) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...extra);
    },
    warn: (message, ...extra) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...extra);
    },
    error: (message, ...extra) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...extra);
    },
  };
};
