/**
 * Runtime configuration resolved from the environment.
 */

import { getEnvDef } from './env-schema.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

export interface DetectorConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
  /** 0 means unlimited */
  maxFileBytes: number;
}

export const DEFAULT_MAX_FILE_BYTES = 64 * 1024 * 1024;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isLogFormat(value: string): value is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(value);
}

function readRaw(env: Record<string, string | undefined>, name: string): string {
  const raw = env[name];
  if (raw !== undefined && raw !== '') {
    return raw.trim();
  }
  return getEnvDef(name)?.default ?? '';
}

/**
 * Resolve configuration, falling back to schema defaults for unset or
 * invalid values. Use `validateEnv` to report the invalid ones.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DetectorConfig {
  const level = readRaw(env, 'ENCDETECT_LOG_LEVEL').toLowerCase();
  const format = readRaw(env, 'ENCDETECT_LOG_FORMAT').toLowerCase();
  const maxBytes = Number(readRaw(env, 'ENCDETECT_MAX_FILE_BYTES'));

  return {
    logLevel: isLogLevel(level) ? level : 'warn',
    logFormat: isLogFormat(format) ? format : 'text',
    maxFileBytes: Number.isFinite(maxBytes) && maxBytes >= 0 ? Math.floor(maxBytes) : DEFAULT_MAX_FILE_BYTES,
  };
}
