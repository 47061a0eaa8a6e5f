import dotenv from 'dotenv';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

interface EnvConfig {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: LogLevel;
  MAX_UPLOAD_MB: number;
}

function parsePositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid environment variable ${name}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (!raw) {
    return 'info';
  }

  const level = LOG_LEVELS.find(candidate => candidate === raw.toLowerCase());
  if (!level) {
    throw new Error(`Invalid environment variable LOG_LEVEL: expected one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function validateEnv(): EnvConfig {
  return {
    PORT: parsePositiveInt('PORT', 8081),
    NODE_ENV: process.env.NODE_ENV || 'development',
    LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
    MAX_UPLOAD_MB: parsePositiveInt('MAX_UPLOAD_MB', 10)
  };
}

export const env = validateEnv();
