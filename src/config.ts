import dotenv from 'dotenv';
import path from 'path';
import { Credentials } from './types';

export const DEFAULT_RESPONSE_MESSAGE = 'Thanks for your message!';
export const DEFAULT_CHECK_INTERVAL_SECONDS = 10;
export const DEFAULT_SESSION_FILE = 'session.json';

export interface BotConfig {
  credentials: Credentials;
  targetUsername: string;
  responseMessage: string;
  checkIntervalSeconds: number;
  sessionFile: string;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// Older .env files used the YOUR_* names
const REQUIRED: Array<{ key: string; fallback?: string }> = [
  { key: 'USERNAME', fallback: 'YOUR_USERNAME' },
  { key: 'PASSWORD', fallback: 'YOUR_PASSWORD' },
  { key: 'TARGET_USERNAME' },
];

function read(env: NodeJS.ProcessEnv, key: string, fallback?: string): string {
  const value = env[key]?.trim() || (fallback ? env[fallback]?.trim() : undefined);
  return value || '';
}

function parseInterval(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return DEFAULT_CHECK_INTERVAL_SECONDS;
  if (!/^\d+$/.test(raw.trim())) return null;
  const seconds = parseInt(raw.trim(), 10);
  return seconds > 0 ? seconds : null;
}

/**
 * The process environment overlaid with the .env file in the working directory.
 * The file wins: USERNAME in particular is already set by most operating systems.
 */
export function readEnvironment(cwd: string = process.cwd()): NodeJS.ProcessEnv {
  const { parsed } = dotenv.config({ path: path.join(cwd, '.env') });
  return { ...process.env, ...parsed };
}

/**
 * Build the bot configuration from environment variables.
 * Throws ConfigError listing every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = readEnvironment()): BotConfig {
  const problems: string[] = [];

  for (const { key, fallback } of REQUIRED) {
    if (!read(env, key, fallback)) {
      problems.push(`Missing required environment variable: ${key}`);
    }
  }

  const checkIntervalSeconds = parseInterval(env.CHECK_INTERVAL);
  if (checkIntervalSeconds === null) {
    problems.push(`CHECK_INTERVAL must be a positive integer (seconds), got "${env.CHECK_INTERVAL}"`);
  }

  if (problems.length > 0 || checkIntervalSeconds === null) {
    throw new ConfigError(problems);
  }

  return {
    credentials: {
      username: read(env, 'USERNAME', 'YOUR_USERNAME'),
      // not trimmed: surrounding spaces may be part of the password
      password: env.PASSWORD || env.YOUR_PASSWORD || '',
    },
    targetUsername: read(env, 'TARGET_USERNAME').replace(/^@/, ''),
    responseMessage: env.RESPONSE_MESSAGE || DEFAULT_RESPONSE_MESSAGE,
    checkIntervalSeconds,
    sessionFile: env.SESSION_FILE?.trim() || DEFAULT_SESSION_FILE,
  };
}
