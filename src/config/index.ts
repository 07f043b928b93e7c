/**
 * Runtime configuration, read once from the environment.
 */

import * as path from 'path';
import { ConfigError } from '../errors';
import { LogLevel, parseLogLevel } from '../logging';

export type StorageMode = 'file' | 'memory';

export interface CheckInConfig {
  port: number;
  dataDir: string;
  storage: StorageMode;
  tokenPrefix: string;
  logLevel: LogLevel;
  qrWidth: number;
  defaultCapacity?: number;
}

const TOKEN_PREFIX_PATTERN = /^[A-Z0-9]{1,16}$/;

function parseInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number | undefined,
  min: number,
  problems: string[]
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CheckInConfig {
  const problems: string[] = [];

  const port = parseInteger(env, 'PORT', 3000, 0, problems) ?? 3000;
  const qrWidth = parseInteger(env, 'CHECKIN_QR_WIDTH', 300, 64, problems) ?? 300;
  const defaultCapacity = parseInteger(env, 'CHECKIN_DEFAULT_CAPACITY', undefined, 1, problems);

  const storageRaw = (env.CHECKIN_STORAGE || 'file').trim().toLowerCase();
  let storage: StorageMode = 'file';
  if (storageRaw === 'file' || storageRaw === 'memory') {
    storage = storageRaw;
  } else {
    problems.push(`CHECKIN_STORAGE must be "file" or "memory" (got "${storageRaw}")`);
  }

  const tokenPrefix = (env.CHECKIN_TOKEN_PREFIX || 'CHK1').trim();
  if (!TOKEN_PREFIX_PATTERN.test(tokenPrefix)) {
    problems.push(`CHECKIN_TOKEN_PREFIX must be 1-16 uppercase letters or digits (got "${tokenPrefix}")`);
  }

  const logLevelRaw = env.CHECKIN_LOG_LEVEL;
  const logLevel = parseLogLevel(logLevelRaw);
  if (logLevelRaw && logLevel === undefined) {
    problems.push(`CHECKIN_LOG_LEVEL must be debug, info, warn, error or silent (got "${logLevelRaw}")`);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    port,
    dataDir: path.resolve(env.DATA_DIR || './checkin-data'),
    storage,
    tokenPrefix,
    logLevel: logLevel ?? LogLevel.INFO,
    qrWidth,
    defaultCapacity,
  };
}
