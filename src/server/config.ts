import { DEFAULT_GRID_SIZE, LEADERBOARD_LIMIT, MAX_GRID_SIZE, MIN_GRID_SIZE } from '../shared/constants';
import { createLogger } from '../shared/logger';

const logger = createLogger('Config');

export interface ServerConfig {
  port: number;
  allowedOrigins: string[];
  defaultGridSize: number;
  maxGridSize: number;
  leaderboardLimit: number;
  isProduction: boolean;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    logger.warn(`Ignoring invalid ${name}`, { value: raw, fallback });
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const maxGridSize = readInteger(env, 'MAX_GRID_SIZE', MAX_GRID_SIZE, MIN_GRID_SIZE);
  let defaultGridSize = readInteger(env, 'DEFAULT_GRID_SIZE', DEFAULT_GRID_SIZE, MIN_GRID_SIZE);
  if (defaultGridSize > maxGridSize) {
    logger.warn('DEFAULT_GRID_SIZE exceeds MAX_GRID_SIZE, clamping', { defaultGridSize, maxGridSize });
    defaultGridSize = maxGridSize;
  }

  return {
    port: readInteger(env, 'PORT', 2567, 0),
    allowedOrigins: env.ALLOWED_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) || [
      'http://localhost:8080',
      'http://localhost:2567',
    ],
    defaultGridSize,
    maxGridSize,
    leaderboardLimit: readInteger(env, 'LEADERBOARD_LIMIT', LEADERBOARD_LIMIT, 1),
    isProduction: env.NODE_ENV === 'production',
  };
}
