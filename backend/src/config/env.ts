/**
 * Environment configuration
 *
 * Read once at import; `dotenv/config` is loaded by the entrypoint
 * before this module.
 */

export type StorageMode = 'memory' | 'mongo';

export interface Env {
  NODE_ENV: string;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  CORS_ORIGINS: string;
  MONGO_URL: string;
  STORAGE: StorageMode;
  SCHEDULER_ENABLED: boolean;
  SCHEDULER_TICK_CRON: string;
  QUALITY_THRESHOLD: number;
}

function str(source: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = source[key];
  return raw !== undefined && raw.trim() !== '' ? raw.trim() : fallback;
}

function num(source: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const parsed = Number(source[key]);
  return source[key] !== undefined && Number.isFinite(parsed) ? parsed : fallback;
}

function bool(source: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = source[key];
  if (raw === undefined) return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const storage = str(source, 'STORAGE', 'mongo');

  return {
    NODE_ENV: str(source, 'NODE_ENV', 'development'),
    PORT: num(source, 'PORT', 8001),
    HOST: str(source, 'HOST', '0.0.0.0'),
    LOG_LEVEL: str(source, 'LOG_LEVEL', 'info'),
    CORS_ORIGINS: str(source, 'CORS_ORIGINS', '*'),
    MONGO_URL: str(source, 'MONGO_URL', 'mongodb://localhost:27017/report_control'),
    STORAGE: storage === 'memory' ? 'memory' : 'mongo',
    SCHEDULER_ENABLED: bool(source, 'SCHEDULER_ENABLED', true),
    // 00:10 UTC, same slot as the other daily jobs
    SCHEDULER_TICK_CRON: str(source, 'SCHEDULER_TICK_CRON', '10 0 * * *'),
    QUALITY_THRESHOLD: num(source, 'QUALITY_THRESHOLD', 0.7),
  };
}

export const env: Env = loadEnv();
