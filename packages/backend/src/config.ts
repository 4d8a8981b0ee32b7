import os from 'node:os';
import path from 'node:path';

export interface SymbolsConfig {
  baseUrl: string;
  cacheDir: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  uploadDir: string;
  maxFileSize: number; // bytes
  symbols: SymbolsConfig;
}

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function defaultCacheDir(): string {
  const cacheHome = process.env.XDG_CACHE_HOME ?? path.join(os.homedir(), '.cache');
  return path.join(cacheHome, 'crash-triage', 'symbols');
}

export function loadConfig(): AppConfig {
  return {
    port: parseInt(env('PORT', '8000'), 10),
    dataDir: env('DATA_DIR', path.join('.telemetry-data', 'events')),
    uploadDir: env('UPLOAD_DIR', '/tmp/crash-triage-uploads'),
    maxFileSize: parseInt(env('MAX_FILE_SIZE', String(50 * 1024 * 1024)), 10), // 50MB

    symbols: {
      baseUrl: env('SYMBOLS_BASE_URL', 'https://releases.example.com'),
      cacheDir: env('SYMBOLS_CACHE_DIR', defaultCacheDir()),
      timeoutMs: parseInt(env('SYMBOLS_TIMEOUT_MS', '30000'), 10),
    },
  };
}

let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}
