import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

const MB = 1024 * 1024;

export interface Config {
  port: number;
  host: string;
  dataPath: string;
  downloadPath: string;
  xtream: {
    url: string;
    username: string;
    password: string;
    timeoutMs: number;
  };
  chunkSize: number;        // bytes
  minFileSize: number;      // bytes
  cooldownMs: number;
  movieMatchTolerance: number;
  watchDownloads: boolean;
}

let config: Config | null = null;

function parseNumber(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    console.warn(`[Config] Invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

export function getConfig(): Config {
  if (!config) {
    config = {
      port: parseNumber('PORT', 5000, 1),
      host: process.env.HOST || '0.0.0.0',
      dataPath: process.env.DATA_PATH || '/data',
      downloadPath: process.env.DOWNLOAD_PATH || '/downloads',
      xtream: {
        url: (process.env.XC_URL || 'http://provider-url.com:8080').replace(/\/+$/, ''),
        username: process.env.XC_USER || 'username',
        password: process.env.XC_PASS || 'password',
        timeoutMs: parseNumber('API_TIMEOUT_SECONDS', 15, 1) * 1000,
      },
      chunkSize: Math.round(parseNumber('CHUNK_SIZE_MB', 1, 0.0625) * MB),
      minFileSize: Math.round(parseNumber('MIN_FILE_SIZE_MB', 1) * MB),
      cooldownMs: parseNumber('COOLDOWN_SECONDS', 5) * 1000,
      movieMatchTolerance: Math.min(parseNumber('MOVIE_MATCH_TOLERANCE', 0.5), 1),
      watchDownloads: process.env.WATCH_DOWNLOADS !== 'false',
    };
  }
  return config;
}

export function reloadConfig(): void {
  config = null;
  getConfig();
}
