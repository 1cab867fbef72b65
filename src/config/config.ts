import * as dotenv from 'dotenv';

dotenv.config();

export interface BrowserConfig {
  headless: boolean;
  executablePath?: string;
  userAgent: string;
  navigationTimeoutMs: number;
}

/**
 * Upper bounds for every wait in the page phases. Waits that poll for a
 * condition return as soon as it holds; none of them exceeds its bound.
 */
export interface TimingConfig {
  navigationSettleMs: number;
  scrollSettleMs: number;
  consentPauseMs: number;
  thumbnailScrollSettleMs: number;
  clickSettleMs: number;
  pollIntervalMs: number;
}

export interface DownloadConfig {
  timeoutMs: number;
  minImageBytes: number;
  concurrency: number;
}

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LoggingConfig {
  logDir: string;
  writeToFile: boolean;
  level: LogLevelName;
}

export interface ScraperConfig {
  browser: BrowserConfig;
  timing: TimingConfig;
  download: DownloadConfig;
  logging: LoggingConfig;
  defaultCount: number;
  defaultOutputFolder: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) || value < min ? fallback : value;
}

function boolFromEnv(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}

function levelFromEnv(env: Env): LogLevelName {
  const raw = env['LOG_LEVEL']?.trim().toUpperCase();
  switch (raw) {
    case 'DEBUG':
    case 'INFO':
    case 'WARN':
    case 'ERROR':
      return raw;
    default:
      return 'INFO';
  }
}

export function loadConfig(env: Env = process.env): ScraperConfig {
  const executablePath = (env['PUPPETEER_EXECUTABLE_PATH'] || env['CHROME_PATH'] || '').trim();

  return {
    browser: {
      headless: boolFromEnv(env, 'HEADLESS', true),
      executablePath: executablePath || undefined,
      userAgent: env['USER_AGENT']?.trim() || DEFAULT_USER_AGENT,
      navigationTimeoutMs: intFromEnv(env, 'NAVIGATION_TIMEOUT_MS', 30000, 1),
    },
    timing: {
      navigationSettleMs: intFromEnv(env, 'NAVIGATION_SETTLE_MS', 2000),
      scrollSettleMs: intFromEnv(env, 'SCROLL_SETTLE_MS', 2000),
      consentPauseMs: intFromEnv(env, 'CONSENT_PAUSE_MS', 1000),
      thumbnailScrollSettleMs: intFromEnv(env, 'THUMBNAIL_SCROLL_SETTLE_MS', 500),
      clickSettleMs: intFromEnv(env, 'CLICK_SETTLE_MS', 1000),
      pollIntervalMs: intFromEnv(env, 'POLL_INTERVAL_MS', 100, 1),
    },
    download: {
      timeoutMs: intFromEnv(env, 'DOWNLOAD_TIMEOUT_MS', 10000, 1),
      minImageBytes: intFromEnv(env, 'MIN_IMAGE_BYTES', 1000),
      concurrency: intFromEnv(env, 'DOWNLOAD_CONCURRENCY', 4, 1),
    },
    logging: {
      logDir: env['LOG_DIR']?.trim() || 'logs',
      writeToFile: boolFromEnv(env, 'LOG_TO_FILE', true),
      level: levelFromEnv(env),
    },
    defaultCount: intFromEnv(env, 'DEFAULT_COUNT', 10, 1),
    defaultOutputFolder: env['OUTPUT_FOLDER']?.trim() || 'results',
  };
}

export const config: ScraperConfig = loadConfig();
