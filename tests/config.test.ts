import { describe, it, expect, vi, afterEach } from 'vitest';
import { launchBrowserSession } from '../src/browser/puppeteerSession';
import { DEFAULT_USER_AGENT, loadConfig } from '../src/config/config';
import { ScrapeError } from '../src/utils/errorHandler';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.browser).toEqual({
      headless: true,
      executablePath: undefined,
      userAgent: DEFAULT_USER_AGENT,
      navigationTimeoutMs: 30000,
    });
    expect(config.timing).toEqual({
      navigationSettleMs: 2000,
      scrollSettleMs: 2000,
      consentPauseMs: 1000,
      thumbnailScrollSettleMs: 500,
      clickSettleMs: 1000,
      pollIntervalMs: 100,
    });
    expect(config.download).toEqual({ timeoutMs: 10000, minImageBytes: 1000, concurrency: 4 });
    expect(config.defaultCount).toBe(10);
    expect(config.defaultOutputFolder).toBe('results');
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      HEADLESS: 'false',
      CHROME_PATH: '/usr/bin/chromium',
      DOWNLOAD_CONCURRENCY: '8',
      MIN_IMAGE_BYTES: '2048',
      LOG_LEVEL: 'debug',
      OUTPUT_FOLDER: 'datasets',
    });

    expect(config.browser.headless).toBe(false);
    expect(config.browser.executablePath).toBe('/usr/bin/chromium');
    expect(config.download.concurrency).toBe(8);
    expect(config.download.minImageBytes).toBe(2048);
    expect(config.logging.level).toBe('DEBUG');
    expect(config.defaultOutputFolder).toBe('datasets');
  });

  it('should prefer PUPPETEER_EXECUTABLE_PATH over CHROME_PATH', () => {
    const config = loadConfig({ PUPPETEER_EXECUTABLE_PATH: '/opt/chrome', CHROME_PATH: '/usr/bin/chromium' });
    expect(config.browser.executablePath).toBe('/opt/chrome');
  });

  it('should ignore values that do not parse or fall below the minimum', () => {
    const config = loadConfig({ DOWNLOAD_CONCURRENCY: '0', DEFAULT_COUNT: 'many', HEADLESS: 'maybe', LOG_LEVEL: 'loud' });

    expect(config.download.concurrency).toBe(4);
    expect(config.defaultCount).toBe(10);
    expect(config.browser.headless).toBe(true);
    expect(config.logging.level).toBe('INFO');
  });
});

describe('config module', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should load without printing anything when no browser binary is configured', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.stubEnv('PUPPETEER_EXECUTABLE_PATH', '');
    vi.stubEnv('CHROME_PATH', '');
    vi.resetModules();

    const { config } = await import('../src/config/config');

    expect(config.browser.executablePath).toBeUndefined();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe('launchBrowserSession', () => {
  it('should refuse to launch without a browser binary', async () => {
    const launch = launchBrowserSession({ headless: true, userAgent: 'test-agent', navigationTimeoutMs: 1000 });

    await expect(launch).rejects.toBeInstanceOf(ScrapeError);
    await expect(launch).rejects.toMatchObject({ code: 'BROWSER_LAUNCH_FAILED' });
  });
});
