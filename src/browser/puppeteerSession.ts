/**
 * Puppeteer Session
 *
 * Chromium-backed implementation of RenderedPageHandle. Applies passive
 * disguise only: a desktop user agent, no automation switch and no
 * `navigator.webdriver` flag.
 */

import puppeteer, { Browser, ElementHandle, Page } from 'puppeteer-core';
import { BrowserConfig, config } from '../config/config';
import { ScrapeError, describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { ElementRef, RenderedPageHandle } from './pageHandle';

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
];

class PuppeteerElement implements ElementRef {
  constructor(readonly handle: ElementHandle<Element>) {}

  attribute(name: string): Promise<string | null> {
    return this.handle.evaluate((el, attr) => el.getAttribute(attr), name);
  }

  parentAttribute(name: string): Promise<string | null> {
    return this.handle.evaluate((el, attr) => el.parentElement?.getAttribute(attr) ?? null, name);
  }

  isVisible(): Promise<boolean> {
    return this.handle.isVisible();
  }

  async click(): Promise<void> {
    await this.handle.click();
  }
}

function unwrap(element: ElementRef): ElementHandle<Element> {
  if (element instanceof PuppeteerElement) return element.handle;
  throw new Error('Element does not belong to this browser session');
}

export class PuppeteerPageHandle implements RenderedPageHandle {
  private closed = false;

  constructor(private browser: Browser, private page: Page) {}

  async navigate(url: string): Promise<void> {
    const response = await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    if (response && response.status() >= 400) {
      throw new Error(`Search page responded with HTTP ${response.status()}`);
    }
  }

  async findAll(selector: string): Promise<ElementRef[]> {
    const handles = await this.page.$$(selector);
    return handles.map(handle => new PuppeteerElement(handle));
  }

  async find(selector: string): Promise<ElementRef | null> {
    const handle = await this.page.$(selector);
    return handle ? new PuppeteerElement(handle) : null;
  }

  runScript(source: string, ...elements: ElementRef[]): Promise<unknown> {
    const handles = elements.map(unwrap);
    return this.page.evaluate(
      (body: string, ...args: Element[]): unknown => new Function(body).apply(null, args),
      source,
      ...handles
    );
  }

  pageMarkup(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
  }
}

export async function launchBrowserSession(options: BrowserConfig = config.browser): Promise<PuppeteerPageHandle> {
  if (!options.executablePath) {
    throw new ScrapeError(
      'No Chromium executable configured (set PUPPETEER_EXECUTABLE_PATH or CHROME_PATH)',
      'BROWSER_LAUNCH_FAILED'
    );
  }

  let browser: Browser;
  try {
    browser = await puppeteer.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      args: [...LAUNCH_ARGS, `--user-agent=${options.userAgent}`],
      ignoreDefaultArgs: ['--enable-automation'],
    });
  } catch (error) {
    throw new ScrapeError(`Failed to launch browser: ${describeError(error)}`, 'BROWSER_LAUNCH_FAILED', error);
  }

  try {
    const page = await browser.newPage();
    await page.setUserAgent(options.userAgent);
    await page.setViewport({ width: 1280, height: 1000 });
    await page.evaluateOnNewDocument(() => {
      Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    });
    page.setDefaultNavigationTimeout(options.navigationTimeoutMs);
    logger.debug(`Browser session ready (headless: ${options.headless})`);
    return new PuppeteerPageHandle(browser, page);
  } catch (error) {
    await browser.close();
    throw new ScrapeError(`Failed to prepare browser page: ${describeError(error)}`, 'BROWSER_LAUNCH_FAILED', error);
  }
}
