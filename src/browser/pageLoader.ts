import { TimingConfig } from '../config/config';
import { ScrapeObserver, loggingObserver } from '../scraper/events';
import { ScrapeError, describeError } from '../utils/errorHandler';
import { sleep, waitUntil } from '../utils/timing';
import { ConsentHandler } from './consentHandler';
import { RenderedPageHandle } from './pageHandle';

export const SEARCH_ENDPOINT = 'https://www.google.com/search';

/** Restricts results to image search. */
export const IMAGE_RESULTS_PARAM = 'udm=2';

const MAX_SCROLLS = 5;

/** Rendered images wanted per requested image, to leave room for rejects. */
const RENDER_BUFFER = 2;

const SCROLL_TO_BOTTOM = 'window.scrollTo(0, document.body.scrollHeight);';

export interface PageLoadReport {
  searchUrl: string;
  scrolls: number;
  renderedImages: number;
}

export function buildSearchUrl(query: string): string {
  const q = encodeURIComponent(query).replace(/%20/g, '+');
  return `${SEARCH_ENDPOINT}?q=${q}&${IMAGE_RESULTS_PARAM}`;
}

export function maxScrollsFor(targetCount: number): number {
  return Math.min(MAX_SCROLLS, Math.floor(targetCount / 10));
}

/**
 * Drives the results page until enough thumbnails are rendered, using
 * scroll-triggered lazy loading. Never clicks "show more", which changes the query.
 */
export class PageLoader {
  constructor(
    private readonly timing: TimingConfig,
    private readonly consent: ConsentHandler,
    private readonly observer: ScrapeObserver = loggingObserver
  ) {}

  async load(page: RenderedPageHandle, query: string, targetCount: number): Promise<PageLoadReport> {
    const searchUrl = buildSearchUrl(query);
    this.observer.onEvent({ type: 'navigation', url: searchUrl });

    try {
      await page.navigate(searchUrl);
    } catch (error) {
      throw new ScrapeError(`Failed to load search page: ${describeError(error)}`, 'NAVIGATION_FAILED', error);
    }

    await sleep(this.timing.navigationSettleMs);
    await this.consent.dismiss(page);

    return this.scrollForImages(page, searchUrl, targetCount);
  }

  private async scrollForImages(
    page: RenderedPageHandle,
    searchUrl: string,
    targetCount: number
  ): Promise<PageLoadReport> {
    const maxScrolls = maxScrollsFor(targetCount);
    const wanted = targetCount * RENDER_BUFFER;
    let scrolls = 0;
    let rendered = 0;

    try {
      rendered = await this.countImages(page);
      for (let attempt = 1; attempt <= maxScrolls; attempt++) {
        const before = rendered;
        await page.runScript(SCROLL_TO_BOTTOM);
        scrolls = attempt;

        await waitUntil(
          async () => (rendered = await this.countImages(page)) > before,
          this.timing.scrollSettleMs,
          this.timing.pollIntervalMs
        );

        this.observer.onEvent({ type: 'scroll', attempt, maxScrolls, renderedImages: rendered });
        if (rendered >= wanted) break;
      }
    } catch (error) {
      this.observer.onEvent({ type: 'scroll-failed', message: describeError(error) });
    }

    return { searchUrl, scrolls, renderedImages: rendered };
  }

  private async countImages(page: RenderedPageHandle): Promise<number> {
    const images = await page.findAll('img');
    return images.length;
  }
}
