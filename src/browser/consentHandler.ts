import { CONSENT_BUTTON_SELECTORS } from '../extraction/selectors';
import { ScrapeObserver, loggingObserver } from '../scraper/events';
import { describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { sleep } from '../utils/timing';
import { RenderedPageHandle } from './pageHandle';

export interface ConsentHandlerOptions {
  selectors?: readonly string[];
  pauseMs: number;
}

/**
 * Clicks through cookie/consent overlays. Never throws: a page without a
 * consent dialog is the common case.
 */
export class ConsentHandler {
  private readonly selectors: readonly string[];

  constructor(
    private readonly options: ConsentHandlerOptions,
    private readonly observer: ScrapeObserver = loggingObserver
  ) {
    this.selectors = options.selectors ?? CONSENT_BUTTON_SELECTORS;
  }

  /**
   * @returns the selector that was clicked, or null if nothing was dismissed
   */
  async dismiss(page: RenderedPageHandle): Promise<string | null> {
    for (const selector of this.selectors) {
      try {
        const button = await page.find(selector);
        if (!button || !(await button.isVisible())) continue;
        await button.click();
        this.observer.onEvent({ type: 'consent-dismissed', selector });
        await sleep(this.options.pauseMs);
        return selector;
      } catch (error) {
        logger.debug(`Consent selector ${selector} failed: ${describeError(error)}`);
      }
    }
    return null;
  }
}
