import { ElementRef, RenderedPageHandle } from '../browser/pageHandle';
import { describeError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

// Ordered by priority: site-specific class names first, generic attributes last.

export const THUMBNAIL_SELECTORS = [
  'img.YQ4gaf',
  'img.rg_i',
  'img[data-src]',
] as const;

export const FULL_IMAGE_SELECTORS = [
  'img.n3VNCb',
  'img.sFlh5c',
  'img[data-src]',
] as const;

export const CONSENT_BUTTON_SELECTORS = [
  "button[id='L2AGLb']",
  "button[aria-label*='Accept']",
  "button[aria-label*='accept']",
] as const;

/** Attributes read off a thumbnail when no preview image appears. */
export const THUMBNAIL_URL_ATTRIBUTES = ['data-src', 'data-original', 'src'] as const;

export interface SelectorMatch {
  selector: string;
  elements: ElementRef[];
}

/**
 * Returns the matches of the first selector that yields any elements.
 * A selector that throws counts as a miss.
 */
export async function findFirstMatching(
  page: RenderedPageHandle,
  selectors: readonly string[]
): Promise<SelectorMatch | null> {
  for (const selector of selectors) {
    try {
      const elements = await page.findAll(selector);
      if (elements.length > 0) {
        return { selector, elements };
      }
    } catch (error) {
      logger.debug(`Selector ${selector} failed: ${describeError(error)}`);
    }
  }
  return null;
}
