/**
 * URL Extractor
 *
 * Turns a rendered results page into download candidates. The interactive
 * strategy opens each thumbnail's preview and reads the full-size image URL;
 * the markup strategy scans the page source with regular expressions and is
 * used only to top up an interactive run that came up short.
 */

import { ElementRef, RenderedPageHandle } from '../browser/pageHandle';
import { TimingConfig } from '../config/config';
import { ScrapeObserver, loggingObserver } from '../scraper/events';
import { describeError } from '../utils/errorHandler';
import { Result, fail, ok } from '../utils/result';
import { logger } from '../utils/logger';
import { pollFor, sleep } from '../utils/timing';
import { CandidateSet } from './candidateSet';
import { FALLBACK_PATTERNS, MIN_URL_LENGTH, findOriginalImageUrl, matchPattern } from './markupPatterns';
import { isAcceptableCandidate, isHttpUrl, isProxyHosted } from './proxyHosts';
import {
  FULL_IMAGE_SELECTORS,
  THUMBNAIL_SELECTORS,
  THUMBNAIL_URL_ATTRIBUTES,
  findFirstMatching,
} from './selectors';

/** Base for relative result links such as `/imgres?imgurl=...`. */
const RESULT_LINK_BASE = 'https://www.google.com';

const SCROLL_INTO_VIEW = "arguments[0].scrollIntoView({block: 'center'});";
// Script-level click: a pointer click lands on whatever overlay covers the thumbnail.
const DISPATCH_CLICK = 'arguments[0].click();';

export type ThumbnailSkipReason = 'no-image-url' | 'proxy-unresolved' | 'element-error';

export interface ThumbnailSkip {
  index: number;
  reason: ThumbnailSkipReason;
  detail?: string;
}

export interface InteractiveExtraction {
  candidates: CandidateSet;
  /** Selector that matched the thumbnails, or null if none did. */
  selector: string | null;
  thumbnails: number;
  skipped: ThumbnailSkip[];
}

/** Last preview URL seen; a preview still showing it belongs to the previous thumbnail. */
interface PreviewTracker {
  last: string | null;
}

export interface UrlExtractorOptions {
  timing: TimingConfig;
  thumbnailSelectors?: readonly string[];
  fullImageSelectors?: readonly string[];
}

/**
 * Reads the `imgurl` parameter of a result link.
 */
export function originalUrlFromHref(href: string | null): string | null {
  if (!href || !href.includes('imgurl=')) return null;
  try {
    return new URL(href, RESULT_LINK_BASE).searchParams.get('imgurl');
  } catch {
    return null;
  }
}

export class UrlExtractor {
  private readonly thumbnailSelectors: readonly string[];
  private readonly fullImageSelectors: readonly string[];

  constructor(
    private readonly options: UrlExtractorOptions,
    private readonly observer: ScrapeObserver = loggingObserver
  ) {
    this.thumbnailSelectors = options.thumbnailSelectors ?? THUMBNAIL_SELECTORS;
    this.fullImageSelectors = options.fullImageSelectors ?? FULL_IMAGE_SELECTORS;
  }

  /**
   * Primary strategy: click through every thumbnail on the page.
   * A failing thumbnail is recorded and skipped.
   */
  async extractInteractive(page: RenderedPageHandle, targetCount: number): Promise<InteractiveExtraction> {
    const candidates = new CandidateSet();
    const skipped: ThumbnailSkip[] = [];

    const match = await findFirstMatching(page, this.thumbnailSelectors);
    this.observer.onEvent({
      type: 'thumbnails-found',
      selector: match?.selector ?? null,
      count: match?.elements.length ?? 0,
      target: targetCount,
    });
    if (!match) {
      return { candidates, selector: null, thumbnails: 0, skipped };
    }

    const tracker: PreviewTracker = { last: null };
    for (const [index, thumbnail] of match.elements.entries()) {
      const outcome = await this.resolveThumbnail(page, thumbnail, index, tracker);
      if (outcome.success) {
        candidates.add(outcome.value, 'primary-interactive');
        this.observer.onEvent({ type: 'thumbnail-accepted', index, url: outcome.value });
      } else {
        skipped.push(outcome.reason);
        this.observer.onEvent({ type: 'thumbnail-skipped', ...outcome.reason });
      }
    }

    return { candidates, selector: match.selector, thumbnails: match.elements.length, skipped };
  }

  /**
   * Fallback strategy: regex scan of the page markup, most specific pattern
   * first, until `targetCount` URLs are collected.
   */
  extractFromMarkup(markup: string, targetCount: number): CandidateSet {
    const candidates = new CandidateSet();

    for (const pattern of FALLBACK_PATTERNS) {
      let added = 0;
      for (const url of matchPattern(markup, pattern)) {
        if (url.length <= MIN_URL_LENGTH) continue;
        if (candidates.add(url, 'page-source-regex')) added++;
        if (candidates.size >= targetCount) break;
      }
      if (added > 0) {
        this.observer.onEvent({ type: 'fallback-matched', pattern: pattern.name, added });
      }
      if (candidates.size >= targetCount) break;
    }

    return candidates;
  }

  private async resolveThumbnail(
    page: RenderedPageHandle,
    thumbnail: ElementRef,
    index: number,
    tracker: PreviewTracker
  ): Promise<Result<string, ThumbnailSkip>> {
    const { timing } = this.options;
    try {
      await page.runScript(SCROLL_INTO_VIEW, thumbnail);
      await sleep(timing.thumbnailScrollSettleMs);
      await page.runScript(DISPATCH_CLICK, thumbnail);

      // The pane shows the proxy thumbnail first; keep polling until the original replaces it.
      const seen: { placeholder: string | null } = { placeholder: null };
      const fullSize = await pollFor(
        async () => {
          const url = await this.findPreviewUrl(page);
          if (url === null || url === tracker.last) return null;
          if (isAcceptableCandidate(url)) return url;
          seen.placeholder = url;
          return null;
        },
        timing.clickSettleMs,
        timing.pollIntervalMs
      );
      const preview = fullSize ?? seen.placeholder;
      if (preview) tracker.last = preview;

      let url = preview ?? (await this.readThumbnailUrl(thumbnail));
      if (!url) {
        return fail({ index, reason: 'no-image-url' });
      }

      if (isProxyHosted(url)) {
        const original = await this.resolveOriginal(page, thumbnail, index);
        if (!original) {
          return fail({ index, reason: 'proxy-unresolved', detail: url });
        }
        url = original;
      }

      return isAcceptableCandidate(url) ? ok(url) : fail({ index, reason: 'no-image-url', detail: url });
    } catch (error) {
      return fail({ index, reason: 'element-error', detail: describeError(error) });
    }
  }

  /**
   * Probes the preview pane for a visible full-size image with an http source.
   */
  private async findPreviewUrl(page: RenderedPageHandle): Promise<string | null> {
    for (const selector of this.fullImageSelectors) {
      try {
        const image = await page.find(selector);
        if (!image || !(await image.isVisible())) continue;
        const src = await image.attribute('src');
        if (isHttpUrl(src)) return src;
      } catch (error) {
        logger.debug(`Preview selector ${selector} failed: ${describeError(error)}`);
      }
    }
    return null;
  }

  private async readThumbnailUrl(thumbnail: ElementRef): Promise<string | null> {
    for (const name of THUMBNAIL_URL_ATTRIBUTES) {
      const value = await thumbnail.attribute(name);
      if (isHttpUrl(value)) return value;
    }
    return null;
  }

  /**
   * Maps a proxy-hosted thumbnail to its original: first through the
   * enclosing result link, then through the first non-proxy image URL in
   * the page markup.
   */
  private async resolveOriginal(
    page: RenderedPageHandle,
    thumbnail: ElementRef,
    index: number
  ): Promise<string | null> {
    try {
      const fromHref = originalUrlFromHref(await thumbnail.parentAttribute('href'));
      if (isAcceptableCandidate(fromHref)) {
        this.observer.onEvent({ type: 'proxy-resolved', index, via: 'parent-href', url: fromHref });
        return fromHref;
      }
    } catch (error) {
      logger.debug(`[${index + 1}] Parent link unavailable: ${describeError(error)}`);
    }

    const fromMarkup = findOriginalImageUrl(await page.pageMarkup());
    if (fromMarkup) {
      this.observer.onEvent({ type: 'proxy-resolved', index, via: 'page-markup', url: fromMarkup });
    }
    return fromMarkup;
  }

  async extractFromPage(page: RenderedPageHandle, targetCount: number): Promise<CandidateSet> {
    const markup = await page.pageMarkup();
    return this.extractFromMarkup(markup, targetCount);
  }
}
