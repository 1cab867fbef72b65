import { logger } from '../utils/logger';

export type ScrapeState =
  | 'init'
  | 'navigating'
  | 'extracting'
  | 'fallback-extracting'
  | 'downloading'
  | 'done'
  | 'aborted';

export type ScrapeEvent =
  | { type: 'state'; from: ScrapeState; to: ScrapeState }
  | { type: 'navigation'; url: string }
  | { type: 'consent-dismissed'; selector: string }
  | { type: 'scroll'; attempt: number; maxScrolls: number; renderedImages: number }
  | { type: 'scroll-failed'; message: string }
  | { type: 'thumbnails-found'; selector: string | null; count: number; target: number }
  | { type: 'thumbnail-accepted'; index: number; url: string }
  | { type: 'thumbnail-skipped'; index: number; reason: string; detail?: string }
  | { type: 'proxy-resolved'; index: number; via: 'parent-href' | 'page-markup'; url: string }
  | { type: 'fallback-matched'; pattern: string; added: number }
  | { type: 'download-saved'; sequence: number; filename: string; bytes: number }
  | { type: 'download-failed'; sequence: number; url: string; stage: string; message: string }
  | { type: 'warning'; message: string };

/**
 * Receives progress from the pipeline components. Implementations must not throw.
 */
export interface ScrapeObserver {
  onEvent(event: ScrapeEvent): void;
}

function preview(url: string): string {
  return url.length > 60 ? `${url.slice(0, 60)}...` : url;
}

/**
 * Default observer: renders events through the shared logger.
 */
export class LoggingObserver implements ScrapeObserver {
  onEvent(event: ScrapeEvent): void {
    switch (event.type) {
      case 'state':
        logger.debug(`State ${event.from} -> ${event.to}`);
        break;
      case 'navigation':
        logger.info(`Navigating to: ${event.url}`);
        break;
      case 'consent-dismissed':
        logger.info(`Accepted consent dialog (${event.selector})`);
        break;
      case 'scroll':
        logger.info(`Scroll ${event.attempt}/${event.maxScrolls}: found ${event.renderedImages} images`);
        break;
      case 'scroll-failed':
        logger.warn(`Scrolling stopped: ${event.message}`);
        break;
      case 'thumbnails-found':
        if (event.selector) {
          logger.info(`Found ${event.count} thumbnails using selector: ${event.selector}`);
        } else {
          logger.warn('No thumbnails found');
        }
        break;
      case 'thumbnail-accepted':
        logger.debug(`[${event.index + 1}] Found image URL: ${preview(event.url)}`);
        break;
      case 'thumbnail-skipped':
        logger.debug(`[${event.index + 1}] Skipped (${event.reason})${event.detail ? `: ${event.detail}` : ''}`);
        break;
      case 'proxy-resolved':
        logger.debug(`[${event.index + 1}] Resolved original URL from ${event.via}: ${preview(event.url)}`);
        break;
      case 'fallback-matched':
        logger.debug(`Pattern ${event.pattern} added ${event.added} URLs`);
        break;
      case 'download-saved':
        logger.success(`Downloaded: ${event.filename} (${event.bytes} bytes)`);
        break;
      case 'download-failed':
        logger.warn(`Failed #${event.sequence} at ${event.stage}: ${event.message} (${preview(event.url)})`);
        break;
      case 'warning':
        logger.warn(event.message);
        break;
    }
  }
}

export const loggingObserver = new LoggingObserver();
