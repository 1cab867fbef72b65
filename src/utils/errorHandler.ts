import { logger } from './logger';

export type ScrapeErrorCode =
  | 'INVALID_QUERY'
  | 'INVALID_COUNT'
  | 'BROWSER_LAUNCH_FAILED'
  | 'NAVIGATION_FAILED';

export class ScrapeError extends Error {
  constructor(
    message: string,
    public code: ScrapeErrorCode,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'ScrapeError';
  }
}

/**
 * Extracts a printable message from anything that was thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof ScrapeError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
  } else {
    logger.error(`[${context}] Unexpected error: ${describeError(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(`[${context}] Stack trace: ${error.stack}`);
    }
  }
}
