import axios, { isAxiosError } from 'axios';
import { DEFAULT_USER_AGENT } from '../config/config';
import { describeError } from '../utils/errorHandler';
import { Result, fail, ok } from '../utils/result';

export type FetchFailure =
  | { kind: 'timeout'; message: string }
  | { kind: 'http-status'; status: number; message: string }
  | { kind: 'transport'; message: string };

export interface AssetFetcher {
  fetch(url: string): Promise<Result<Buffer, FetchFailure>>;
}

export interface ImageFetcherOptions {
  timeoutMs: number;
  userAgent?: string;
}

export function browserHeaders(userAgent: string = DEFAULT_USER_AGENT): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept': 'image/webp,image/apng,image/*,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'gzip, deflate, br',
    'DNT': '1',
    'Connection': 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
  };
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function classifyFetchError(error: unknown): FetchFailure {
  if (isAxiosError(error)) {
    if (error.response) {
      return {
        kind: 'http-status',
        status: error.response.status,
        message: `HTTP ${error.response.status}`,
      };
    }
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return { kind: 'timeout', message: error.message };
    }
  }
  return { kind: 'transport', message: describeError(error) };
}

/**
 * Single-attempt HTTP GET of an image. Non-2xx statuses and transport
 * errors come back as failures; retries are the caller's business.
 */
export class ImageFetcher implements AssetFetcher {
  private readonly headers: Record<string, string>;

  constructor(private readonly options: ImageFetcherOptions) {
    this.headers = browserHeaders(options.userAgent);
  }

  async fetch(url: string): Promise<Result<Buffer, FetchFailure>> {
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        headers: this.headers,
        timeout: this.options.timeoutMs,
        responseType: 'arraybuffer',
      });
      return ok(Buffer.from(response.data));
    } catch (error) {
      return fail(classifyFetchError(error));
    }
  }
}
