import { isProxyHosted } from './proxyHosts';

export interface MarkupPattern {
  name: string;
  regex: RegExp;
  /** Capture group holding the URL; 0 means the whole match. */
  group: number;
}

const IMAGE_URL_SOURCE = String.raw`https?://[^"\s]+\.(?:jpg|jpeg|png|gif|webp)`;

/** Most specific first: original-image JSON fields before generic attributes. */
export const FALLBACK_PATTERNS: readonly MarkupPattern[] = [
  { name: 'original-url-field', regex: /"ou":"(https?:\/\/[^"]+)"/g, group: 1 },
  { name: 'data-src', regex: /data-src="(https?:\/\/[^"]+)"/g, group: 1 },
  { name: 'src', regex: /src="(https?:\/\/[^"]+)"/g, group: 1 },
  { name: 'bare-image-url', regex: new RegExp(IMAGE_URL_SOURCE, 'g'), group: 0 },
];

/** Shorter matches are fragments, not usable URLs. */
export const MIN_URL_LENGTH = 20;

/**
 * Undoes the escaping URLs pick up when embedded in HTML attributes or
 * inline script data.
 */
export function unescapeMarkupUrl(raw: string): string {
  return raw
    .replace(/\\u0026/gi, '&')
    .replace(/\\u003d/gi, '=')
    .replace(/\\\//g, '/')
    .replace(/&amp;/g, '&');
}

export function matchPattern(markup: string, pattern: MarkupPattern): string[] {
  const urls: string[] = [];
  for (const match of markup.matchAll(pattern.regex)) {
    const raw = match[pattern.group];
    if (raw) urls.push(unescapeMarkupUrl(raw));
  }
  return urls;
}

/**
 * First image URL in the markup that is not served by a proxy host.
 */
export function findOriginalImageUrl(markup: string): string | null {
  for (const match of markup.matchAll(new RegExp(IMAGE_URL_SOURCE, 'g'))) {
    const url = unescapeMarkupUrl(match[0]);
    if (!isProxyHosted(url)) return url;
  }
  return null;
}
