/**
 * CDN domains that serve low-resolution re-encodes of search results.
 * A URL on one of these hosts is never downloaded as-is.
 */
export const PROXY_HOST_DENYLIST = ['gstatic.com', 'googleusercontent.com'] as const;

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

export function isProxyHosted(url: string): boolean {
  const host = hostOf(url);
  if (host === null) {
    // Unparseable strings from page markup: fall back to a substring check.
    const lower = url.toLowerCase();
    return PROXY_HOST_DENYLIST.some(domain => lower.includes(domain));
  }
  return PROXY_HOST_DENYLIST.some(domain => host === domain || host.endsWith(`.${domain}`));
}

export function isHttpUrl(url: string | null | undefined): url is string {
  return typeof url === 'string' && url.startsWith('http');
}

/** True if the URL may enter a candidate set. */
export function isAcceptableCandidate(url: string | null | undefined): url is string {
  return isHttpUrl(url) && !isProxyHosted(url);
}
