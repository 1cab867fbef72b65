import { isAcceptableCandidate } from './proxyHosts';

export type CandidateSource = 'primary-interactive' | 'page-source-regex';

export interface CandidateUrl {
  url: string;
  source: CandidateSource;
  /** 0-based order of discovery within the set. */
  index: number;
}

/**
 * URL-keyed, duplicate-free collection of download candidates.
 * Proxy-hosted and non-http URLs are refused on entry.
 */
export class CandidateSet {
  private readonly entries = new Map<string, CandidateUrl>();

  get size(): number {
    return this.entries.size;
  }

  /**
   * @returns false if the URL was already present or is not acceptable
   */
  add(url: string, source: CandidateSource): boolean {
    if (!isAcceptableCandidate(url) || this.entries.has(url)) return false;
    this.entries.set(url, { url, source, index: this.entries.size });
    return true;
  }

  /**
   * Appends every URL of `other` not already present, in `other`'s order.
   * @returns the number of URLs added
   */
  union(other: CandidateSet): number {
    let added = 0;
    for (const candidate of other.toArray()) {
      if (this.add(candidate.url, candidate.source)) added++;
    }
    return added;
  }

  toArray(): CandidateUrl[] {
    return Array.from(this.entries.values());
  }

  urls(): string[] {
    return Array.from(this.entries.keys());
  }
}
