import { describe, it, expect } from 'vitest';
import { CandidateSet } from '../src/extraction/candidateSet';
import { isAcceptableCandidate, isProxyHosted } from '../src/extraction/proxyHosts';

describe('isProxyHosted', () => {
  it('should flag the search provider thumbnail CDNs and their subdomains', () => {
    expect(isProxyHosted('https://encrypted-tbn0.gstatic.com/images?q=tbn:abc')).toBe(true);
    expect(isProxyHosted('https://gstatic.com/x.png')).toBe(true);
    expect(isProxyHosted('https://lh3.googleusercontent.com/photo.jpg')).toBe(true);
  });

  it('should match on host, not on path or look-alike domains', () => {
    expect(isProxyHosted('https://notgstatic.com/a.jpg')).toBe(false);
    expect(isProxyHosted('https://images.example.com/gstatic.com/a.jpg')).toBe(false);
  });

  it('should fall back to a substring check for unparseable strings', () => {
    expect(isProxyHosted('http://[broken.gstatic.com/a.jpg')).toBe(true);
    expect(isProxyHosted('http://[broken.example.com/a.jpg')).toBe(false);
  });

  it('should accept only http URLs off the denylist', () => {
    expect(isAcceptableCandidate('https://photos.example.com/a.jpg')).toBe(true);
    expect(isAcceptableCandidate('data:image/png;base64,AAAA')).toBe(false);
    expect(isAcceptableCandidate(null)).toBe(false);
    expect(isAcceptableCandidate('https://encrypted-tbn0.gstatic.com/images?q=1')).toBe(false);
  });
});

describe('CandidateSet', () => {
  it('should assign provenance indices in insertion order', () => {
    const set = new CandidateSet();
    set.add('https://a.example.com/1.jpg', 'primary-interactive');
    set.add('https://b.example.com/2.jpg', 'page-source-regex');

    expect(set.toArray()).toEqual([
      { url: 'https://a.example.com/1.jpg', source: 'primary-interactive', index: 0 },
      { url: 'https://b.example.com/2.jpg', source: 'page-source-regex', index: 1 },
    ]);
  });

  it('should refuse duplicates and keep the first source', () => {
    const set = new CandidateSet();
    expect(set.add('https://a.example.com/1.jpg', 'primary-interactive')).toBe(true);
    expect(set.add('https://a.example.com/1.jpg', 'page-source-regex')).toBe(false);
    expect(set.size).toBe(1);
    expect(set.toArray()[0].source).toBe('primary-interactive');
  });

  it('should refuse proxy-hosted and non-http URLs', () => {
    const set = new CandidateSet();
    expect(set.add('https://encrypted-tbn0.gstatic.com/images?q=1', 'primary-interactive')).toBe(false);
    expect(set.add('/relative/path.jpg', 'page-source-regex')).toBe(false);
    expect(set.size).toBe(0);
  });

  it('should union unseen URLs after existing ones', () => {
    const primary = new CandidateSet();
    primary.add('https://a.example.com/1.jpg', 'primary-interactive');

    const fallback = new CandidateSet();
    fallback.add('https://b.example.com/2.jpg', 'page-source-regex');
    fallback.add('https://a.example.com/1.jpg', 'page-source-regex');
    fallback.add('https://c.example.com/3.jpg', 'page-source-regex');

    expect(primary.union(fallback)).toBe(2);
    expect(primary.urls()).toEqual([
      'https://a.example.com/1.jpg',
      'https://b.example.com/2.jpg',
      'https://c.example.com/3.jpg',
    ]);
    expect(primary.toArray().map(c => c.index)).toEqual([0, 1, 2]);
  });

  it('should leave the set unchanged when the same union is applied twice', () => {
    const primary = new CandidateSet();
    primary.add('https://a.example.com/1.jpg', 'primary-interactive');
    const fallback = new CandidateSet();
    fallback.add('https://b.example.com/2.jpg', 'page-source-regex');

    primary.union(fallback);
    expect(primary.union(fallback)).toBe(0);
    expect(primary.size).toBe(2);
  });
});
