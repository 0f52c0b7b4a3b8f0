/**
 * URL Utilities
 *
 * Shared URL helpers for research findings and content augmentation.
 */

import { CONTENT_FETCH_CONFIG } from '../config';

/**
 * Normalizes a URL for validation.
 * Removes hash fragments and validates protocol.
 *
 * @returns Normalized URL or null if invalid/non-http(s)
 *
 * @example
 * normalizeUrl('https://example.com/page#section') // 'https://example.com/page'
 * normalizeUrl('ftp://example.com') // null
 */
export function normalizeUrl(url: string): string | null {
  try {
    const u = new URL(url);
    if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
    u.hash = '';
    return u.toString();
  } catch {
    return null;
  }
}

/**
 * Whether a URL points at something text can be extracted from.
 * Office documents and PDFs are excluded, including PDFs served from a path
 * like `/files/report.pdf/download`.
 *
 * @example
 * isFetchableUrl('https://example.com/guide') // true
 * isFetchableUrl('https://example.com/report.PDF?dl=1') // false
 */
export function isFetchableUrl(url: string): boolean {
  if (normalizeUrl(url) === null) return false;

  const path = new URL(url).pathname.toLowerCase();
  if (CONTENT_FETCH_CONFIG.EXCLUDED_EXTENSIONS.some((extension) => path.endsWith(extension))) {
    return false;
  }
  return !path.includes('.pdf');
}

/**
 * De-duplicates URLs, keeping first-seen order. Blank entries are dropped.
 */
export function uniqueUrls(urls: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const url of urls) {
    const trimmed = url.trim();
    if (trimmed.length > 0) seen.add(trimmed);
  }
  return [...seen];
}
