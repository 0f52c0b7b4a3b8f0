/**
 * Content Fetch Service
 *
 * Fetches source pages concurrently and turns them into cleaned, word-capped
 * text for the synthesis prompts. Failures are per URL: a URL that cannot be
 * fetched, is not text, or has too little content is absent from the result.
 */

import { parse } from 'node-html-parser';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { fanOut } from '../concurrent-fan-out';
import { CONTENT_FETCH_CONFIG } from '../config';
import { getErrorMessage, ToolFailureError } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface ContentFetchService {
  /**
   * Returns cleaned text keyed by URL. Absent keys mean the fetch failed.
   */
  fetchMany(urls: readonly string[]): Promise<ReadonlyMap<string, string>>;
}

export interface ContentFetchOptions {
  readonly timeoutMs?: number;
  readonly concurrency?: number;
  readonly maxWords?: number;
  readonly minContentLength?: number;
  readonly logger?: Logger;
}

// ============================================================================
// Cleaning
// ============================================================================

/**
 * Keeps the first `maxWords` whitespace-separated words, preserving the
 * original spacing between them.
 */
export function capWords(text: string, maxWords: number): string {
  const wordPattern = /\S+/g;
  let count = 0;
  let match: RegExpExecArray | null;
  while ((match = wordPattern.exec(text)) !== null) {
    count += 1;
    if (count === maxWords) {
      return text.slice(0, match.index + match[0].length);
    }
  }
  return text;
}

/**
 * Cleans fetched page text before it is stored on a finding.
 *
 * @example
 * cleanScrapedContent('Intro ![chart](https://x.io/c.png)\n\n\nSee [docs](https://x.io/d)')
 * // → 'Intro \nSee [docs]()'
 */
export function cleanScrapedContent(text: string, maxWords: number = CONTENT_FETCH_CONFIG.MAX_WORDS): string {
  const cleaned = text
    .replace(/\r\n?/g, '\n')
    .replace(/!\[.*?\]\(.*?\)/g, '') // markdown images
    .replace(/<img .*?>/gi, '') // inline image tags
    .replace(/\(http[^)]*\)/g, '()') // bare link targets
    .replace(/\[\s*\]\(\)/g, '') // links left with no text
    .replace(/\n{2,}/g, '\n')
    .trim();
  return capWords(cleaned, maxWords);
}

/**
 * Extracts the main readable text from an HTML document.
 * Prefers <main>, then <article>, then <body>.
 */
export function extractMainText(html: string): string {
  const root = parse(html);
  const main = root.querySelector('main') ?? root.querySelector('article') ?? root.querySelector('body') ?? root;
  main.querySelectorAll('script,style,noscript,nav,header,footer,aside').forEach((node) => node.remove());
  return main.structuredText;
}

// ============================================================================
// Fetching
// ============================================================================

/**
 * Creates the HTTP-backed content fetch service.
 *
 * @example
 * const fetcher = createContentFetchService({ concurrency: 3 });
 * const pages = await fetcher.fetchMany(['https://example.com/a', 'https://example.com/b']);
 */
export function createContentFetchService(options: ContentFetchOptions = {}): ContentFetchService {
  const timeoutMs = options.timeoutMs ?? CONTENT_FETCH_CONFIG.TIMEOUT_MS;
  const concurrency = options.concurrency ?? CONTENT_FETCH_CONFIG.CONCURRENCY;
  const maxWords = options.maxWords ?? CONTENT_FETCH_CONFIG.MAX_WORDS;
  const minContentLength = options.minContentLength ?? CONTENT_FETCH_CONFIG.MIN_CONTENT_LENGTH;
  const log = options.logger ?? createPrefixedLogger('[ContentFetch]');

  const fetchOne = async (url: string): Promise<string> => {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': CONTENT_FETCH_CONFIG.USER_AGENT,
          Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.5',
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new ToolFailureError('fetch', `${url}: ${getErrorMessage(error)}`, error instanceof Error ? error : undefined);
    }

    if (!response.ok) {
      throw new ToolFailureError('fetch', `${url} responded with HTTP ${response.status}`);
    }

    const contentType = response.headers.get('content-type')?.toLowerCase() ?? '';
    const body = await response.text();

    let text: string;
    if (contentType.includes('html')) {
      text = extractMainText(body);
    } else if (contentType.startsWith('text/')) {
      text = body;
    } else {
      throw new ToolFailureError('fetch', `${url} has unsupported content type "${contentType || 'unknown'}"`);
    }

    const cleaned = cleanScrapedContent(text, maxWords);
    if (cleaned.length < minContentLength) {
      throw new ToolFailureError('fetch', `${url} has too little content (${cleaned.length} chars)`);
    }
    return cleaned;
  };

  return {
    async fetchMany(urls: readonly string[]): Promise<ReadonlyMap<string, string>> {
      const results = await fanOut(urls, fetchOne, { concurrency });
      const pages = new Map<string, string>();

      for (const result of results) {
        const url = urls[result.index];
        if (result.status === 'fulfilled') {
          pages.set(url, result.value);
        } else {
          log.debug(`Skipped ${url}: ${getErrorMessage(result.reason)}`);
        }
      }

      log.info(`Fetched ${pages.size}/${urls.length} pages`);
      return pages;
    },
  };
}
