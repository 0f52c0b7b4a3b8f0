import { http, HttpResponse } from 'msw';
import { describe, expect, it } from 'vitest';

import {
  capWords,
  cleanScrapedContent,
  createContentFetchService,
  extractMainText,
} from '../../../src/ai/articles/services/content-fetch-service';
import { server } from '../../mocks/server';
import { createMockLogger } from '../helpers/fixtures';

const LONG_PARAGRAPH =
  'Machine learning models now forecast demand for thousands of products at once, ' +
  'combining sales history with weather, promotions and regional events.';

describe('capWords', () => {
  it('keeps the first N words and their original spacing', () => {
    expect(capWords('one  two\nthree four', 3)).toBe('one  two\nthree');
  });

  it('returns short text unchanged', () => {
    expect(capWords('one two', 5)).toBe('one two');
  });
});

describe('cleanScrapedContent', () => {
  it('drops images, empties link targets and collapses blank lines', () => {
    expect(cleanScrapedContent('Intro ![chart](https://x.io/c.png)\n\n\nSee [docs](https://x.io/d)')).toBe(
      'Intro \nSee [docs]()'
    );
  });

  it('removes inline image tags and links left without text', () => {
    expect(cleanScrapedContent('A <img src="a.png" alt="x"> B [ ](https://x.io) C')).toBe('A  B  C');
  });

  it('normalizes Windows line endings', () => {
    expect(cleanScrapedContent('one\r\n\r\ntwo')).toBe('one\ntwo');
  });

  it('caps the word count', () => {
    expect(cleanScrapedContent('a b c d e f', 4)).toBe('a b c d');
  });
});

describe('extractMainText', () => {
  it('prefers <main> and strips scripts and navigation', () => {
    const html =
      '<html><body><nav>Site menu</nav><main><h1>Forecasting</h1><p>Useful text.</p>' +
      '<script>track()</script></main><footer>Copyright</footer></body></html>';

    const text = extractMainText(html);

    expect(text).toContain('Forecasting');
    expect(text).toContain('Useful text.');
    expect(text).not.toContain('Site menu');
    expect(text).not.toContain('track()');
    expect(text).not.toContain('Copyright');
  });

  it('falls back to <body> when there is no main or article', () => {
    expect(extractMainText('<html><body><p>Plain body</p></body></html>')).toContain('Plain body');
  });
});

describe('createContentFetchService', () => {
  it('returns cleaned text for pages that fetched, keyed by URL', async () => {
    server.use(
      http.get('https://pages.example.com/html', () =>
        HttpResponse.html(`<html><body><article><p>${LONG_PARAGRAPH}</p></article></body></html>`)
      ),
      http.get('https://pages.example.com/text', () => HttpResponse.text(LONG_PARAGRAPH)),
      http.get('https://pages.example.com/missing', () => new HttpResponse(null, { status: 404 })),
      http.get('https://pages.example.com/short', () => HttpResponse.text('Too short')),
      http.get(
        'https://pages.example.com/binary',
        () => new HttpResponse(new Uint8Array([1, 2, 3]), { headers: { 'Content-Type': 'application/octet-stream' } })
      )
    );
    const logger = createMockLogger();
    const service = createContentFetchService({ logger });

    const pages = await service.fetchMany([
      'https://pages.example.com/html',
      'https://pages.example.com/text',
      'https://pages.example.com/missing',
      'https://pages.example.com/short',
      'https://pages.example.com/binary',
    ]);

    expect([...pages.keys()]).toEqual(['https://pages.example.com/html', 'https://pages.example.com/text']);
    expect(pages.get('https://pages.example.com/text')).toBe(LONG_PARAGRAPH);
    expect(pages.get('https://pages.example.com/html')).toContain('Machine learning models now forecast demand');
    expect(logger.info).toHaveBeenCalledWith('Fetched 2/5 pages');
  });

  it('applies the word cap to fetched pages', async () => {
    server.use(http.get('https://pages.example.com/capped', () => HttpResponse.text(LONG_PARAGRAPH)));
    const service = createContentFetchService({ maxWords: 3, minContentLength: 0, logger: createMockLogger() });

    const pages = await service.fetchMany(['https://pages.example.com/capped']);

    expect(pages.get('https://pages.example.com/capped')).toBe('Machine learning models');
  });

  it('returns an empty map for no URLs', async () => {
    const service = createContentFetchService({ logger: createMockLogger() });
    expect((await service.fetchMany([])).size).toBe(0);
  });
});
