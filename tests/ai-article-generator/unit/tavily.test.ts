/**
 * Unit tests for the Tavily API wrapper
 *
 * Uses the global MSW server from tests/setup.ts.
 * The global server has a default Tavily handler that we override per-test.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { http, HttpResponse } from 'msw';

import {
  createTavilySearchService,
  isTavilyConfigured,
  tavilySearch,
  TAVILY_SEARCH_URL,
} from '../../../src/ai/tools/tavily';
import { server } from '../../mocks/server';
import { createMockLogger } from '../helpers/fixtures';

describe('Tavily API Wrapper', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    server.resetHandlers();
  });

  describe('isTavilyConfigured', () => {
    it('returns false when TAVILY_API_KEY is not set', () => {
      vi.stubEnv('TAVILY_API_KEY', '');
      expect(isTavilyConfigured()).toBe(false);
    });

    it('returns true when TAVILY_API_KEY is set', () => {
      vi.stubEnv('TAVILY_API_KEY', 'test-secret');
      expect(isTavilyConfigured()).toBe(true);
    });
  });

  describe('tavilySearch', () => {
    it('returns empty results when API key is not configured', async () => {
      vi.stubEnv('TAVILY_API_KEY', '');

      const result = await tavilySearch('ai demand forecasting');

      expect(result.query).toBe('ai demand forecasting');
      expect(result.results).toHaveLength(0);
    });

    it('returns empty results for empty query', async () => {
      const result = await tavilySearch('   ', { apiKey: 'test-secret' });

      expect(result.query).toBe('');
      expect(result.results).toHaveLength(0);
    });

    it('parses results and cost from the default handler', async () => {
      const result = await tavilySearch('  ai demand forecasting  ', { apiKey: 'test-secret' });

      expect(result.query).toBe('ai demand forecasting');
      expect(result.results.map((r) => r.url)).toEqual([
        'https://example.com/forecasting',
        'https://example.com/warehouses',
        'https://example.com/routing',
      ]);
      expect(result.results[2]?.content).toBeUndefined();
      expect(result.costUsd).toBeCloseTo(0.008);
    });

    it('sends the key and request options', async () => {
      let authorization: string | null = null;
      let body: unknown = null;
      server.use(
        http.post(TAVILY_SEARCH_URL, async ({ request }) => {
          authorization = request.headers.get('authorization');
          body = await request.json();
          return HttpResponse.json({ results: [] });
        })
      );

      await tavilySearch('route optimization', { apiKey: 'test-secret', maxResults: 50 });

      expect(authorization).toBe('Bearer test-secret');
      expect(body).toMatchObject({
        query: 'route optimization',
        search_depth: 'basic',
        max_results: 20,
        include_raw_content: false,
        exclude_domains: ['youtube.com'],
      });
    });

    it('returns empty results on HTTP errors', async () => {
      server.use(http.post(TAVILY_SEARCH_URL, () => HttpResponse.json({ error: 'rate limited' }, { status: 429 })));

      const result = await tavilySearch('inventory optimization', { apiKey: 'test-secret' });

      expect(result.results).toHaveLength(0);
    });

    it('returns empty results on network errors', async () => {
      server.use(http.post(TAVILY_SEARCH_URL, () => HttpResponse.error()));

      const result = await tavilySearch('inventory optimization', { apiKey: 'test-secret' });

      expect(result.results).toHaveLength(0);
    });

    it('drops malformed entries individually', async () => {
      server.use(
        http.post(TAVILY_SEARCH_URL, () =>
          HttpResponse.json({
            results: [
              { title: 'Valid', url: 'https://example.com/valid', content: 'Kept' },
              { title: '', url: 'https://example.com/untitled' },
              { url: 'https://example.com/missing-title' },
              'not an object',
            ],
          })
        )
      );

      const result = await tavilySearch('warehouse robotics', { apiKey: 'test-secret' });

      expect(result.results).toEqual([{ title: 'Valid', url: 'https://example.com/valid', content: 'Kept' }]);
      expect(result.costUsd).toBeUndefined();
    });
  });

  describe('createTavilySearchService', () => {
    it('maps results to hits and falls back to the title for the snippet', async () => {
      const logger = createMockLogger();
      const search = createTavilySearchService({ apiKey: 'test-secret', logger });

      const hits = await search.query('ai demand forecasting', 3);

      expect(hits).toEqual([
        { url: 'https://example.com/forecasting', snippet: 'How retailers use machine learning to forecast demand.' },
        { url: 'https://example.com/warehouses', snippet: 'Robotics and computer vision in modern warehouses.' },
        { url: 'https://example.com/routing', snippet: 'Route optimization case study' },
      ]);
      expect(logger.debug).toHaveBeenCalledWith('"ai demand forecasting": 3 results ($0.008)');
    });

    it('caps hits at maxResults', async () => {
      const search = createTavilySearchService({ apiKey: 'test-secret', logger: createMockLogger() });

      const hits = await search.query('ai demand forecasting', 1);

      expect(hits).toHaveLength(1);
    });
  });
});
