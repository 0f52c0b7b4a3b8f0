/**
 * Tavily Web Search API wrapper.
 *
 * Pricing: $0.008 per credit (basic=1, advanced=2)
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 *
 * The research role only needs `{url, snippet}` pairs, so results are
 * requested without raw page content; full pages are fetched later by the
 * content augmentation phase.
 */

import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../utils/logger';

export type TavilySearchDepth = 'basic' | 'advanced';

export interface TavilySearchOptions {
  readonly searchDepth?: TavilySearchDepth;
  readonly maxResults?: number;
  readonly timeoutMs?: number;
  /**
   * Domains to exclude from search results.
   * YouTube is recommended: video pages have no useful text content.
   */
  readonly excludeDomains?: readonly string[];
  /** Overrides TAVILY_API_KEY */
  readonly apiKey?: string;
}

export interface TavilySearchResult {
  readonly title: string;
  readonly url: string;
  readonly content?: string;
  readonly score?: number;
}

export interface TavilySearchResponse {
  readonly query: string;
  readonly results: readonly TavilySearchResult[];
  /** Calculated cost in USD based on credits ($0.008/credit) */
  readonly costUsd?: number;
}

/**
 * One search hit as the research role consumes it.
 */
export interface SearchHit {
  readonly url: string;
  readonly snippet: string;
}

/**
 * Search collaborator used by the research role.
 * Implementations never throw; failures yield an empty list.
 */
export interface SearchService {
  query(queryString: string, maxResults: number): Promise<readonly SearchHit[]>;
}

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

/** Cost per Tavily credit in USD */
const TAVILY_COST_PER_CREDIT = 0.008;

const DEFAULT_EXCLUDED_DOMAINS = ['youtube.com'] as const;

export function isTavilyConfigured(): boolean {
  return Boolean(process.env.TAVILY_API_KEY);
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

const TavilyResultSchema = z.object({
  title: z.string().trim().min(1),
  url: z.string().trim().min(1),
  content: z.string().optional(),
  score: z.number().optional(),
});

const TavilyResponseSchema = z.object({
  results: z.array(z.unknown()).default([]),
  usage: z.object({ credits: z.number() }).optional(),
});

function parseTavilyResponse(query: string, raw: unknown): TavilySearchResponse {
  const parsed = TavilyResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return { query, results: [] };
  }

  // Malformed entries are dropped individually
  const results = parsed.data.results.flatMap((entry): TavilySearchResult[] => {
    const result = TavilyResultSchema.safeParse(entry);
    if (!result.success) return [];
    const content = result.data.content?.trim();
    return [
      {
        title: result.data.title,
        url: result.data.url,
        ...(content ? { content } : {}),
        ...(result.data.score !== undefined ? { score: result.data.score } : {}),
      },
    ];
  });

  const credits = parsed.data.usage?.credits;
  return {
    query,
    results,
    ...(credits !== undefined ? { costUsd: credits * TAVILY_COST_PER_CREDIT } : {}),
  };
}

/**
 * Tavily search wrapper.
 *
 * If `TAVILY_API_KEY` is not configured, or the request fails, returns empty
 * results so callers can degrade gracefully.
 */
export async function tavilySearch(
  query: string,
  options: TavilySearchOptions = {}
): Promise<TavilySearchResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0) {
    return { query: cleanedQuery, results: [] };
  }

  const apiKey = options.apiKey ?? process.env.TAVILY_API_KEY;
  if (!apiKey) {
    return { query: cleanedQuery, results: [] };
  }

  const timeoutMs = clampInt(options.timeoutMs ?? 15_000, 1_000, 60_000);
  const excludeDomains = options.excludeDomains ?? DEFAULT_EXCLUDED_DOMAINS;

  try {
    const res = await fetch(TAVILY_SEARCH_URL, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        query: cleanedQuery,
        search_depth: options.searchDepth ?? 'basic',
        max_results: clampInt(options.maxResults ?? 5, 1, 20), // Tavily allows up to 20
        include_answer: false,
        include_raw_content: false,
        include_usage: true,
        ...(excludeDomains.length > 0 ? { exclude_domains: [...excludeDomains] } : {}),
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!res.ok) {
      return { query: cleanedQuery, results: [] };
    }

    const json: unknown = await res.json();
    return parseTavilyResponse(cleanedQuery, json);
  } catch {
    return { query: cleanedQuery, results: [] };
  }
}

/**
 * Creates the search collaborator backed by Tavily.
 *
 * @example
 * const search = createTavilySearchService();
 * const hits = await search.query('AI demand forecasting in logistics', 3);
 */
export function createTavilySearchService(
  options: Omit<TavilySearchOptions, 'maxResults'> & { readonly logger?: Logger } = {}
): SearchService {
  const log = options.logger ?? createPrefixedLogger('[Tavily]');

  return {
    async query(queryString: string, maxResults: number): Promise<readonly SearchHit[]> {
      const response = await tavilySearch(queryString, { ...options, maxResults });
      log.debug(
        `"${response.query}": ${response.results.length} results` +
          (response.costUsd !== undefined ? ` ($${response.costUsd.toFixed(3)})` : '')
      );
      return response.results
        .slice(0, maxResults)
        .map((result) => ({ url: result.url, snippet: result.content ?? result.title }));
    },
  };
}
