import { describe, expect, it } from 'vitest';

import type { ResearchNotes } from '../../../src/ai/articles/article-schemas';
import {
  augmentResearchNotes,
  collectSourceUrls,
  mergeScrapedContent,
} from '../../../src/ai/articles/content-augmentation';
import { createFakeContentFetch, createMockLogger, pageTextFor } from '../helpers/fixtures';

const notes: ResearchNotes = {
  notesBySection: [
    {
      sectionId: 'section-1',
      summary: 'Forecasting',
      findings: [
        { sourceUrl: 'https://example.com/forecasting', snippet: 'ML forecasts', relevanceScore: null },
        { sourceUrl: 'https://example.com/report.pdf', snippet: 'Annual report', relevanceScore: null },
      ],
    },
    {
      sectionId: 'section-2',
      summary: 'Routing',
      findings: [
        { sourceUrl: 'https://example.com/forecasting', snippet: 'Cited again', relevanceScore: null },
        { sourceUrl: 'https://example.com/routing', snippet: 'Route planning', relevanceScore: null },
      ],
    },
  ],
};

describe('collectSourceUrls', () => {
  it('returns every finding URL once, in first-seen order', () => {
    expect(collectSourceUrls(notes)).toEqual([
      'https://example.com/forecasting',
      'https://example.com/report.pdf',
      'https://example.com/routing',
    ]);
  });
});

describe('mergeScrapedContent', () => {
  it('sets scraped content only on findings whose URL was fetched', () => {
    const merged = mergeScrapedContent(notes, new Map([['https://example.com/routing', 'Routing page']]));

    expect(merged.notesBySection[1]?.findings[1]?.scrapedContent).toBe('Routing page');
    expect(merged.notesBySection[0]?.findings[0]?.scrapedContent).toBeUndefined();
    // Input is not mutated
    expect(notes.notesBySection[1]?.findings[1]?.scrapedContent).toBeUndefined();
  });
});

describe('augmentResearchNotes', () => {
  it('fetches eligible URLs and attaches their text to every matching finding', async () => {
    const contentFetch = createFakeContentFetch();
    const logger = createMockLogger();

    const result = await augmentResearchNotes(notes, { contentFetch, logger });

    expect(contentFetch.fetchMany).toHaveBeenCalledWith(['https://example.com/forecasting', 'https://example.com/routing']);
    expect(result.stats).toEqual({ totalUrls: 3, eligibleUrls: 2, fetchedUrls: 2, skippedUrls: 1, degraded: false });
    expect(logger.info).toHaveBeenCalledWith('Skipping 1 non-HTML source(s)');

    const [first, second] = result.notes.notesBySection;
    expect(first?.findings[0]?.scrapedContent).toBe(pageTextFor('https://example.com/forecasting'));
    expect(first?.findings[1]?.scrapedContent).toBeUndefined();
    expect(second?.findings[0]?.scrapedContent).toBe(pageTextFor('https://example.com/forecasting'));
  });

  it('passes notes through unchanged when the fetch service fails', async () => {
    const contentFetch = createFakeContentFetch();
    contentFetch.fetchMany.mockRejectedValueOnce(new Error('socket hang up'));
    const logger = createMockLogger();

    const result = await augmentResearchNotes(notes, { contentFetch, logger });

    expect(result.notes).toBe(notes);
    expect(result.stats).toEqual({ totalUrls: 3, eligibleUrls: 2, fetchedUrls: 0, skippedUrls: 1, degraded: true });
    expect(logger.warn).toHaveBeenCalledWith('Content fetch failed, continuing with search snippets only: socket hang up');
  });

  it('ignores pages the service returns for URLs it was not asked for', async () => {
    const contentFetch = createFakeContentFetch();
    contentFetch.fetchMany.mockResolvedValueOnce(
      new Map([
        ['https://example.com/routing', 'Routing page'],
        ['https://example.com/unrelated', 'Unrelated page'],
      ])
    );

    const result = await augmentResearchNotes(notes, { contentFetch, logger: createMockLogger() });

    expect(result.stats.fetchedUrls).toBe(1);
  });

  it('skips the fetch entirely when no URL is eligible', async () => {
    const contentFetch = createFakeContentFetch();
    const pdfOnly: ResearchNotes = {
      notesBySection: [
        {
          sectionId: 'section-1',
          summary: 'Reports',
          findings: [{ sourceUrl: 'https://example.com/files/report.pdf/download', snippet: 'PDF', relevanceScore: null }],
        },
      ],
    };

    const result = await augmentResearchNotes(pdfOnly, { contentFetch, logger: createMockLogger() });

    expect(contentFetch.fetchMany).not.toHaveBeenCalled();
    expect(result.stats).toEqual({ totalUrls: 1, eligibleUrls: 0, fetchedUrls: 0, skippedUrls: 1, degraded: false });
  });
});
