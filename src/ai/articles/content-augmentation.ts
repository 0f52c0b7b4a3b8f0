/**
 * Content Augmentation
 *
 * Attaches fetched page text to research findings. Never fatal: if the fetch
 * service fails as a whole, the notes pass through unchanged and the stats
 * record the degradation.
 */

import type { Logger } from '../../utils/logger';
import type { AugmentedResearch, ResearchNotes } from './article-schemas';
import type { ContentFetchService } from './services/content-fetch-service';
import { getErrorMessage } from './types';
import { isFetchableUrl, uniqueUrls } from './utils/url-utils';

export interface ContentAugmentationDeps {
  readonly contentFetch: ContentFetchService;
  readonly logger: Logger;
}

/**
 * Every finding URL across all sections, de-duplicated in first-seen order.
 */
export function collectSourceUrls(notes: ResearchNotes): string[] {
  return uniqueUrls(notes.notesBySection.flatMap((entry) => entry.findings.map((finding) => finding.sourceUrl)));
}

/**
 * Returns new notes with `scrapedContent` set on every finding whose URL was fetched.
 * Findings whose URL was not fetched keep whatever they had.
 */
export function mergeScrapedContent(notes: ResearchNotes, pages: ReadonlyMap<string, string>): ResearchNotes {
  return {
    notesBySection: notes.notesBySection.map((entry) => ({
      ...entry,
      findings: entry.findings.map((finding) => {
        const content = pages.get(finding.sourceUrl.trim());
        return content !== undefined ? { ...finding, scrapedContent: content } : finding;
      }),
    })),
  };
}

export async function augmentResearchNotes(
  notes: ResearchNotes,
  deps: ContentAugmentationDeps
): Promise<AugmentedResearch> {
  const { contentFetch, logger: log } = deps;

  const allUrls = collectSourceUrls(notes);
  const eligibleUrls = allUrls.filter(isFetchableUrl);
  const skippedUrls = allUrls.length - eligibleUrls.length;

  if (skippedUrls > 0) {
    log.info(`Skipping ${skippedUrls} non-HTML source(s)`);
  }

  if (eligibleUrls.length === 0) {
    return {
      notes,
      stats: { totalUrls: allUrls.length, eligibleUrls: 0, fetchedUrls: 0, skippedUrls, degraded: false },
    };
  }

  let pages: ReadonlyMap<string, string>;
  try {
    pages = await contentFetch.fetchMany(eligibleUrls);
  } catch (error) {
    log.warn(`Content fetch failed, continuing with search snippets only: ${getErrorMessage(error)}`);
    return {
      notes,
      stats: { totalUrls: allUrls.length, eligibleUrls: eligibleUrls.length, fetchedUrls: 0, skippedUrls, degraded: true },
    };
  }

  // Only URLs that were asked for count, whatever the service returned
  const fetched = new Map([...pages].filter(([url]) => eligibleUrls.includes(url)));

  return {
    notes: mergeScrapedContent(notes, fetched),
    stats: {
      totalUrls: allUrls.length,
      eligibleUrls: eligibleUrls.length,
      fetchedUrls: fetched.size,
      skippedUrls,
      degraded: false,
    },
  };
}
