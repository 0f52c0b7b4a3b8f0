/**
 * Researcher Agent
 *
 * Runs a section's research queries through the search service and asks the
 * model to summarize what the hits establish. Findings are the search hits
 * themselves, so every sourceUrl is one the search actually returned.
 */

import type { LanguageModel } from 'ai';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { SearchHit, SearchService } from '../../tools/tavily';
import type { Finding, ResearchNotes, SectionPlan, SectionResearchNotes } from '../article-schemas';
import { RESEARCH_CONFIG, TEMPERATURES } from '../config';
import { getResearcherSystemPrompt, getResearcherUserPrompt, type ResearchPromptSection } from '../prompts';
import { withRetry } from '../retry';
import { ToolFailureError, type TokenUsage } from '../types';
import { createAttemptSignal, toTokenUsage } from './llm-call';
import type { BatchResearcherInput, ResearcherInput } from './text-generation-agent';

// ============================================================================
// Types
// ============================================================================

export interface ResearcherDeps {
  readonly generateObject: typeof import('ai').generateObject;
  readonly model: LanguageModel;
  readonly search: SearchService;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly temperature?: number;
  /** Hits kept per query (default: RESEARCH_CONFIG.RESULTS_PER_QUERY) */
  readonly resultsPerQuery?: number;
}

export interface ResearcherOutput {
  readonly notes: SectionResearchNotes;
  readonly tokenUsage: TokenUsage;
}

export interface BatchResearcherOutput {
  readonly notes: ResearchNotes;
  readonly tokenUsage: TokenUsage;
}

const SectionSummarySchema = z.object({
  summary: z.string().min(1),
});

const BatchSummarySchema = z.object({
  notesBySection: z.array(
    z.object({
      sectionId: z.string(),
      summary: z.string(),
    })
  ),
});

// ============================================================================
// Search
// ============================================================================

/**
 * Runs every query of a plan, keeping the first hit per URL.
 */
export async function gatherSearchHits(
  plan: SectionPlan,
  search: SearchService,
  resultsPerQuery: number
): Promise<SearchHit[]> {
  const byUrl = new Map<string, SearchHit>();
  for (const query of plan.researchQueries ?? []) {
    const hits = await search.query(query, resultsPerQuery);
    for (const hit of hits) {
      if (!byUrl.has(hit.url)) byUrl.set(hit.url, hit);
    }
  }
  return [...byUrl.values()];
}

function toFindings(hits: readonly SearchHit[]): Finding[] {
  return hits.map((hit) => ({ sourceUrl: hit.url, snippet: hit.snippet, relevanceScore: null }));
}

function hasQueries(plan: SectionPlan): boolean {
  return (plan.researchQueries?.length ?? 0) > 0;
}

function createNoQueryNotes(plan: SectionPlan): SectionResearchNotes {
  return { sectionId: plan.sectionId, findings: [], summary: RESEARCH_CONFIG.NO_QUERIES_SUMMARY };
}

// ============================================================================
// Individual Research
// ============================================================================

/**
 * Researches one section.
 *
 * A section without queries gets empty findings and no model call.
 *
 * @throws ToolFailureError when no query returned a single hit
 */
export async function runResearcher(input: ResearcherInput, deps: ResearcherDeps): Promise<ResearcherOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Researcher]');
  const { plan, brief } = input;

  if (!hasQueries(plan)) {
    log.info(`"${plan.title}" has no research queries`);
    return { notes: createNoQueryNotes(plan), tokenUsage: toTokenUsage(undefined) };
  }

  const hits = await gatherSearchHits(plan, deps.search, deps.resultsPerQuery ?? RESEARCH_CONFIG.RESULTS_PER_QUERY);
  if (hits.length === 0) {
    throw new ToolFailureError(
      'search',
      `no results for any of ${plan.researchQueries?.length ?? 0} queries for "${plan.title}"`
    );
  }

  log.info(`"${plan.title}": ${hits.length} unique sources`);

  const { object, usage } = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        temperature: deps.temperature ?? TEMPERATURES.RESEARCHER,
        schema: SectionSummarySchema,
        system: getResearcherSystemPrompt(),
        prompt: getResearcherUserPrompt({ brief, sections: [{ plan, hits }] }),
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: `Researcher summary for "${plan.title}"`, signal: deps.signal }
  );

  return {
    notes: { sectionId: plan.sectionId, findings: toFindings(hits), summary: object.summary },
    tokenUsage: toTokenUsage(usage),
  };
}

// ============================================================================
// Batch Research
// ============================================================================

/**
 * Researches every section with one summarizing model call.
 *
 * Sections the model leaves out stay missing from the result; the caller
 * decides what a coverage gap means. Repeated and unknown ids are dropped.
 *
 * @throws ToolFailureError when sections have queries but no query returned a hit
 */
export async function runBatchResearcher(
  input: BatchResearcherInput,
  deps: ResearcherDeps
): Promise<BatchResearcherOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Researcher]');
  const { sections, brief } = input.plans;
  const resultsPerQuery = deps.resultsPerQuery ?? RESEARCH_CONFIG.RESULTS_PER_QUERY;

  const searched: ResearchPromptSection[] = [];
  for (const plan of sections.filter(hasQueries)) {
    searched.push({ plan, hits: await gatherSearchHits(plan, deps.search, resultsPerQuery) });
  }

  const noQueryNotes = sections.filter((plan) => !hasQueries(plan)).map(createNoQueryNotes);
  if (searched.length === 0) {
    return { notes: { notesBySection: noQueryNotes }, tokenUsage: toTokenUsage(undefined) };
  }

  const totalHits = searched.reduce((sum, section) => sum + section.hits.length, 0);
  if (totalHits === 0) {
    throw new ToolFailureError('search', `no results for any query across ${searched.length} sections`);
  }

  log.info(`Batch research: ${totalHits} sources across ${searched.length} sections`);

  const { object, usage } = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        temperature: deps.temperature ?? TEMPERATURES.RESEARCHER,
        schema: BatchSummarySchema,
        system: getResearcherSystemPrompt(),
        prompt: getResearcherUserPrompt({ brief, sections: searched }),
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: 'Batch researcher summary', signal: deps.signal }
  );

  const hitsBySection = new Map(searched.map((section) => [section.plan.sectionId, section.hits] as const));
  const summarized: SectionResearchNotes[] = [];
  for (const entry of object.notesBySection) {
    const hits = hitsBySection.get(entry.sectionId);
    if (!hits || summarized.some((notes) => notes.sectionId === entry.sectionId)) continue;
    summarized.push({ sectionId: entry.sectionId, findings: toFindings(hits), summary: entry.summary });
  }

  return { notes: { notesBySection: [...summarized, ...noQueryNotes] }, tokenUsage: toTokenUsage(usage) };
}
