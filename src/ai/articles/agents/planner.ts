/**
 * Planner Agent
 *
 * Splits the article into sections, each with key points and research
 * queries, and writes the article brief. Section ids are assigned here,
 * never by the model.
 */

import type { LanguageModel } from 'ai';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { ArticleBriefSchema, type SectionPlans } from '../article-schemas';
import { PLAN_CONSTRAINTS, TEMPERATURES } from '../config';
import { getPlannerSystemPrompt, getPlannerUserPrompt } from '../prompts';
import { withRetry } from '../retry';
import type { TokenUsage } from '../types';
import { createAttemptSignal, toTokenUsage } from './llm-call';
import type { PlannerInput } from './text-generation-agent';

// ============================================================================
// Types
// ============================================================================

export interface PlannerDeps {
  readonly generateObject: typeof import('ai').generateObject;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  /** Optional AbortSignal for cancellation support */
  readonly signal?: AbortSignal;
  /** Optional temperature override (default: TEMPERATURES.PLANNER) */
  readonly temperature?: number;
}

export interface PlannerOutput {
  readonly plans: SectionPlans;
  readonly tokenUsage: TokenUsage;
}

/**
 * Plan shape the model fills in. No section ids and no uniqueness
 * refinement, which the JSON schema conversion cannot express.
 */
const PlannerLlmSchema = z.object({
  sections: z
    .array(
      z.object({
        title: z.string().min(1),
        keyPoints: z.array(z.string()),
        researchQueries: z.array(z.string()),
      })
    )
    .min(PLAN_CONSTRAINTS.MIN_SECTIONS)
    .max(PLAN_CONSTRAINTS.MAX_SECTIONS),
  brief: ArticleBriefSchema,
});

export function createSectionId(index: number): string {
  return `section-${index + 1}`;
}

// ============================================================================
// Main Planner Function
// ============================================================================

export async function runPlanner(input: PlannerInput, deps: PlannerDeps): Promise<PlannerOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Planner]');
  const temperature = deps.temperature ?? TEMPERATURES.PLANNER;

  const systemPrompt = getPlannerSystemPrompt();
  const userPrompt = getPlannerUserPrompt(input);

  log.info(`Planning "${input.title}" (${input.wordCount} words)...`);

  const { object, usage } = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        temperature,
        schema: PlannerLlmSchema,
        system: systemPrompt,
        prompt: userPrompt,
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: 'Planner section plan generation', signal: deps.signal }
  );

  const plans: SectionPlans = {
    sections: object.sections.map((section, index) => {
      const queries = section.researchQueries
        .map((query) => query.trim())
        .filter((query) => query.length > 0)
        .slice(0, PLAN_CONSTRAINTS.MAX_RESEARCH_QUERIES_PER_SECTION);
      return {
        sectionId: createSectionId(index),
        title: section.title.trim(),
        keyPoints: section.keyPoints,
        ...(queries.length > 0 ? { researchQueries: queries } : {}),
      };
    }),
    brief: object.brief,
  };

  log.info(`Planned ${plans.sections.length} sections: ${plans.sections.map((s) => s.title).join(' | ')}`);

  return { plans, tokenUsage: toTokenUsage(usage) };
}
