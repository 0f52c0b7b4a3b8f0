/**
 * Article Pipeline Agents
 *
 * LLM-backed implementation of the TextGenerationAgent contract:
 * - Planner: sections, key points, research queries and the brief
 * - Researcher: search-backed notes per section, or for all sections at once
 * - Recovery advisor: fresh queries after research keeps failing
 * - Synthesizer: drafts and edits one section
 * - Composer: the structured final article
 * - Enhancer: final polish and HTML rendering
 */

import type { LanguageModel } from 'ai';

import type { Logger } from '../../../utils/logger';
import type { AITaskKey } from '../../config/utils';
import type { SearchService } from '../../tools/tavily';
import { addTokenUsage, createEmptyTokenUsage, type TokenUsage } from '../types';
import { runComposer } from './composer';
import { runEnhancer } from './enhancer';
import { runPlanner } from './planner';
import { runRecoveryAdvisor } from './recovery';
import { runBatchResearcher, runResearcher } from './researcher';
import { runSynthesizer } from './synthesizer';
import { createRoleDispatchAgent, type TextGenerationAgent } from './text-generation-agent';

export * from './text-generation-agent';
export { runPlanner, createSectionId, type PlannerDeps, type PlannerOutput } from './planner';
export {
  runResearcher,
  runBatchResearcher,
  gatherSearchHits,
  type ResearcherDeps,
  type ResearcherOutput,
  type BatchResearcherOutput,
} from './researcher';
export { runRecoveryAdvisor, type RecoveryAdvisorDeps, type RecoveryAdvisorOutput } from './recovery';
export { runSynthesizer, type SynthesizerDeps, type SynthesizerOutput } from './synthesizer';
export { runComposer, type ComposerDeps, type ComposerOutput } from './composer';
export { runEnhancer, type EnhancerDeps, type EnhancerOutput } from './enhancer';

export interface AiAgentDeps {
  readonly generateObject: typeof import('ai').generateObject;
  readonly generateText: typeof import('ai').generateText;
  /** Model per role; see getModel() for env overrides */
  readonly models: Readonly<Record<AITaskKey, LanguageModel>>;
  readonly search: SearchService;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

export interface AiTextGenerationAgent extends TextGenerationAgent {
  /** Tokens spent by every role call so far */
  getTokenUsage(): TokenUsage;
}

/**
 * Builds the LLM-backed agent.
 *
 * @example
 * const agent = createAiTextGenerationAgent({
 *   generateObject,
 *   generateText,
 *   models: { PLANNER: openrouter(getModel('PLANNER')), ... },
 *   search: createTavilySearchService(),
 * });
 */
export function createAiTextGenerationAgent(deps: AiAgentDeps): AiTextGenerationAgent {
  const { generateObject, generateText, models, search, logger, signal } = deps;
  const shared = { generateObject, logger, signal };
  let tokenUsage = createEmptyTokenUsage();

  const track = <T extends { readonly tokenUsage: TokenUsage }>(output: T): T => {
    tokenUsage = addTokenUsage(tokenUsage, output.tokenUsage);
    return output;
  };

  const agent = createRoleDispatchAgent({
    planner: async (input) => track(await runPlanner(input, { ...shared, model: models.PLANNER })).plans,
    researcher: async (input) =>
      track(await runResearcher(input, { ...shared, model: models.RESEARCHER, search })).notes,
    batchResearcher: async (input) =>
      track(await runBatchResearcher(input, { ...shared, model: models.RESEARCHER, search })).notes,
    recoveryAdvisor: async (input, context) =>
      track(await runRecoveryAdvisor(input, context, { ...shared, model: models.RECOVERY })).plan,
    synthesizer: async (input) =>
      track(await runSynthesizer(input, { ...shared, generateText, model: models.SYNTHESIZER })).section,
    composer: async (input, context) =>
      track(await runComposer(input, context, { ...shared, model: models.COMPOSER })).article,
    enhancer: async (input) => track(await runEnhancer(input, { ...shared, model: models.ENHANCER })).article,
  });

  return {
    run: agent.run,
    getTokenUsage: () => tokenUsage,
  };
}
