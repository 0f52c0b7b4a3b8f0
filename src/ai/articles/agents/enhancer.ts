/**
 * Enhancer Agent
 *
 * Final polish of the composed article plus an HTML rendering for preview.
 * Length checks on the result happen in the caller.
 */

import type { LanguageModel } from 'ai';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { EnhancedArticleSchema, type EnhancedArticle } from '../article-schemas';
import { TEMPERATURES } from '../config';
import { getEnhancerSystemPrompt, getEnhancerUserPrompt } from '../prompts';
import { withRetry } from '../retry';
import type { TokenUsage } from '../types';
import { createAttemptSignal, toTokenUsage } from './llm-call';
import type { EnhancerInput } from './text-generation-agent';

export interface EnhancerDeps {
  readonly generateObject: typeof import('ai').generateObject;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly temperature?: number;
}

export interface EnhancerOutput {
  readonly article: EnhancedArticle;
  readonly tokenUsage: TokenUsage;
}

export async function runEnhancer(input: EnhancerInput, deps: EnhancerDeps): Promise<EnhancerOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Enhancer]');
  log.info(`Enhancing "${input.title}" (${input.fullText.length} chars)`);

  const { object, usage } = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        temperature: deps.temperature ?? TEMPERATURES.ENHANCER,
        schema: EnhancedArticleSchema,
        system: getEnhancerSystemPrompt(),
        prompt: getEnhancerUserPrompt(input),
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: 'Enhancer polish', signal: deps.signal }
  );

  return { article: object, tokenUsage: toTokenUsage(usage) };
}
