/**
 * Composer Agent
 *
 * Assembles the synthesized sections into the structured final article.
 */

import type { LanguageModel } from 'ai';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { FinalArticleSchema, type FinalArticle, type RunConfig } from '../article-schemas';
import { TEMPERATURES } from '../config';
import { getComposerSystemPrompt, getComposerUserPrompt } from '../prompts';
import { withRetry } from '../retry';
import type { TokenUsage } from '../types';
import { createAttemptSignal, toTokenUsage } from './llm-call';
import type { ComposerInput } from './text-generation-agent';

export interface ComposerDeps {
  readonly generateObject: typeof import('ai').generateObject;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly temperature?: number;
}

export interface ComposerOutput {
  readonly article: FinalArticle;
  readonly tokenUsage: TokenUsage;
}

export async function runComposer(input: ComposerInput, context: RunConfig, deps: ComposerDeps): Promise<ComposerOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Composer]');

  log.info(`Composing "${context.title}" from ${input.synthesizedText.length} chars, ${input.sourceUrls.length} sources`);

  const { object, usage } = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        temperature: deps.temperature ?? TEMPERATURES.COMPOSER,
        schema: FinalArticleSchema,
        system: getComposerSystemPrompt(),
        prompt: getComposerUserPrompt({
          title: context.title,
          description: context.description,
          wordCount: context.wordCount,
          synthesizedText: input.synthesizedText,
          sourceUrls: input.sourceUrls,
        }),
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: 'Composer final article', signal: deps.signal }
  );

  return { article: object, tokenUsage: toTokenUsage(usage) };
}
