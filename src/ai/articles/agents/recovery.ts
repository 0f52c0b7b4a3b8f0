/**
 * Recovery Advisor Agent
 *
 * Consulted once per section after its plain research attempts are spent.
 * Proposes fresh queries from the failure message; the section's id, title
 * and key points carry over from the plan.
 */

import type { LanguageModel } from 'ai';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { ImprovedSectionPlan, RunConfig } from '../article-schemas';
import { PLAN_CONSTRAINTS, TEMPERATURES } from '../config';
import { getRecoverySystemPrompt, getRecoveryUserPrompt } from '../prompts';
import { withRetry } from '../retry';
import type { TokenUsage } from '../types';
import { createAttemptSignal, toTokenUsage } from './llm-call';
import type { RecoveryAdvisorInput } from './text-generation-agent';

export interface RecoveryAdvisorDeps {
  readonly generateObject: typeof import('ai').generateObject;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly temperature?: number;
}

export interface RecoveryAdvisorOutput {
  readonly plan: ImprovedSectionPlan;
  readonly tokenUsage: TokenUsage;
}

const RecoveryLlmSchema = z.object({
  researchQueries: z
    .array(z.string().min(1))
    .min(PLAN_CONSTRAINTS.MIN_RECOVERY_QUERIES)
    .max(PLAN_CONSTRAINTS.MAX_RECOVERY_QUERIES),
  improvementRationale: z.string(),
});

export async function runRecoveryAdvisor(
  input: RecoveryAdvisorInput,
  context: RunConfig,
  deps: RecoveryAdvisorDeps
): Promise<RecoveryAdvisorOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Recovery]');
  const { plan } = input;

  log.info(`Improving queries for "${plan.title}" after: ${input.failureReason}`);

  const { object, usage } = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        temperature: deps.temperature ?? TEMPERATURES.RECOVERY,
        schema: RecoveryLlmSchema,
        system: getRecoverySystemPrompt(context.title, context.description),
        prompt: getRecoveryUserPrompt({
          title: context.title,
          description: context.description,
          brief: input.brief,
          plan,
          failureReason: input.failureReason,
        }),
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: `Recovery advice for "${plan.title}"`, signal: deps.signal }
  );

  return {
    plan: {
      sectionId: plan.sectionId,
      title: plan.title,
      keyPoints: plan.keyPoints,
      researchQueries: object.researchQueries.map((query) => query.trim()),
      improvementRationale: object.improvementRationale,
    },
    tokenUsage: toTokenUsage(usage),
  };
}
