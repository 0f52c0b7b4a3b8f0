/**
 * Text Generation Agent Contract
 *
 * Every LLM-backed step of the pipeline is a role with an explicit input and
 * output shape. Callers dispatch by role tag; the agent validates whatever a
 * role produced against that role's schema before returning it.
 */

import type { ZodType, ZodTypeDef } from 'zod';

import {
  EnhancedArticleSchema,
  FinalArticleSchema,
  ImprovedSectionPlanSchema,
  ResearchNotesSchema,
  SectionPlansSchema,
  SectionResearchNotesSchema,
  SynthesizedSectionSchema,
  type ArticleBrief,
  type EnhancedArticle,
  type FinalArticle,
  type ImprovedSectionPlan,
  type ResearchNotes,
  type RunConfig,
  type SectionPlan,
  type SectionPlans,
  type SectionResearchNotes,
  type SynthesizedSection,
} from '../article-schemas';
import { MalformedOutputError } from '../types';

// ============================================================================
// Role Inputs
// ============================================================================

export interface PlannerInput {
  readonly title: string;
  readonly description: string;
  readonly layout?: string;
  readonly wordCount: number;
}

export interface ResearcherInput {
  readonly plan: SectionPlan;
  readonly brief: ArticleBrief;
}

export interface BatchResearcherInput {
  readonly plans: SectionPlans;
}

export interface RecoveryAdvisorInput {
  readonly plan: SectionPlan;
  readonly brief: ArticleBrief;
  /** Message of the last failed research attempt */
  readonly failureReason: string;
}

export interface SynthesizerInput {
  readonly plan: SectionPlan;
  readonly notes: SectionResearchNotes;
  readonly brief: ArticleBrief;
  /** Words budgeted for this section */
  readonly targetWords: number;
}

export interface ComposerInput {
  readonly synthesizedText: string;
  /** De-duplicated union of every finding URL */
  readonly sourceUrls: readonly string[];
}

export interface EnhancerInput {
  readonly fullText: string;
  readonly title: string;
  readonly description: string;
  readonly wordCount: number;
  readonly layout?: string;
}

// ============================================================================
// Role Map
// ============================================================================

/**
 * Input and output type of every role. The single source for dispatch typing.
 */
export interface AgentRoleIO {
  planner: { input: PlannerInput; output: SectionPlans };
  researcher: { input: ResearcherInput; output: SectionResearchNotes };
  batchResearcher: { input: BatchResearcherInput; output: ResearchNotes };
  recoveryAdvisor: { input: RecoveryAdvisorInput; output: ImprovedSectionPlan };
  synthesizer: { input: SynthesizerInput; output: SynthesizedSection };
  composer: { input: ComposerInput; output: FinalArticle };
  enhancer: { input: EnhancerInput; output: EnhancedArticle };
}

export type AgentRole = keyof AgentRoleIO;
export type AgentInput<R extends AgentRole> = AgentRoleIO[R]['input'];
export type AgentOutput<R extends AgentRole> = AgentRoleIO[R]['output'];

/**
 * Output schema enforced for each role.
 */
export const ROLE_OUTPUT_SCHEMAS: { readonly [R in AgentRole]: ZodType<AgentOutput<R>, ZodTypeDef, unknown> } = {
  planner: SectionPlansSchema,
  researcher: SectionResearchNotesSchema,
  batchResearcher: ResearchNotesSchema,
  recoveryAdvisor: ImprovedSectionPlanSchema,
  synthesizer: SynthesizedSectionSchema,
  composer: FinalArticleSchema,
  enhancer: EnhancedArticleSchema,
};

// ============================================================================
// Agent Contract
// ============================================================================

export interface TextGenerationAgent {
  /**
   * Runs one role.
   *
   * @throws MalformedOutputError when the role's payload fails its schema
   */
  run<R extends AgentRole>(role: R, input: AgentInput<R>, context: RunConfig): Promise<AgentOutput<R>>;
}

/**
 * Produces an unvalidated payload for a role.
 */
export type RoleHandler<R extends AgentRole> = (input: AgentInput<R>, context: RunConfig) => Promise<unknown>;

export type RoleHandlers = { readonly [R in AgentRole]: RoleHandler<R> };

/**
 * Validates a role payload against the role's output schema.
 */
export function parseRoleOutput<R extends AgentRole>(role: R, payload: unknown): AgentOutput<R> {
  const schema: ZodType<AgentOutput<R>, ZodTypeDef, unknown> = ROLE_OUTPUT_SCHEMAS[role];
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedOutputError(role, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Builds an agent that dispatches each role to its handler and validates the result.
 *
 * @example
 * const agent = createRoleDispatchAgent({
 *   planner: (input, context) => runPlanner(input, context, deps),
 *   // ...one handler per role
 * });
 * const plans = await agent.run('planner', plannerInput, runConfig);
 */
export function createRoleDispatchAgent(handlers: RoleHandlers): TextGenerationAgent {
  return {
    async run<R extends AgentRole>(role: R, input: AgentInput<R>, context: RunConfig): Promise<AgentOutput<R>> {
      const handler: RoleHandler<R> = handlers[role];
      const payload = await handler(input, context);
      return parseRoleOutput(role, payload);
    },
  };
}
