/**
 * Research Controller
 *
 * Runs the Researching phase under one of two strategies:
 * - individual (default): one researcher call per section, each guarded by a
 *   retry budget and a single recovery-informed attempt. Every section ends
 *   with notes, even if only a placeholder.
 * - batch: one researcher call for all sections. Missing sections are a
 *   coverage defect and fail the phase.
 */

import type { Logger } from '../../utils/logger';
import type {
  ArticleBrief,
  ResearchNotes,
  RunConfig,
  SectionPlan,
  SectionPlans,
  SectionResearchNotes,
} from './article-schemas';
import type { TextGenerationAgent } from './agents/text-generation-agent';
import { runWithRetryPolicy, type RetryPolicy } from './retry';
import type { ResearchStrategy } from './run-config';
import { CoverageMismatchError, getErrorMessage } from './types';

// ============================================================================
// Types
// ============================================================================

export interface ResearchControllerDeps {
  readonly agent: TextGenerationAgent;
  readonly runConfig: RunConfig;
  readonly logger: Logger;
}

export type SectionResearchOutcome = 'succeeded' | 'recovered' | 'placeholder';

export interface SectionResearchResult {
  readonly notes: SectionResearchNotes;
  readonly outcome: SectionResearchOutcome;
  /** Researcher calls made for the section, including the recovery-informed one */
  readonly attempts: number;
  readonly failureReason?: string;
}

export interface ResearchPhaseReport {
  readonly strategy: ResearchStrategy;
  readonly sectionsTotal: number;
  readonly recoveredSectionIds: readonly string[];
  readonly placeholderSectionIds: readonly string[];
}

export interface ResearchPhaseOutput {
  readonly notes: ResearchNotes;
  readonly report: ResearchPhaseReport;
}

export interface ResearchPhaseOptions {
  readonly strategy: ResearchStrategy;
  readonly maxRetries: number;
  /** Called after each section in individual mode (1-indexed) */
  readonly onSectionResearched?: (current: number, total: number, result: SectionResearchResult) => void;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Builds the plain-attempt policy for a retry budget. At least one plain
 * attempt always runs, so the recovery advisor has a failure to work from.
 */
export function createResearchRetryPolicy(maxRetries: number): RetryPolicy {
  return { maxAttempts: Math.max(1, Math.trunc(maxRetries)), backoff: 'none' };
}

const PLACEHOLDER_SUMMARY_PREFIX = 'Research failed for section ';

/**
 * Notes recorded when research permanently failed for a section.
 */
export function createPlaceholderNotes(plan: SectionPlan, reason: string): SectionResearchNotes {
  return {
    sectionId: plan.sectionId,
    findings: [],
    summary: `${PLACEHOLDER_SUMMARY_PREFIX}"${plan.title}": ${reason}`,
  };
}

export function isPlaceholderNotes(notes: SectionResearchNotes): boolean {
  return notes.findings.length === 0 && notes.summary.startsWith(PLACEHOLDER_SUMMARY_PREFIX);
}

/**
 * Rebuilds the phase report for notes loaded from the cache. Placeholder
 * sections are recognized from their notes; which sections needed recovery
 * is only known to the run that researched them, so that list is empty.
 */
export function describeCachedResearch(
  plans: SectionPlans,
  notes: ResearchNotes,
  strategy: ResearchStrategy
): ResearchPhaseReport {
  return {
    strategy,
    sectionsTotal: plans.sections.length,
    recoveredSectionIds: [],
    placeholderSectionIds: notes.notesBySection.filter(isPlaceholderNotes).map((entry) => entry.sectionId),
  };
}

/**
 * Pins researcher output to the plan it was produced for.
 */
function bindToPlan(notes: SectionResearchNotes, plan: SectionPlan, log: Logger): SectionResearchNotes {
  if (notes.sectionId === plan.sectionId) return notes;
  log.warn(`Researcher returned sectionId "${notes.sectionId}" for "${plan.sectionId}"; using the planned id`);
  return { ...notes, sectionId: plan.sectionId };
}

// ============================================================================
// Individual Strategy
// ============================================================================

/**
 * Researches one section with bounded retries and one recovery-informed attempt.
 *
 * Sequence for maxRetries = 2 and a researcher that always fails:
 * researcher, researcher, recoveryAdvisor, researcher (improved queries), placeholder.
 * Never throws.
 */
export async function researchSectionWithRecovery(
  plan: SectionPlan,
  brief: ArticleBrief,
  maxRetries: number,
  deps: ResearchControllerDeps
): Promise<SectionResearchResult> {
  const { agent, runConfig, logger: log } = deps;

  const research = async (target: SectionPlan): Promise<SectionResearchNotes> =>
    bindToPlan(await agent.run('researcher', { plan: target, brief }, runConfig), plan, log);

  const policy = createResearchRetryPolicy(maxRetries);
  const initial = await runWithRetryPolicy(
    () => research(plan),
    policy,
    (error, attempt) =>
      log.warn(`Research for "${plan.title}" failed (attempt ${attempt}/${policy.maxAttempts}): ${getErrorMessage(error)}`)
  );

  if (initial.ok) {
    return { notes: initial.value, outcome: 'succeeded', attempts: initial.attempts };
  }

  const failureReason = getErrorMessage(initial.error);
  log.info(`Asking recovery advisor for better queries for "${plan.title}"`);

  let improvedPlan: SectionPlan;
  try {
    const improved = await agent.run('recoveryAdvisor', { plan, brief, failureReason }, runConfig);
    improvedPlan = { ...plan, researchQueries: improved.researchQueries };
    log.debug(`Recovery rationale for "${plan.title}": ${improved.improvementRationale}`);
  } catch (error) {
    const reason = `recovery failed after "${failureReason}": ${getErrorMessage(error)}`;
    log.error(`Research for "${plan.title}" abandoned, ${reason}`);
    return {
      notes: createPlaceholderNotes(plan, reason),
      outcome: 'placeholder',
      attempts: initial.attempts,
      failureReason: reason,
    };
  }

  const final = await runWithRetryPolicy(() => research(improvedPlan), { maxAttempts: 1, backoff: 'none' });
  const attempts = initial.attempts + final.attempts;

  if (final.ok) {
    log.info(`Research for "${plan.title}" recovered with ${improvedPlan.researchQueries?.length ?? 0} new queries`);
    return { notes: final.value, outcome: 'recovered', attempts };
  }

  const reason = getErrorMessage(final.error);
  log.error(`Research for "${plan.title}" failed after ${attempts} attempts: ${reason}`);
  return {
    notes: createPlaceholderNotes(plan, reason),
    outcome: 'placeholder',
    attempts,
    failureReason: reason,
  };
}

async function researchIndividually(
  plans: SectionPlans,
  options: ResearchPhaseOptions,
  deps: ResearchControllerDeps
): Promise<ResearchPhaseOutput> {
  const results: SectionResearchResult[] = [];
  const total = plans.sections.length;

  for (const [index, plan] of plans.sections.entries()) {
    const result = await researchSectionWithRecovery(plan, plans.brief, options.maxRetries, deps);
    results.push(result);
    options.onSectionResearched?.(index + 1, total, result);
  }

  return {
    notes: { notesBySection: results.map((result) => result.notes) },
    report: {
      strategy: 'individual',
      sectionsTotal: total,
      recoveredSectionIds: results.filter((r) => r.outcome === 'recovered').map((r) => r.notes.sectionId),
      placeholderSectionIds: results.filter((r) => r.outcome === 'placeholder').map((r) => r.notes.sectionId),
    },
  };
}

// ============================================================================
// Batch Strategy
// ============================================================================

/**
 * Orders batch notes by plan, dropping unknown and repeated section ids.
 *
 * @throws CoverageMismatchError when any planned section has no notes
 */
export function reconcileBatchNotes(plans: SectionPlans, notes: ResearchNotes, log?: Logger): ResearchNotes {
  const bySection = new Map<string, SectionResearchNotes>();
  for (const entry of notes.notesBySection) {
    if (!bySection.has(entry.sectionId)) bySection.set(entry.sectionId, entry);
  }

  const planned = new Set(plans.sections.map((plan) => plan.sectionId));
  const unknown = [...bySection.keys()].filter((id) => !planned.has(id));
  if (unknown.length > 0) {
    log?.warn(`Ignoring research notes for unplanned section(s): ${unknown.join(', ')}`);
  }

  const missing = plans.sections.filter((plan) => !bySection.has(plan.sectionId)).map((plan) => plan.sectionId);
  if (missing.length > 0) {
    throw new CoverageMismatchError(missing);
  }

  return {
    notesBySection: plans.sections.flatMap((plan) => {
      const entry = bySection.get(plan.sectionId);
      return entry ? [entry] : [];
    }),
  };
}

async function researchInBatch(plans: SectionPlans, deps: ResearchControllerDeps): Promise<ResearchPhaseOutput> {
  const notes = await deps.agent.run('batchResearcher', { plans }, deps.runConfig);
  return {
    notes: reconcileBatchNotes(plans, notes, deps.logger),
    report: {
      strategy: 'batch',
      sectionsTotal: plans.sections.length,
      recoveredSectionIds: [],
      placeholderSectionIds: [],
    },
  };
}

// ============================================================================
// Phase Entry Point
// ============================================================================

/**
 * Researches every planned section.
 *
 * Individual mode never throws for section failures. Batch mode throws
 * MalformedOutputError or CoverageMismatchError; the caller treats either
 * as a failure of the whole phase.
 */
export async function runResearchPhase(
  plans: SectionPlans,
  options: ResearchPhaseOptions,
  deps: ResearchControllerDeps
): Promise<ResearchPhaseOutput> {
  return options.strategy === 'batch'
    ? researchInBatch(plans, deps)
    : researchIndividually(plans, options, deps);
}
