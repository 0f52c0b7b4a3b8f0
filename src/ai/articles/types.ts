/**
 * Article Pipeline Types
 *
 * Shared types for the phase-driven article generation pipeline:
 * phase and state constants, the error taxonomy, and the clock abstraction.
 */

import type { ZodIssue } from 'zod';

// ============================================================================
// Phase Constants
// ============================================================================

/**
 * Computation phases in execution order.
 * Used to derive the PipelinePhase type.
 */
export const PIPELINE_PHASES = [
  'planning',
  'researching',
  'contentAugmentation',
  'sectionSynthesis',
  'finalComposition',
  'enhancement',
] as const;

export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

/**
 * Every state of the pipeline state machine, including the terminal ones.
 */
export const PIPELINE_STATES = ['start', ...PIPELINE_PHASES, 'done'] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

/**
 * Names of the persisted phase documents. One document per (runIdentifier, name).
 */
export const PHASE_CACHE_NAMES = [
  'workflow_config',
  'planning',
  'researching',
  'scrape_web_content',
  'synthesize_sections',
  'final_article_creation',
  'enhancement',
] as const;

export type PhaseCacheName = (typeof PHASE_CACHE_NAMES)[number];

/**
 * Cache document written by each computation phase.
 */
export const PHASE_CACHE_KEYS: Readonly<Record<PipelinePhase, PhaseCacheName>> = {
  planning: 'planning',
  researching: 'researching',
  contentAugmentation: 'scrape_web_content',
  sectionSynthesis: 'synthesize_sections',
  finalComposition: 'final_article_creation',
  enhancement: 'enhancement',
};

/**
 * Human-readable phase names used in logs and error messages.
 */
export const PHASE_DISPLAY_NAMES: Readonly<Record<PipelinePhase, string>> = {
  planning: 'Planning',
  researching: 'Researching',
  contentAugmentation: 'Content Augmentation',
  sectionSynthesis: 'Section Synthesis',
  finalComposition: 'Final Composition',
  enhancement: 'Enhancement',
};

/**
 * Returns the state that follows `state`. The machine only moves forward;
 * `done` is terminal and maps to itself.
 */
export function getNextPipelineState(state: PipelineState): PipelineState {
  const index = PIPELINE_STATES.indexOf(state);
  return PIPELINE_STATES[Math.min(index + 1, PIPELINE_STATES.length - 1)];
}

export function isPipelineCacheName(value: string): value is PhaseCacheName {
  return PHASE_CACHE_NAMES.some((name) => name === value);
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for pipeline failures.
 * Phase codes identify which phase halted the run.
 */
export type ArticleGenerationErrorCode =
  | 'CONFIG_ERROR'
  | 'CONTEXT_INVALID'
  | 'PLANNING_FAILED'
  | 'RESEARCH_FAILED'
  | 'SYNTHESIS_FAILED'
  | 'COMPOSITION_FAILED'
  | 'ENHANCEMENT_FAILED'
  | 'CANCELLED';

/**
 * Custom error class for pipeline failures.
 * Provides structured error information for programmatic handling.
 *
 * @example
 * try {
 *   await runArticlePipeline(runConfig, operationalConfig, deps);
 * } catch (error) {
 *   if (error instanceof ArticleGenerationError && error.code === 'PLANNING_FAILED') {
 *     // The planner never produced a usable plan
 *   }
 * }
 */
export class ArticleGenerationError extends Error {
  readonly name = 'ArticleGenerationError';

  constructor(
    readonly code: ArticleGenerationErrorCode,
    message: string,
    readonly cause?: Error,
    readonly phase?: PipelinePhase
  ) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArticleGenerationError);
    }
  }
}

/**
 * Type guard to check if an error is an ArticleGenerationError.
 */
export function isArticleGenerationError(error: unknown): error is ArticleGenerationError {
  return error instanceof ArticleGenerationError;
}

/**
 * A collaborator returned a payload that does not match its role's schema.
 */
export class MalformedOutputError extends Error {
  readonly name = 'MalformedOutputError';

  constructor(
    readonly role: string,
    readonly issues: readonly ZodIssue[]
  ) {
    super(`Malformed ${role} output: ${formatIssues(issues)}`);
  }
}

/**
 * A search or fetch collaborator failed (network, timeout, bad status).
 * Always absorbed by the caller; never halts a run.
 */
export class ToolFailureError extends Error {
  readonly name = 'ToolFailureError';

  constructor(
    readonly tool: string,
    message: string,
    readonly cause?: Error
  ) {
    super(`${tool} failed: ${message}`);
  }
}

/**
 * Batch research returned notes for fewer sections than were planned.
 */
export class CoverageMismatchError extends Error {
  readonly name = 'CoverageMismatchError';

  constructor(readonly missingSectionIds: readonly string[]) {
    super(`Research notes missing for section(s): ${missingSectionIds.join(', ')}`);
  }
}

/**
 * Enhancement output was empty or shorter than its input.
 */
export class EnhancementRejectedError extends Error {
  readonly name = 'EnhancementRejectedError';
}

/**
 * Renders Zod issues as `path: message` pairs.
 */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Extracts a readable message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Progress Types
// ============================================================================

/**
 * Progress callback for monitoring pipeline progress.
 *
 * @param phase - Current phase
 * @param progress - Progress percentage within the phase (0-100)
 * @param message - Optional status message
 */
export type ArticleProgressCallback = (phase: PipelinePhase, progress: number, message?: string) => void;

/**
 * Called on every state machine transition.
 */
export type PipelineStateCallback = (from: PipelineState, to: PipelineState) => void;

// ============================================================================
// Token Usage
// ============================================================================

export interface TokenUsage {
  readonly input: number;
  readonly output: number;
}

export function createEmptyTokenUsage(): TokenUsage {
  return { input: 0, output: 0 };
}

export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return { input: a.input + b.input, output: a.output + b.output };
}

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

/**
 * Clock interface for time-related operations.
 * Enables deterministic testing by allowing time to be mocked.
 *
 * @example
 * const mockClock: Clock = { now: () => 1234567890000 };
 */
export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

/**
 * Default clock implementation using system time.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a mock clock for testing with a fixed or advancing time.
 *
 * @param initialTime - Starting timestamp in milliseconds
 * @param autoAdvance - If provided, advances time by this many ms on each call
 *
 * @example
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}
