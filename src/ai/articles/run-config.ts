/**
 * Run and Operational Configuration
 *
 * Both structs are built once at the start of a run and passed explicitly to
 * every phase. Collaborators never read run settings from the environment.
 */

import { z } from 'zod';

import { slugify } from '../../utils/slug';
import { RunConfigSchema, type RunConfig } from './article-schemas';
import { GENERATOR_CONFIG, RESEARCH_CONFIG, SYNTHESIS_CONFIG } from './config';
import { ArticleGenerationError, formatIssues } from './types';

// ============================================================================
// Run Configuration
// ============================================================================

export const RunConfigInputSchema = z.object({
  title: z.string().trim().min(1, 'title is required'),
  description: z.string().trim().default(''),
  layout: z.string().trim().min(1).optional(),
  wordCount: z.coerce.number().int().positive('wordCount must be a positive integer'),
});

export type RunConfigInput = z.input<typeof RunConfigInputSchema>;

/**
 * Validates run inputs and derives the run identifier from the title.
 *
 * @throws ArticleGenerationError with 'CONTEXT_INVALID' for bad input, or a
 * title that has no filesystem-safe characters
 */
export function createRunConfig(input: RunConfigInput): RunConfig {
  const parsed = RunConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ArticleGenerationError('CONTEXT_INVALID', `Invalid run configuration: ${formatIssues(parsed.error.issues)}`);
  }

  const runIdentifier = slugify(parsed.data.title);
  if (runIdentifier.length === 0) {
    throw new ArticleGenerationError(
      'CONTEXT_INVALID',
      `Title "${parsed.data.title}" does not produce a usable run identifier`
    );
  }

  return Object.freeze(
    RunConfigSchema.parse({
      title: parsed.data.title,
      description: parsed.data.description,
      ...(parsed.data.layout !== undefined ? { layout: parsed.data.layout } : {}),
      wordCount: parsed.data.wordCount,
      runIdentifier,
    })
  );
}

/**
 * Whether two run configs describe the same article request.
 * A mismatch means the cached artifacts of the namespace are stale.
 */
export function isSameRunRequest(a: RunConfig, b: RunConfig): boolean {
  return (
    a.title === b.title &&
    a.description === b.description &&
    a.layout === b.layout &&
    a.wordCount === b.wordCount &&
    a.runIdentifier === b.runIdentifier
  );
}

// ============================================================================
// Operational Configuration
// ============================================================================

export const RESEARCH_STRATEGIES = ['individual', 'batch'] as const;
export type ResearchStrategy = (typeof RESEARCH_STRATEGIES)[number];

/**
 * What happens when enhancement fails or returns degraded text.
 * - degrade: keep the final article, report enhancement as skipped
 * - abort: fail the run with ENHANCEMENT_FAILED
 */
export const ENHANCEMENT_FAILURE_POLICIES = ['degrade', 'abort'] as const;
export type EnhancementFailurePolicy = (typeof ENHANCEMENT_FAILURE_POLICIES)[number];

export interface OperationalConfig {
  readonly researchStrategy: ResearchStrategy;
  readonly researchMaxRetries: number;
  /** Cap on concurrent synthesis tasks; 0 means uncapped */
  readonly synthesisConcurrency: number;
  readonly enhancementFailurePolicy: EnhancementFailurePolicy;
  readonly dataDir: string;
}

const OperationalEnvSchema = z.object({
  RESEARCH_STRATEGY: z.enum(RESEARCH_STRATEGIES).default(RESEARCH_CONFIG.DEFAULT_STRATEGY),
  RESEARCH_MAX_RETRIES: z.coerce.number().int().nonnegative().default(RESEARCH_CONFIG.DEFAULT_MAX_RETRIES),
  SYNTHESIS_CONCURRENCY: z.coerce.number().int().nonnegative().default(SYNTHESIS_CONFIG.DEFAULT_CONCURRENCY),
  ENHANCEMENT_FAILURE_POLICY: z.enum(ENHANCEMENT_FAILURE_POLICIES).default('degrade'),
  ARTICLE_DATA_DIR: z.string().min(1).default(GENERATOR_CONFIG.DEFAULT_DATA_DIR),
});

/**
 * Default operational settings, used when nothing is configured.
 */
export const DEFAULT_OPERATIONAL_CONFIG: OperationalConfig = Object.freeze({
  researchStrategy: RESEARCH_CONFIG.DEFAULT_STRATEGY,
  researchMaxRetries: RESEARCH_CONFIG.DEFAULT_MAX_RETRIES,
  synthesisConcurrency: SYNTHESIS_CONFIG.DEFAULT_CONCURRENCY,
  enhancementFailurePolicy: 'degrade',
  dataDir: GENERATOR_CONFIG.DEFAULT_DATA_DIR,
});

/**
 * Reads operational knobs from an environment-like record.
 * Empty strings count as unset.
 *
 * @throws ArticleGenerationError with 'CONFIG_ERROR' for invalid values
 */
export function loadOperationalConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: Partial<OperationalConfig> = {}
): OperationalConfig {
  const relevant = Object.fromEntries(
    Object.keys(OperationalEnvSchema.shape)
      .map((key) => [key, env[key]] as const)
      .filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = OperationalEnvSchema.safeParse(relevant);
  if (!parsed.success) {
    throw new ArticleGenerationError('CONFIG_ERROR', `Invalid operational configuration: ${formatIssues(parsed.error.issues)}`);
  }

  return Object.freeze({
    researchStrategy: overrides.researchStrategy ?? parsed.data.RESEARCH_STRATEGY,
    researchMaxRetries: overrides.researchMaxRetries ?? parsed.data.RESEARCH_MAX_RETRIES,
    synthesisConcurrency: overrides.synthesisConcurrency ?? parsed.data.SYNTHESIS_CONCURRENCY,
    enhancementFailurePolicy: overrides.enhancementFailurePolicy ?? parsed.data.ENHANCEMENT_FAILURE_POLICY,
    dataDir: overrides.dataDir ?? parsed.data.ARTICLE_DATA_DIR,
  });
}
