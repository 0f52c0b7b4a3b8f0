/**
 * Pipeline Orchestrator
 *
 * Drives one run through the fixed phase sequence:
 * planning → researching → contentAugmentation → sectionSynthesis →
 * finalComposition → enhancement.
 *
 * Every phase checks the phase cache first and saves its artifact on success,
 * so an interrupted run resumes where it stopped and a finished run replays
 * without a single collaborator call. Before a phase recomputes, its own
 * document and every later one are deleted, so the cache never holds an
 * artifact built from inputs that have since been replaced.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateObject, generateText } from 'ai';
import type { ZodType, ZodTypeDef } from 'zod';

import {
  createContextualLogger,
  generateCorrelationId,
  type ContextualLogger,
} from '../../utils/logger';
import { getModel, type AITaskKey } from '../config/utils';
import { createTavilySearchService } from '../tools/tavily';
import { createAiTextGenerationAgent } from './agents';
import type { TextGenerationAgent } from './agents/text-generation-agent';
import {
  AugmentedResearchSchema,
  EnhancedArticleSchema,
  FinalArticleSchema,
  ResearchNotesSchema,
  RunConfigSchema,
  SectionPlansSchema,
  SynthesizedArticleSchema,
  type AugmentationStats,
  type AugmentedResearch,
  type EnhancedArticle,
  type FinalArticle,
  type RunConfig,
  type SectionPlans,
  type SynthesizedArticle,
} from './article-schemas';
import { augmentResearchNotes } from './content-augmentation';
import { GENERATOR_CONFIG } from './config';
import { composeFinalArticle, countWords, enhanceArticle } from './final-composition';
import { FilePhaseCache, type PhaseCache } from './phase-cache';
import { PhaseTimer, type PhaseDurations } from './phase-timer';
import { ProgressTracker } from './progress-tracker';
import { describeCachedResearch, runResearchPhase, type ResearchPhaseReport } from './research-controller';
import { isSameRunRequest, type OperationalConfig } from './run-config';
import { synthesizeSections } from './section-synthesis';
import { createContentFetchService, type ContentFetchService } from './services/content-fetch-service';
import {
  ArticleGenerationError,
  createEmptyTokenUsage,
  getNextPipelineState,
  getErrorMessage,
  isArticleGenerationError,
  PHASE_CACHE_KEYS,
  PIPELINE_PHASES,
  PHASE_DISPLAY_NAMES,
  systemClock,
  type ArticleGenerationErrorCode,
  type ArticleProgressCallback,
  type Clock,
  type PipelinePhase,
  type PipelineState,
  type PipelineStateCallback,
  type TokenUsage,
} from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators of a run. Tests pass fakes; the CLI uses createDefaultPipelineDeps().
 */
export interface PipelineDeps {
  readonly agent: TextGenerationAgent;
  readonly contentFetch: ContentFetchService;
  readonly cache: PhaseCache;
  /** Reports tokens spent so far, when the agent tracks them */
  readonly getTokenUsage?: () => TokenUsage;
}

export interface PipelineOptions {
  /** Called at the start and end of each phase, and per section while researching and writing */
  readonly onProgress?: ArticleProgressCallback;
  /** Called on every state machine transition */
  readonly onStateChange?: PipelineStateCallback;
  /**
   * Checked before every phase. An aborted signal fails the run with 'CANCELLED';
   * artifacts of completed phases stay cached.
   */
  readonly signal?: AbortSignal;
  /** Defaults to systemClock. Override for deterministic durations in tests. */
  readonly clock?: Clock;
  /** Tags every log line of the run. Generated when omitted. */
  readonly correlationId?: string;
}

/** Where a phase's artifact came from in this run. */
export type PhaseSource = 'cached' | 'computed' | 'skipped';

export type EnhancementStatus = 'applied' | 'cached' | 'skipped';

export interface PipelineDegradation {
  /** Rebuilt from the notes when they came from the cache; recovered ids are then empty */
  readonly research: ResearchPhaseReport;
  readonly augmentation: AugmentationStats;
  readonly failedSectionIds: readonly string[];
  readonly enhancement: {
    readonly status: EnhancementStatus;
    readonly reason?: string;
  };
}

export interface PipelineMetadata {
  readonly correlationId: string;
  readonly runIdentifier: string;
  /** ISO timestamp of when the run finished */
  readonly generatedAt: string;
  readonly phaseDurations: PhaseDurations;
  readonly totalDurationMs: number;
  readonly phaseSources: Readonly<Record<PipelinePhase, PhaseSource>>;
  readonly tokenUsage: TokenUsage;
  readonly degradation: PipelineDegradation;
}

export interface PipelineResult {
  readonly runConfig: RunConfig;
  readonly plans: SectionPlans;
  readonly research: AugmentedResearch;
  readonly synthesized: SynthesizedArticle;
  readonly finalArticle: FinalArticle;
  /** Null when enhancement failed under the 'degrade' policy */
  readonly enhanced: EnhancedArticle | null;
  readonly metadata: PipelineMetadata;
}

const PHASE_ERROR_CODES: Readonly<Record<PipelinePhase, ArticleGenerationErrorCode>> = {
  planning: 'PLANNING_FAILED',
  researching: 'RESEARCH_FAILED',
  contentAugmentation: 'RESEARCH_FAILED',
  sectionSynthesis: 'SYNTHESIS_FAILED',
  finalComposition: 'COMPOSITION_FAILED',
  enhancement: 'ENHANCEMENT_FAILED',
};

// ============================================================================
// Default Dependencies
// ============================================================================

export interface DefaultPipelineDepsOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly signal?: AbortSignal;
}

/**
 * Builds the production collaborators: OpenRouter models, Tavily search,
 * HTTP page fetching and a file-backed phase cache under `dataDir`.
 *
 * @throws ArticleGenerationError with 'CONFIG_ERROR' when OPENROUTER_API_KEY is missing
 */
export function createDefaultPipelineDeps(
  operationalConfig: OperationalConfig,
  options: DefaultPipelineDepsOptions = {}
): PipelineDeps {
  const env = options.env ?? process.env;
  const apiKey = env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new ArticleGenerationError('CONFIG_ERROR', 'OPENROUTER_API_KEY environment variable is required');
  }

  const openrouter = createOpenRouter({
    apiKey,
    baseURL: env.OPENROUTER_BASE_URL || GENERATOR_CONFIG.DEFAULT_OPENROUTER_BASE_URL,
  });

  const model = (key: AITaskKey) => openrouter(getModel(key, env));

  const agent = createAiTextGenerationAgent({
    generateObject,
    generateText,
    models: {
      PLANNER: model('PLANNER'),
      RESEARCHER: model('RESEARCHER'),
      RECOVERY: model('RECOVERY'),
      SYNTHESIZER: model('SYNTHESIZER'),
      COMPOSER: model('COMPOSER'),
      ENHANCER: model('ENHANCER'),
    },
    search: createTavilySearchService(env.TAVILY_API_KEY ? { apiKey: env.TAVILY_API_KEY } : {}),
    signal: options.signal,
  });

  return {
    agent,
    contentFetch: createContentFetchService(),
    cache: new FilePhaseCache({ dataDir: operationalConfig.dataDir }),
    getTokenUsage: () => agent.getTokenUsage(),
  };
}

// ============================================================================
// Cancellation
// ============================================================================

function assertCanProceed(signal: AbortSignal | undefined, title: string, phase: PipelinePhase): void {
  if (signal?.aborted) {
    throw new ArticleGenerationError(
      'CANCELLED',
      `Article generation for "${title}" was cancelled before the ${PHASE_DISPLAY_NAMES[phase]} phase`,
      undefined,
      phase
    );
  }
}

// ============================================================================
// Core Pipeline
// ============================================================================

/**
 * Runs (or resumes) the pipeline for one article.
 *
 * @throws ArticleGenerationError with the failing phase's code, or 'CANCELLED'
 *
 * @example
 * const runConfig = createRunConfig({ title: 'AI in Supply Chain', wordCount: 1500 });
 * const operational = loadOperationalConfig();
 * const result = await runArticlePipeline(runConfig, operational, createDefaultPipelineDeps(operational));
 * console.log(result.enhanced?.fullText ?? result.finalArticle.fullText);
 */
export async function runArticlePipeline(
  runConfig: RunConfig,
  operationalConfig: OperationalConfig,
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { agent, contentFetch, cache } = deps;
  const { signal } = options;
  const clock = options.clock ?? systemClock;
  const correlationId = options.correlationId ?? generateCorrelationId();
  const namespace = runConfig.runIdentifier;
  const log = createContextualLogger('[Pipeline]', { correlationId, runIdentifier: namespace });
  const progress = new ProgressTracker(options.onProgress);
  const timer = new PhaseTimer(clock);

  const phaseSources: Record<PipelinePhase, PhaseSource> = {
    planning: 'skipped',
    researching: 'skipped',
    contentAugmentation: 'skipped',
    sectionSynthesis: 'skipped',
    finalComposition: 'skipped',
    enhancement: 'skipped',
  };

  // Phases run in fixed order, so every transition is a single step forward
  let state: PipelineState = 'start';
  const advance = (): void => {
    const from = state;
    state = getNextPipelineState(from);
    log.debug(`State ${from} → ${state}`);
    options.onStateChange?.(from, state);
  };

  log.info(`=== Starting article pipeline for "${runConfig.title}" (${runConfig.wordCount} words) ===`);
  log.info(
    `Strategy: ${operationalConfig.researchStrategy}, max retries: ${operationalConfig.researchMaxRetries}, ` +
      `synthesis concurrency: ${operationalConfig.synthesisConcurrency || 'unbounded'}`
  );

  let forceRecompute = await reconcileWorkflowConfig(runConfig, cache, log);

  const supersedeFrom = async (phase: PipelinePhase): Promise<void> => {
    for (const later of PIPELINE_PHASES.slice(PIPELINE_PHASES.indexOf(phase))) {
      const cacheName = PHASE_CACHE_KEYS[later];
      if (await cache.exists(namespace, cacheName)) {
        await cache.clear(namespace, cacheName);
      }
    }
  };

  /**
   * Loads a phase artifact from the cache, or computes and saves it.
   * Failures are wrapped with the phase's error code.
   */
  const resolvePhase = async <T>(
    phase: PipelinePhase,
    schema: ZodType<T, ZodTypeDef, unknown>,
    compute: (phaseLog: ContextualLogger) => Promise<T>,
    describe: (artifact: T) => string
  ): Promise<T> => {
    assertCanProceed(signal, runConfig.title, phase);
    advance();

    const cacheName = PHASE_CACHE_KEYS[phase];
    if (!forceRecompute && (await cache.exists(namespace, cacheName))) {
      const cached = await cache.load(namespace, cacheName, schema);
      if (cached !== null) {
        phaseSources[phase] = 'cached';
        progress.reportCached(phase);
        log.info(`${PHASE_DISPLAY_NAMES[phase]}: loaded from cache`);
        return cached;
      }
    }

    const phaseLog = log.child({ phase });
    progress.startPhase(phase);
    timer.start(phase);

    let artifact: T;
    try {
      await supersedeFrom(phase);
      artifact = await compute(phaseLog);
      await cache.save(namespace, cacheName, artifact);
    } catch (error) {
      timer.end(phase);
      throw toPhaseError(error, phase, runConfig.title, signal);
    }

    const durationMs = timer.end(phase);
    forceRecompute = true;
    phaseSources[phase] = 'computed';

    const summary = describe(artifact);
    progress.completePhase(phase, summary);
    phaseLog.structured('info', { event: 'phase_complete', message: summary, phase, durationMs });
    return artifact;
  };

  // ===== Planning =====
  const plans = await resolvePhase(
    'planning',
    SectionPlansSchema,
    () =>
      agent.run(
        'planner',
        {
          title: runConfig.title,
          description: runConfig.description,
          wordCount: runConfig.wordCount,
          ...(runConfig.layout !== undefined ? { layout: runConfig.layout } : {}),
        },
        runConfig
      ),
    (artifact) => `Planned ${artifact.sections.length} sections`
  );

  // ===== Researching =====
  const computedResearch: { report?: ResearchPhaseReport } = {};
  const researchNotes = await resolvePhase(
    'researching',
    ResearchNotesSchema,
    async (phaseLog) => {
      const output = await runResearchPhase(
        plans,
        {
          strategy: operationalConfig.researchStrategy,
          maxRetries: operationalConfig.researchMaxRetries,
          onSectionResearched: (current, total) =>
            progress.reportSectionProgress('researching', current, total, plans.sections[current - 1].title),
        },
        { agent, runConfig, logger: phaseLog }
      );
      computedResearch.report = output.report;
      return output.notes;
    },
    (artifact) => `Researched ${artifact.notesBySection.length} sections`
  );
  const researchSummary =
    computedResearch.report ?? describeCachedResearch(plans, researchNotes, operationalConfig.researchStrategy);

  // ===== Content Augmentation =====
  const research = await resolvePhase(
    'contentAugmentation',
    AugmentedResearchSchema,
    (phaseLog) => augmentResearchNotes(researchNotes, { contentFetch, logger: phaseLog }),
    (artifact) =>
      artifact.stats.degraded
        ? 'Page fetching failed; using search snippets'
        : `Fetched ${artifact.stats.fetchedUrls}/${artifact.stats.eligibleUrls} source pages`
  );

  // ===== Section Synthesis =====
  const synthesized = await resolvePhase(
    'sectionSynthesis',
    SynthesizedArticleSchema,
    (phaseLog) =>
      synthesizeSections(
        plans,
        research.notes,
        {
          concurrency: operationalConfig.synthesisConcurrency,
          onSectionSettled: (settled, total, title) =>
            progress.reportSectionProgress('sectionSynthesis', settled, total, title),
        },
        { agent, runConfig, logger: phaseLog }
      ),
    (artifact) => `Wrote ${artifact.sections.length}/${plans.sections.length} sections`
  );

  // ===== Final Composition =====
  const finalArticle = await resolvePhase(
    'finalComposition',
    FinalArticleSchema,
    (phaseLog) => composeFinalArticle(synthesized, research.notes, { agent, runConfig, logger: phaseLog }),
    (artifact) => `Composed ${countWords(artifact.fullText)} words, ${artifact.references.length} references`
  );

  // ===== Enhancement =====
  let enhanced: EnhancedArticle | null = null;
  let enhancement: PipelineDegradation['enhancement'];
  try {
    enhanced = await resolvePhase(
      'enhancement',
      EnhancedArticleSchema,
      (phaseLog) => enhanceArticle(finalArticle, { agent, runConfig, logger: phaseLog }),
      (artifact) => `Enhanced to ${countWords(artifact.fullText)} words`
    );
    enhancement = { status: phaseSources.enhancement === 'cached' ? 'cached' : 'applied' };
  } catch (error) {
    if (
      operationalConfig.enhancementFailurePolicy === 'abort' ||
      !isArticleGenerationError(error) ||
      error.code !== 'ENHANCEMENT_FAILED'
    ) {
      throw error;
    }
    const reason = getErrorMessage(error.cause ?? error);
    log.warn(`Enhancement skipped, keeping the composed article: ${reason}`);
    progress.completePhase('enhancement', 'Skipped; keeping the composed article');
    phaseSources.enhancement = 'skipped';
    enhancement = { status: 'skipped', reason };
  }

  advance();

  const metadata: PipelineMetadata = {
    correlationId,
    runIdentifier: namespace,
    generatedAt: new Date(clock.now()).toISOString(),
    phaseDurations: timer.getDurations(),
    totalDurationMs: timer.getTotalDuration(),
    phaseSources: { ...phaseSources },
    tokenUsage: deps.getTokenUsage?.() ?? createEmptyTokenUsage(),
    degradation: {
      research: researchSummary,
      augmentation: research.stats,
      failedSectionIds: synthesized.failedSectionIds,
      enhancement,
    },
  };

  log.structured('info', {
    event: 'pipeline_complete',
    message: `Article pipeline finished for "${runConfig.title}"`,
    totalDurationMs: metadata.totalDurationMs,
    phaseSources: metadata.phaseSources,
    tokenUsage: metadata.tokenUsage,
  });

  return { runConfig, plans, research, synthesized, finalArticle, enhanced, metadata };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Compares the stored run configuration with the requested one.
 * Returns true when every cached phase must be ignored.
 */
async function reconcileWorkflowConfig(runConfig: RunConfig, cache: PhaseCache, log: ContextualLogger): Promise<boolean> {
  const stored = await cache.load(runConfig.runIdentifier, 'workflow_config', RunConfigSchema);

  if (stored === null) {
    await cache.save(runConfig.runIdentifier, 'workflow_config', runConfig);
    return false;
  }

  if (isSameRunRequest(stored, runConfig)) {
    return false;
  }

  log.warn('Run configuration changed since the last run; discarding every cached phase');
  await cache.clear(runConfig.runIdentifier);
  await cache.save(runConfig.runIdentifier, 'workflow_config', runConfig);
  return true;
}

function toPhaseError(
  error: unknown,
  phase: PipelinePhase,
  title: string,
  signal: AbortSignal | undefined
): ArticleGenerationError {
  if (isArticleGenerationError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  if (signal?.aborted) {
    return new ArticleGenerationError(
      'CANCELLED',
      `Article generation for "${title}" was cancelled during the ${PHASE_DISPLAY_NAMES[phase]} phase`,
      cause,
      phase
    );
  }

  return new ArticleGenerationError(
    PHASE_ERROR_CODES[phase],
    `Article generation failed during ${PHASE_DISPLAY_NAMES[phase]} phase for "${title}": ${getErrorMessage(error)}`,
    cause,
    phase
  );
}

