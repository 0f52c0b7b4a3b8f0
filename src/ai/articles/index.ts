/**
 * Article Pipeline
 *
 * Turns a title, description and word count into a researched, composed and
 * enhanced long-form article. Each phase's artifact is cached per run, so
 * re-running the same request resumes or replays instead of starting over.
 *
 * @example
 * const runConfig = createRunConfig({ title: 'AI in Supply Chain', wordCount: 1500 });
 * const operational = loadOperationalConfig();
 * const result = await runArticlePipeline(runConfig, operational, createDefaultPipelineDeps(operational));
 */

export {
  runArticlePipeline,
  createDefaultPipelineDeps,
  type PipelineDeps,
  type PipelineOptions,
  type PipelineResult,
  type PipelineMetadata,
  type PipelineDegradation,
  type PhaseSource,
  type EnhancementStatus,
  type DefaultPipelineDepsOptions,
} from './pipeline-orchestrator';

export {
  createRunConfig,
  isSameRunRequest,
  loadOperationalConfig,
  DEFAULT_OPERATIONAL_CONFIG,
  RESEARCH_STRATEGIES,
  ENHANCEMENT_FAILURE_POLICIES,
  type RunConfigInput,
  type OperationalConfig,
  type ResearchStrategy,
  type EnhancementFailurePolicy,
} from './run-config';

export { FilePhaseCache, validateArtifact, ArtifactValidationError, type PhaseCache } from './phase-cache';

export * from './article-schemas';

export {
  ArticleGenerationError,
  isArticleGenerationError,
  MalformedOutputError,
  ToolFailureError,
  CoverageMismatchError,
  EnhancementRejectedError,
  PIPELINE_PHASES,
  PIPELINE_STATES,
  PHASE_CACHE_NAMES,
  isPipelineCacheName,
  type ArticleGenerationErrorCode,
  type ArticleProgressCallback,
  type PipelineStateCallback,
  type PipelinePhase,
  type PipelineState,
  type PhaseCacheName,
  type TokenUsage,
} from './types';

export {
  createAiTextGenerationAgent,
  createRoleDispatchAgent,
  type TextGenerationAgent,
  type AiTextGenerationAgent,
  type AgentRole,
  type RoleHandlers,
} from './agents';

export { createContentFetchService, type ContentFetchService } from './services/content-fetch-service';
