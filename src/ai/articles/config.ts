/**
 * Article Pipeline Configuration
 *
 * Centralized configuration for every pipeline phase and collaborator.
 * All magic numbers and tuning parameters should be defined here.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time if configuration is inconsistent.
 */
class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Article pipeline config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates that a MIN value is less than or equal to MAX value.
 */
function validateMinMax(
  minValue: number,
  maxValue: number,
  minName: string,
  maxName: string
): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

/**
 * Validates that a value is positive.
 */
function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

/**
 * Validates that a value is non-negative.
 */
function validateNonNegative(value: number, name: string): void {
  if (value < 0) {
    throw new ConfigValidationError(`${name} cannot be negative (got ${value})`);
  }
}

/**
 * Validates temperature is in valid range (0-2).
 */
function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Plan Constraints
// ============================================================================

/**
 * Constraints for section plans produced by the planner role.
 * Used by Zod schemas and prompts for consistency.
 */
export const PLAN_CONSTRAINTS = {
  MIN_SECTIONS: 1,
  MAX_SECTIONS: 12,
  MAX_RESEARCH_QUERIES_PER_SECTION: 5,
  /** The recovery advisor must propose between 3 and 5 fresh queries */
  MIN_RECOVERY_QUERIES: 3,
  MAX_RECOVERY_QUERIES: 5,
} as const;

// ============================================================================
// Research Configuration
// ============================================================================

export const RESEARCH_CONFIG = {
  /** Default strategy when none is configured */
  DEFAULT_STRATEGY: 'individual',
  /** Plain research attempts before the recovery advisor is consulted */
  DEFAULT_MAX_RETRIES: 2,
  /** Search results kept per research query */
  RESULTS_PER_QUERY: 3,
  /** Summary recorded for sections that have no research queries */
  NO_QUERIES_SUMMARY: 'No research queries provided for this section',
} as const;

// ============================================================================
// Content Fetch Configuration
// ============================================================================

export const CONTENT_FETCH_CONFIG = {
  /** Per-URL fetch timeout in milliseconds */
  TIMEOUT_MS: 30_000,
  /** Maximum concurrent page fetches */
  CONCURRENCY: 5,
  /** Word budget per fetched source */
  MAX_WORDS: 10_000,
  /** Cleaned text shorter than this is discarded */
  MIN_CONTENT_LENGTH: 100,
  /** Document types that cannot be turned into article text */
  EXCLUDED_EXTENSIONS: ['.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx'],
  USER_AGENT: 'Mozilla/5.0 (compatible; ArticlePipeline/1.0)',
} as const;

// ============================================================================
// Synthesis Configuration
// ============================================================================

export const SYNTHESIS_CONFIG = {
  /** 0 means every section starts at once */
  DEFAULT_CONCURRENCY: 0,
  /** Separator between synthesized sections in the concatenated text */
  SECTION_SEPARATOR: '\n\n',
} as const;

// ============================================================================
// Temperature Configuration
// ============================================================================

export const TEMPERATURES = {
  PLANNER: 0.4,
  RESEARCHER: 0.2,
  RECOVERY: 0.5,
  SYNTHESIZER: 0.6,
  SECTION_EDITOR: 0.3,
  COMPOSER: 0.4,
  ENHANCER: 0.5,
} as const;

// ============================================================================
// Retry Configuration
// ============================================================================

/**
 * Transport-level retries for LLM and HTTP calls (exponential backoff).
 * Research attempts are governed separately by OperationalConfig.researchMaxRetries.
 */
export const RETRY_CONFIG = {
  /** Maximum number of retry attempts */
  MAX_RETRIES: 3,
  /** Initial delay in milliseconds before first retry */
  INITIAL_DELAY_MS: 1000,
  /** Maximum delay in milliseconds between retries */
  MAX_DELAY_MS: 10000,
  /** Multiplier for exponential backoff */
  BACKOFF_MULTIPLIER: 2,
} as const;

// ============================================================================
// LLM Call Configuration
// ============================================================================

export const LLM_CALL_CONFIG = {
  /** Per-attempt timeout for one generateObject/generateText call */
  TIMEOUT_MS: 180_000,
} as const;

// ============================================================================
// Generator Configuration
// ============================================================================

export const GENERATOR_CONFIG = {
  /** Default OpenRouter base URL */
  DEFAULT_OPENROUTER_BASE_URL: 'https://openrouter.ai/api/v1',
  /** Default directory for phase artifacts */
  DEFAULT_DATA_DIR: 'data',
  /**
   * Progress reporting constants for the section synthesis phase.
   * Section progress is reported between START and END percentages.
   */
  SYNTHESIS_PROGRESS_START: 10,
  SYNTHESIS_PROGRESS_END: 90,
} as const;

// ============================================================================
// Runtime Configuration Validation
// ============================================================================

/**
 * Validates all configuration values at module load time.
 * Throws ConfigValidationError if any values are inconsistent.
 */
function validateConfiguration(): void {
  validateMinMax(PLAN_CONSTRAINTS.MIN_SECTIONS, PLAN_CONSTRAINTS.MAX_SECTIONS, 'MIN_SECTIONS', 'MAX_SECTIONS');
  validateMinMax(
    PLAN_CONSTRAINTS.MIN_RECOVERY_QUERIES,
    PLAN_CONSTRAINTS.MAX_RECOVERY_QUERIES,
    'MIN_RECOVERY_QUERIES',
    'MAX_RECOVERY_QUERIES'
  );

  validateNonNegative(RESEARCH_CONFIG.DEFAULT_MAX_RETRIES, 'RESEARCH_CONFIG.DEFAULT_MAX_RETRIES');
  validatePositive(RESEARCH_CONFIG.RESULTS_PER_QUERY, 'RESEARCH_CONFIG.RESULTS_PER_QUERY');

  validatePositive(CONTENT_FETCH_CONFIG.TIMEOUT_MS, 'CONTENT_FETCH_CONFIG.TIMEOUT_MS');
  validatePositive(CONTENT_FETCH_CONFIG.CONCURRENCY, 'CONTENT_FETCH_CONFIG.CONCURRENCY');
  validatePositive(CONTENT_FETCH_CONFIG.MAX_WORDS, 'CONTENT_FETCH_CONFIG.MAX_WORDS');
  validateNonNegative(CONTENT_FETCH_CONFIG.MIN_CONTENT_LENGTH, 'CONTENT_FETCH_CONFIG.MIN_CONTENT_LENGTH');

  validateNonNegative(SYNTHESIS_CONFIG.DEFAULT_CONCURRENCY, 'SYNTHESIS_CONFIG.DEFAULT_CONCURRENCY');

  for (const [name, value] of Object.entries(TEMPERATURES)) {
    validateTemperature(value, `TEMPERATURES.${name}`);
  }

  validatePositive(RETRY_CONFIG.MAX_RETRIES, 'RETRY_CONFIG.MAX_RETRIES');
  validatePositive(RETRY_CONFIG.INITIAL_DELAY_MS, 'RETRY_CONFIG.INITIAL_DELAY_MS');
  validateMinMax(RETRY_CONFIG.INITIAL_DELAY_MS, RETRY_CONFIG.MAX_DELAY_MS, 'INITIAL_DELAY_MS', 'MAX_DELAY_MS');

  validatePositive(LLM_CALL_CONFIG.TIMEOUT_MS, 'LLM_CALL_CONFIG.TIMEOUT_MS');

  validateMinMax(
    GENERATOR_CONFIG.SYNTHESIS_PROGRESS_START,
    GENERATOR_CONFIG.SYNTHESIS_PROGRESS_END,
    'SYNTHESIS_PROGRESS_START',
    'SYNTHESIS_PROGRESS_END'
  );
}

validateConfiguration();
