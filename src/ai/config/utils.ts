/**
 * AI Configuration Utilities
 *
 * Centralized model selection for every pipeline role.
 * Change default models here - no need to modify individual agents.
 */

/**
 * Environment variable names for each pipeline role.
 * Set these env vars to override the default models.
 */
export const AI_ENV_KEYS = {
  PLANNER: 'AI_MODEL_PLANNER',
  RESEARCHER: 'AI_MODEL_RESEARCHER',
  RECOVERY: 'AI_MODEL_RECOVERY',
  SYNTHESIZER: 'AI_MODEL_SYNTHESIZER',
  COMPOSER: 'AI_MODEL_COMPOSER',
  ENHANCER: 'AI_MODEL_ENHANCER',
} as const;

/**
 * Default models for each pipeline role.
 *
 * Environment variables (AI_ENV_KEYS) take precedence over these defaults.
 *
 * Available models (OpenRouter):
 * - 'deepseek/deepseek-v3.2' - Fast, cost-effective, good quality
 * - 'anthropic/claude-sonnet-4' - Best quality for long-form writing
 * - 'openai/gpt-4o-mini' - Good balance of speed/cost
 */
export const AI_DEFAULT_MODELS = {
  PLANNER: 'anthropic/claude-sonnet-4',
  RESEARCHER: 'openai/gpt-4o-mini',
  RECOVERY: 'openai/gpt-4o-mini',
  SYNTHESIZER: 'deepseek/deepseek-v3.2',
  COMPOSER: 'anthropic/claude-sonnet-4',
  ENHANCER: 'anthropic/claude-sonnet-4',
} as const;

export type AITaskKey = keyof typeof AI_ENV_KEYS;

/**
 * Get the model for a specific pipeline role.
 * Checks environment variable first, falls back to default model.
 *
 * @example
 * const model = getModel('PLANNER');
 * // Returns env var AI_MODEL_PLANNER if set, otherwise 'anthropic/claude-sonnet-4'
 */
export function getModel(
  taskKey: AITaskKey,
  env: Readonly<Record<string, string | undefined>> = process.env
): string {
  const envKey = AI_ENV_KEYS[taskKey];
  const defaultModel = AI_DEFAULT_MODELS[taskKey];
  return env[envKey] || defaultModel;
}
