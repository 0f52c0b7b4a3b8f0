/**
 * Helpers shared by the LLM-backed roles.
 */

import type { LanguageModelUsage } from 'ai';

import { LLM_CALL_CONFIG } from '../config';
import { createEmptyTokenUsage, type TokenUsage } from '../types';

/**
 * Creates a fresh timeout signal for one attempt, linked to the caller's
 * signal when there is one. Each retry gets its own window.
 */
export function createAttemptSignal(signal?: AbortSignal, timeoutMs: number = LLM_CALL_CONFIG.TIMEOUT_MS): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;
}

/**
 * Maps AI SDK usage to TokenUsage (AI SDK v5 uses inputTokens/outputTokens).
 */
export function toTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage {
  return usage ? { input: usage.inputTokens ?? 0, output: usage.outputTokens ?? 0 } : createEmptyTokenUsage();
}
