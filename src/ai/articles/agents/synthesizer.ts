/**
 * Synthesizer Agent
 *
 * Writes one section in two passes: a free-text draft from the plan and
 * research, then an editor pass that returns the reviewed section.
 */

import type { LanguageModel } from 'ai';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import type { SynthesizedSection } from '../article-schemas';
import { TEMPERATURES } from '../config';
import {
  getSectionEditorSystemPrompt,
  getSectionEditorUserPrompt,
  getSynthesizerSystemPrompt,
  getSynthesizerUserPrompt,
} from '../prompts';
import { withRetry } from '../retry';
import { addTokenUsage, type TokenUsage } from '../types';
import { createAttemptSignal, toTokenUsage } from './llm-call';
import type { SynthesizerInput } from './text-generation-agent';

// ============================================================================
// Types
// ============================================================================

export interface SynthesizerDeps {
  readonly generateText: typeof import('ai').generateText;
  readonly generateObject: typeof import('ai').generateObject;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  /** Draft temperature (default: TEMPERATURES.SYNTHESIZER) */
  readonly temperature?: number;
}

export interface SynthesizerOutput {
  readonly section: SynthesizedSection;
  readonly tokenUsage: TokenUsage;
}

const EditedSectionSchema = z.object({
  content: z.string().min(1),
});

// ============================================================================
// Main Synthesizer Function
// ============================================================================

export async function runSynthesizer(input: SynthesizerInput, deps: SynthesizerDeps): Promise<SynthesizerOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Synthesizer]');
  const { plan, targetWords } = input;

  const draft = await withRetry(
    () =>
      deps.generateText({
        model: deps.model,
        temperature: deps.temperature ?? TEMPERATURES.SYNTHESIZER,
        system: getSynthesizerSystemPrompt(),
        prompt: getSynthesizerUserPrompt(input),
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: `Synthesizer draft for "${plan.title}"`, signal: deps.signal }
  );

  const draftText = draft.text.trim();
  if (draftText.length === 0) {
    throw new Error(`Synthesizer returned an empty draft for "${plan.title}"`);
  }

  log.debug(`Draft for "${plan.title}": ${draftText.length} chars`);

  const edited = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        temperature: TEMPERATURES.SECTION_EDITOR,
        schema: EditedSectionSchema,
        system: getSectionEditorSystemPrompt(),
        prompt: getSectionEditorUserPrompt({ plan, draft: draftText, targetWords }),
        abortSignal: createAttemptSignal(deps.signal),
      }),
    { context: `Section editor for "${plan.title}"`, signal: deps.signal }
  );

  log.info(`Wrote "${plan.title}"`);

  return {
    section: { sectionId: plan.sectionId, title: plan.title, content: edited.object.content.trim() },
    tokenUsage: addTokenUsage(toTokenUsage(draft.usage), toTokenUsage(edited.usage)),
  };
}
