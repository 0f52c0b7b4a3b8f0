/**
 * Section Synthesis
 *
 * Fans out one synthesizer call per planned section. A failed section is
 * logged and left out; the phase only fails when no section survives.
 * Sections are joined in plan order, never completion order.
 */

import type { Logger } from '../../utils/logger';
import type {
  ResearchNotes,
  RunConfig,
  SectionPlans,
  SectionResearchNotes,
  SynthesizedArticle,
  SynthesizedSection,
} from './article-schemas';
import type { TextGenerationAgent } from './agents/text-generation-agent';
import { fanOut, fulfilledValues } from './concurrent-fan-out';
import { SYNTHESIS_CONFIG } from './config';
import { createPlaceholderNotes } from './research-controller';
import { getErrorMessage } from './types';

export interface SectionSynthesisDeps {
  readonly agent: TextGenerationAgent;
  readonly runConfig: RunConfig;
  readonly logger: Logger;
}

export interface SectionSynthesisOptions {
  /** Cap on concurrent synthesizer calls; 0 or undefined starts all at once */
  readonly concurrency?: number;
  /** Called as each section settles */
  readonly onSectionSettled?: (settled: number, total: number, title: string) => void;
}

/**
 * Thrown when every section failed to synthesize.
 */
export class SectionSynthesisError extends Error {
  readonly name = 'SectionSynthesisError';

  constructor(readonly failures: readonly { readonly sectionId: string; readonly reason: string }[]) {
    super(
      `All ${failures.length} section(s) failed to synthesize: ` +
        failures.map((failure) => `${failure.sectionId} (${failure.reason})`).join('; ')
    );
  }
}

/**
 * Joins sections into one markdown document.
 */
export function concatenateSections(sections: readonly SynthesizedSection[]): string {
  return sections.map((section) => section.content.trim()).join(SYNTHESIS_CONFIG.SECTION_SEPARATOR);
}

/**
 * Words budgeted per section, never below 100.
 */
export function wordsPerSection(wordCount: number, sectionCount: number): number {
  return Math.max(100, Math.round(wordCount / Math.max(1, sectionCount)));
}

export async function synthesizeSections(
  plans: SectionPlans,
  notes: ResearchNotes,
  options: SectionSynthesisOptions,
  deps: SectionSynthesisDeps
): Promise<SynthesizedArticle> {
  const { agent, runConfig, logger: log } = deps;
  const notesBySection = new Map(notes.notesBySection.map((entry) => [entry.sectionId, entry] as const));
  const targetWords = wordsPerSection(runConfig.wordCount, plans.sections.length);

  const results = await fanOut(
    plans.sections,
    async (plan): Promise<SynthesizedSection> => {
      let sectionNotes: SectionResearchNotes | undefined = notesBySection.get(plan.sectionId);
      if (!sectionNotes) {
        log.warn(`No research notes for "${plan.title}"; writing from the plan alone`);
        sectionNotes = createPlaceholderNotes(plan, 'no research notes were recorded');
      }

      const section = await agent.run(
        'synthesizer',
        { plan, notes: sectionNotes, brief: plans.brief, targetWords },
        runConfig
      );
      return { ...section, sectionId: plan.sectionId };
    },
    {
      concurrency: options.concurrency,
      logger: log,
      onSettled: (result, settled, total) => {
        const plan = plans.sections[result.index];
        if (result.status === 'rejected') {
          log.warn(`Section "${plan.title}" failed: ${getErrorMessage(result.reason)}`);
        }
        options.onSectionSettled?.(settled, total, plan.title);
      },
    }
  );

  const sections = fulfilledValues(results);
  const failures = results.flatMap((result) =>
    result.status === 'rejected'
      ? [{ sectionId: plans.sections[result.index].sectionId, reason: getErrorMessage(result.reason) }]
      : []
  );

  if (sections.length === 0) {
    throw new SectionSynthesisError(failures);
  }

  if (failures.length > 0) {
    log.warn(`Continuing with ${sections.length}/${plans.sections.length} sections`);
  }

  return {
    sections,
    concatenatedText: concatenateSections(sections),
    failedSectionIds: failures.map((failure) => failure.sectionId),
  };
}
