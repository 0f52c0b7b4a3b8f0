import { formatBrief, formatSectionPlan, LOCALE_INSTRUCTION } from './shared';
import type { ArticleBrief, SectionPlan } from '../article-schemas';
import type { SearchHit } from '../../tools/tavily';

export interface ResearchPromptSection {
  readonly plan: SectionPlan;
  readonly hits: readonly SearchHit[];
}

export interface ResearcherPromptContext {
  readonly brief: ArticleBrief;
  readonly sections: readonly ResearchPromptSection[];
}

export function getResearcherSystemPrompt(): string {
  return `You are a research analyst. You receive search results gathered for one or more planned article sections.
For each section, write a factual summary of what the results establish about its key points.

Rules:
- Use only the provided results. Do not invent facts, figures or sources.
- Mention where results disagree or where a key point has no support.
- 3-6 sentences per section.
- Return one entry per section, using the exact sectionId given.

${LOCALE_INSTRUCTION}`;
}

function formatHits(hits: readonly SearchHit[]): string {
  return hits.map((hit, index) => `[${index + 1}] ${hit.url}\n${hit.snippet}`).join('\n\n');
}

export function getResearcherUserPrompt(ctx: ResearcherPromptContext): string {
  const sections = ctx.sections
    .map((section) => `${formatSectionPlan(section.plan)}\n\nSearch results:\n${formatHits(section.hits) || '(none)'}`)
    .join('\n\n---\n\n');

  return `=== ARTICLE BRIEF ===
${formatBrief(ctx.brief)}

=== SECTIONS ===
${sections}`;
}
