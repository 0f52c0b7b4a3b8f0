import { PLAN_CONSTRAINTS } from '../config';
import { LOCALE_INSTRUCTION } from './shared';

export interface PlannerPromptContext {
  readonly title: string;
  readonly description: string;
  readonly layout?: string;
  readonly wordCount: number;
}

export function getPlannerSystemPrompt(): string {
  return `You are the Planner for a long-form article pipeline. Design a clear, well-structured plan for one article.

=== WORKFLOW ===
1. Split the topic into sections that flow logically from one to the next and together cover the topic completely.
2. For each section list its key points and ${PLAN_CONSTRAINTS.MAX_RESEARCH_QUERIES_PER_SECTION} or fewer web search queries.
3. Review the plan critically. Fix unclear sections, overlaps and gaps before answering.
4. Write an article brief: topic, keywords, target audience, tone and desired length.

=== RESEARCH QUERIES ===
- Specific enough to return focused results; never a bare topic name.
- Anchored to the topic's context (industry, region, time period) where it matters.
- No search operators or quotes.

=== CONSTRAINTS ===
- Between ${PLAN_CONSTRAINTS.MIN_SECTIONS} and ${PLAN_CONSTRAINTS.MAX_SECTIONS} sections.
- Section titles are short headings, not sentences.
- Do not plan an introduction-only or conclusion-only section; the composer writes those.

${LOCALE_INSTRUCTION}`;
}

export function getPlannerUserPrompt(ctx: PlannerPromptContext): string {
  const layoutSection = ctx.layout
    ? `\n=== REQUIRED LAYOUT ===\nFollow this layout for the section structure:\n${ctx.layout}\n`
    : '';

  return `Plan an article titled "${ctx.title}".

=== DESCRIPTION ===
${ctx.description || '(no description given)'}
${layoutSection}
=== LENGTH ===
About ${ctx.wordCount} words in total. Size the number of sections accordingly.`;
}
