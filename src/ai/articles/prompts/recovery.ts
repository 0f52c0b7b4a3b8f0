import { PLAN_CONSTRAINTS } from '../config';
import { formatBrief, formatSectionPlan, LOCALE_INSTRUCTION } from './shared';
import type { ArticleBrief, SectionPlan } from '../article-schemas';

export interface RecoveryPromptContext {
  readonly title: string;
  readonly description: string;
  readonly brief: ArticleBrief;
  readonly plan: SectionPlan;
  readonly failureReason: string;
}

export function getRecoverySystemPrompt(title: string, description: string): string {
  return `You are a research recovery advisor. Research for one section of an article has failed repeatedly.
Work out why and propose better research queries.

Article context:
- Title: ${title}
- Description: ${description || '(none)'}

COMMON FAILURE REASONS:
- Queries too broad or generic
- Queries too narrow or using jargon that returns nothing
- Queries missing the article's context (industry, region, time period)

IMPROVEMENT STRATEGIES:
- Make queries specific and answerable
- Add the current year for time-sensitive topics
- Use alternative terms and synonyms
- Break compound queries into simpler ones
- Phrase some queries as questions

Return the section with ${PLAN_CONSTRAINTS.MIN_RECOVERY_QUERIES}-${PLAN_CONSTRAINTS.MAX_RECOVERY_QUERIES} NEW research queries and a short rationale.
Keep the title and key points unless they caused the failure.

${LOCALE_INSTRUCTION}`;
}

export function getRecoveryUserPrompt(ctx: RecoveryPromptContext): string {
  return `=== ARTICLE BRIEF ===
${formatBrief(ctx.brief)}

=== FAILED SECTION ===
${formatSectionPlan(ctx.plan)}

=== LAST FAILURE ===
${ctx.failureReason}`;
}
