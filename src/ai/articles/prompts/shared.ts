/**
 * Shared prompt fragments and formatting helpers.
 */

import type { ArticleBrief, SectionPlan, SectionResearchNotes } from '../article-schemas';

/** Per-source character budget when research content is inlined into a prompt */
export const SOURCE_EXCERPT_CHARS = 4_000;

export const LOCALE_INSTRUCTION = 'Write all strings in English.';

export function formatBulletList(items: readonly string[], emptyText = '(none)'): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : emptyText;
}

export function formatBrief(brief: ArticleBrief): string {
  return [
    `Topic: ${brief.topic}`,
    `Audience: ${brief.targetAudience}`,
    `Tone: ${brief.tone}`,
    `Keywords: ${brief.keywords.join(', ') || '(none)'}`,
    `Target length: ${brief.desiredLengthWords} words`,
  ].join('\n');
}

export function formatSectionPlan(plan: SectionPlan): string {
  return [
    `Section ${plan.sectionId}: ${plan.title}`,
    'Key points:',
    formatBulletList(plan.keyPoints),
    'Research queries:',
    formatBulletList(plan.researchQueries ?? []),
  ].join('\n');
}

/**
 * Inlines findings with their fetched page text, truncated per source.
 */
export function formatFindings(notes: SectionResearchNotes): string {
  if (notes.findings.length === 0) {
    return '(no findings; rely on the section plan and general knowledge)';
  }
  return notes.findings
    .map((finding, index) => {
      const body = finding.scrapedContent
        ? finding.scrapedContent.slice(0, SOURCE_EXCERPT_CHARS)
        : finding.snippet;
      return `[${index + 1}] ${finding.sourceUrl}\n${body}`;
    })
    .join('\n\n');
}
