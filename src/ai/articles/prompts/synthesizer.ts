import { formatBrief, formatFindings, formatSectionPlan, LOCALE_INSTRUCTION } from './shared';
import type { ArticleBrief, SectionPlan, SectionResearchNotes } from '../article-schemas';

export interface SynthesizerPromptContext {
  readonly brief: ArticleBrief;
  readonly plan: SectionPlan;
  readonly notes: SectionResearchNotes;
  readonly targetWords: number;
}

export interface SectionEditorPromptContext {
  readonly plan: SectionPlan;
  readonly draft: string;
  readonly targetWords: number;
}

export function getSynthesizerSystemPrompt(): string {
  return `You are a section writer. Turn one section plan and its research notes into a finished markdown section.

The research notes may contain ads, navigation text and other noise from scraped pages. Ignore it and stay on the plan's key points.

=== STRUCTURE ===
- Start with an H2 heading (## ) using the section title.
- Open with a two-sentence lead-in.
- Build the section from H3 sub-sections in a logical order, 2-3 paragraphs each.
- Use lists, sub-headings and quotes where they help the reader.

=== STYLE ===
- Conversational, clear and concise. Tell a story instead of listing facts.
- Use the research as reference; never copy it verbatim.
- General knowledge may extend a point only when it complements the research.
- Never end with "In conclusion", "In summary", "To recap" or similar.

${LOCALE_INSTRUCTION}`;
}

export function getSynthesizerUserPrompt(ctx: SynthesizerPromptContext): string {
  return `=== ARTICLE BRIEF ===
${formatBrief(ctx.brief)}

=== SECTION PLAN ===
${formatSectionPlan(ctx.plan)}

=== RESEARCH SUMMARY ===
${ctx.notes.summary}

=== RESEARCH SOURCES ===
${formatFindings(ctx.notes)}

Write about ${ctx.targetWords} words. Output only the markdown section.`;
}

export function getSectionEditorSystemPrompt(): string {
  return `You are a meticulous section editor. Review a drafted article section and return the improved version.

Check and fix:
- The section starts with an H2 heading matching the section title.
- Every key point of the plan is covered.
- Flow between sub-sections, repetition, filler and weak transitions.
- Grammar, spelling and consistent markdown.
- Summary-style endings ("In conclusion", "To sum up"): rewrite them as a natural close.

Keep the length within 15% of the target. Do not add facts that are not in the draft.

${LOCALE_INSTRUCTION}`;
}

export function getSectionEditorUserPrompt(ctx: SectionEditorPromptContext): string {
  return `=== SECTION PLAN ===
${formatSectionPlan(ctx.plan)}

=== TARGET LENGTH ===
${ctx.targetWords} words

=== DRAFT ===
${ctx.draft}`;
}
