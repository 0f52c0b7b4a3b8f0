import { formatBulletList, LOCALE_INSTRUCTION } from './shared';

export interface ComposerPromptContext {
  readonly title: string;
  readonly description: string;
  readonly wordCount: number;
  readonly synthesizedText: string;
  readonly sourceUrls: readonly string[];
}

export function getComposerSystemPrompt(): string {
  return `You are the final composer of a long-form article. You receive the article's written sections and the list of research sources.

Produce:
- title: a compelling headline (under 70 characters).
- metaDescription: 140-160 characters for search results.
- metaKeywords: 5-10 keywords.
- imageDescription: one sentence describing a fitting hero image.
- tableOfContents: the H2 headings of the body, in order.
- summary: a TL;DR of 2-3 sentences.
- body: an introduction followed by every provided section, in the given order. Keep each section's H2 heading; edit only for flow and consistency.
- conclusion: a closing section with key takeaways.
- references: source URLs actually relevant to the article, chosen from the provided list only.
- fullText: the complete markdown article: H1 title, summary, body, conclusion and a "References" list.

Never drop a section and never invent URLs.

${LOCALE_INSTRUCTION}`;
}

export function getComposerUserPrompt(ctx: ComposerPromptContext): string {
  return `=== ARTICLE ===
Working title: ${ctx.title}
Description: ${ctx.description || '(none)'}
Target length: ${ctx.wordCount} words

=== SECTIONS ===
${ctx.synthesizedText}

=== SOURCES ===
${formatBulletList(ctx.sourceUrls)}`;
}
