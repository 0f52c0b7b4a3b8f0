import { LOCALE_INSTRUCTION } from './shared';

export interface EnhancerPromptContext {
  readonly title: string;
  readonly description: string;
  readonly wordCount: number;
  readonly layout?: string;
  readonly fullText: string;
}

export function getEnhancerSystemPrompt(): string {
  return `You are a senior editor giving a finished article its final polish.

Improve readability, transitions, headings and formatting. Strengthen weak passages with concrete detail already implied by the text.
Never shorten the article, remove sections or drop references. The result must be at least as long as the input.

Return:
- fullText: the improved article as markdown.
- htmlRendering: the same article rendered as a self-contained HTML fragment (no <html>, <head> or <body>), using semantic tags.

${LOCALE_INSTRUCTION}`;
}

export function getEnhancerUserPrompt(ctx: EnhancerPromptContext): string {
  const layoutLine = ctx.layout ? `\nLayout: ${ctx.layout}` : '';
  return `=== ARTICLE METADATA ===
Title: ${ctx.title}
Description: ${ctx.description || '(none)'}
Target length: ${ctx.wordCount} words${layoutLine}

=== ARTICLE ===
${ctx.fullText}`;
}
