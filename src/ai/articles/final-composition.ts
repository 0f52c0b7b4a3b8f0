/**
 * Final Composition and Enhancement
 *
 * Both are single all-or-nothing collaborator calls. Composition assembles
 * the synthesized sections into a structured article; enhancement polishes
 * the composed text and renders it to HTML for preview.
 */

import type { Logger } from '../../utils/logger';
import type {
  EnhancedArticle,
  FinalArticle,
  ResearchNotes,
  RunConfig,
  SynthesizedArticle,
} from './article-schemas';
import type { TextGenerationAgent } from './agents/text-generation-agent';
import { collectSourceUrls } from './content-augmentation';
import { EnhancementRejectedError } from './types';

export interface CompositionDeps {
  readonly agent: TextGenerationAgent;
  readonly runConfig: RunConfig;
  readonly logger: Logger;
}

/**
 * Counts whitespace-separated words.
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export async function composeFinalArticle(
  synthesized: SynthesizedArticle,
  notes: ResearchNotes,
  deps: CompositionDeps
): Promise<FinalArticle> {
  const sourceUrls = collectSourceUrls(notes);
  const article = await deps.agent.run(
    'composer',
    { synthesizedText: synthesized.concatenatedText, sourceUrls },
    deps.runConfig
  );

  if (article.references.length === 0 && sourceUrls.length > 0) {
    deps.logger.warn(`Composer returned no references; using the ${sourceUrls.length} research sources`);
    return { ...article, references: sourceUrls };
  }
  return article;
}

/**
 * Runs the enhancer and rejects output that is empty or shorter than its input.
 *
 * @throws EnhancementRejectedError for degraded output
 */
export async function enhanceArticle(article: FinalArticle, deps: CompositionDeps): Promise<EnhancedArticle> {
  const { runConfig } = deps;
  const enhanced = await deps.agent.run(
    'enhancer',
    {
      fullText: article.fullText,
      title: runConfig.title,
      description: runConfig.description,
      wordCount: runConfig.wordCount,
      ...(runConfig.layout !== undefined ? { layout: runConfig.layout } : {}),
    },
    runConfig
  );

  const before = countWords(article.fullText);
  const after = countWords(enhanced.fullText);
  if (after === 0) {
    throw new EnhancementRejectedError('Enhancer returned empty text');
  }
  if (after < before) {
    throw new EnhancementRejectedError(`Enhancer shortened the article from ${before} to ${after} words`);
  }

  deps.logger.info(`Enhanced article: ${before} → ${after} words`);
  return enhanced;
}
