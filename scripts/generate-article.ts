/**
 * Generates one article from the command line.
 * Run with: npx tsx scripts/generate-article.ts --title "AI in Supply Chain" --words 1500
 *
 * Options:
 *   --title <text>            Article title (required)
 *   --description <text>      What the article should cover
 *   --layout <text>           Required section structure
 *   --words <n>               Target word count (default: 1500)
 *   --strategy <name>         individual | batch
 *   --max-retries <n>         Plain research attempts per section
 *   --concurrency <n>         Section synthesis cap (0 = all at once)
 *   --enhancement-policy <p>  degrade | abort
 *   --data-dir <dir>          Where phase artifacts are cached
 *   --clear <phase|all>       Drop a cached phase (or the whole run) first
 */

import { config } from 'dotenv';
config();

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';

import { isTavilyConfigured } from '../src/ai/tools/tavily';
import {
  createDefaultPipelineDeps,
  createRunConfig,
  ENHANCEMENT_FAILURE_POLICIES,
  FilePhaseCache,
  isArticleGenerationError,
  isPipelineCacheName,
  loadOperationalConfig,
  PHASE_CACHE_NAMES,
  RESEARCH_STRATEGIES,
  runArticlePipeline,
  type EnhancementFailurePolicy,
  type ResearchStrategy,
} from '../src/ai/articles';

const DEFAULT_WORD_COUNT = 1500;

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${flag} must be a non-negative integer (got "${value}")`);
  }
  return parsed;
}

function parseStrategy(value: string | undefined): ResearchStrategy | undefined {
  if (value === undefined) return undefined;
  const match = RESEARCH_STRATEGIES.find((strategy) => strategy === value);
  if (!match) throw new Error(`--strategy must be one of ${RESEARCH_STRATEGIES.join(', ')}`);
  return match;
}

function parsePolicy(value: string | undefined): EnhancementFailurePolicy | undefined {
  if (value === undefined) return undefined;
  const match = ENHANCEMENT_FAILURE_POLICIES.find((policy) => policy === value);
  if (!match) throw new Error(`--enhancement-policy must be one of ${ENHANCEMENT_FAILURE_POLICIES.join(', ')}`);
  return match;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      title: { type: 'string' },
      description: { type: 'string' },
      layout: { type: 'string' },
      words: { type: 'string' },
      strategy: { type: 'string' },
      'max-retries': { type: 'string' },
      concurrency: { type: 'string' },
      'enhancement-policy': { type: 'string' },
      'data-dir': { type: 'string' },
      clear: { type: 'string' },
    },
  });

  if (!values.title) {
    throw new Error('--title is required');
  }

  const runConfig = createRunConfig({
    title: values.title,
    description: values.description,
    layout: values.layout,
    wordCount: parseCount(values.words, '--words') ?? DEFAULT_WORD_COUNT,
  });

  const strategy = parseStrategy(values.strategy);
  const maxRetries = parseCount(values['max-retries'], '--max-retries');
  const concurrency = parseCount(values.concurrency, '--concurrency');
  const policy = parsePolicy(values['enhancement-policy']);
  const operational = loadOperationalConfig(process.env, {
    ...(strategy !== undefined ? { researchStrategy: strategy } : {}),
    ...(maxRetries !== undefined ? { researchMaxRetries: maxRetries } : {}),
    ...(concurrency !== undefined ? { synthesisConcurrency: concurrency } : {}),
    ...(policy !== undefined ? { enhancementFailurePolicy: policy } : {}),
    ...(values['data-dir'] ? { dataDir: values['data-dir'] } : {}),
  });

  const cache = new FilePhaseCache({ dataDir: operational.dataDir });
  const runDir = cache.namespaceDir(runConfig.runIdentifier);

  if (values.clear) {
    if (values.clear === 'all') {
      await cache.clear(runConfig.runIdentifier);
    } else if (isPipelineCacheName(values.clear)) {
      await cache.clear(runConfig.runIdentifier, values.clear);
    } else {
      throw new Error(`--clear must be "all" or one of ${PHASE_CACHE_NAMES.join(', ')}`);
    }
  }

  if (!isTavilyConfigured()) {
    console.warn('⚠️  TAVILY_API_KEY is not set; research will find no sources and fall back to placeholders');
  }

  console.log(`📝 "${runConfig.title}" → ${runDir}`);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\n⏹️  Cancelling after the current step...');
    controller.abort();
  });

  const result = await runArticlePipeline(
    runConfig,
    operational,
    createDefaultPipelineDeps(operational, { signal: controller.signal }),
    {
      signal: controller.signal,
      onProgress: (phase, progress, message) =>
        console.log(`   [${phase}] ${String(progress).padStart(3)}%${message ? ` ${message}` : ''}`),
    }
  );

  const markdown = result.enhanced?.fullText ?? result.finalArticle.fullText;
  await writeFile(join(runDir, 'article.md'), `${markdown.trim()}\n`, 'utf8');
  if (result.enhanced && result.enhanced.htmlRendering.trim().length > 0) {
    await writeFile(join(runDir, 'article.html'), result.enhanced.htmlRendering, 'utf8');
  }

  const { metadata } = result;
  console.log('\n✅ Done');
  console.log(`   Duration: ${(metadata.totalDurationMs / 1000).toFixed(1)}s`);
  console.log(`   Tokens: ${metadata.tokenUsage.input} in / ${metadata.tokenUsage.output} out`);
  console.log(`   Sections: ${result.synthesized.sections.length}/${result.plans.sections.length}`);
  console.log(`   References: ${result.finalArticle.references.length}`);
  console.log(`   Enhancement: ${metadata.degradation.enhancement.status}`);
  console.log(`   Output: ${join(runDir, 'article.md')}`);
}

main().catch((error: unknown) => {
  if (isArticleGenerationError(error)) {
    console.error(`\n❌ ${error.code}: ${error.message}`);
  } else {
    console.error('\n❌', error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
});
