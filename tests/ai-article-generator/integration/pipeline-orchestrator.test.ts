/**
 * End-to-end pipeline runs against a real file cache in a temp directory,
 * with the fake agent and content fetcher from the shared fixtures.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  DEFAULT_OPERATIONAL_CONFIG,
  FilePhaseCache,
  runArticlePipeline,
  SectionPlansSchema,
  type OperationalConfig,
  type PipelineOptions,
  type PipelineResult,
  type PipelineState,
  type RunConfig,
} from '../../../src/ai/articles';
import { parseRoleOutput } from '../../../src/ai/articles/agents/text-generation-agent';
import { sleep } from '../../../src/ai/articles/retry';
import { ArticleGenerationError, createMockClock } from '../../../src/ai/articles/types';
import {
  countAgentCalls,
  createFakeAgent,
  createFakeHandlers,
  createFakeContentFetch,
  createMockLogger,
  createRunConfigFixture,
  pageTextFor,
  sourceUrlFor,
  SUPPLY_CHAIN_SECTION_TITLES,
  type FakeAgent,
  type FakeAgentOptions,
  type FakeContentFetch,
} from '../helpers/fixtures';

const NAMESPACE = 'ai-in-supply-chain';

describe('runArticlePipeline', () => {
  let dataDir: string;
  let cache: FilePhaseCache;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'article-pipeline-'));
    cache = new FilePhaseCache({ dataDir, logger: createMockLogger() });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  interface RunSetup {
    readonly runConfig?: RunConfig;
    readonly operational?: Partial<OperationalConfig>;
    readonly options?: PipelineOptions;
    readonly agentOptions?: FakeAgentOptions;
  }

  interface RunFixture {
    readonly fake: FakeAgent;
    readonly contentFetch: FakeContentFetch;
    readonly run: () => Promise<PipelineResult>;
  }

  const setup = (config: RunSetup = {}): RunFixture => {
    const fake = createFakeAgent(config.agentOptions);
    const contentFetch = createFakeContentFetch();
    const run = () =>
      runArticlePipeline(
        config.runConfig ?? createRunConfigFixture(),
        { ...DEFAULT_OPERATIONAL_CONFIG, dataDir, ...config.operational },
        { agent: fake.agent, contentFetch, cache },
        config.options
      );
    return { fake, contentFetch, run };
  };

  // ==========================================================================
  // Happy path
  // ==========================================================================

  describe('AI in Supply Chain', () => {
    it('runs every phase and produces a four-section article with all sources', async () => {
      const { fake, contentFetch, run } = setup();

      const result = await run();

      expect(result.plans.sections.map((s) => s.title)).toEqual([...SUPPLY_CHAIN_SECTION_TITLES]);
      expect(result.synthesized.sections).toHaveLength(4);
      expect(result.synthesized.failedSectionIds).toEqual([]);
      expect(result.finalArticle.body.match(/^## /gm)).toHaveLength(4);
      expect(result.finalArticle.references).toEqual(
        ['section-1', 'section-2', 'section-3', 'section-4'].map(sourceUrlFor)
      );
      expect(result.enhanced?.fullText).toBe(`${result.finalArticle.fullText}\n\nOne more polished paragraph.`);

      expect(fake.handlers.planner).toHaveBeenCalledTimes(1);
      expect(fake.handlers.researcher).toHaveBeenCalledTimes(4);
      expect(fake.handlers.synthesizer).toHaveBeenCalledTimes(4);
      expect(countAgentCalls(fake.handlers)).toBe(11);
      expect(contentFetch.fetchMany).toHaveBeenCalledTimes(1);

      expect(result.research.notes.notesBySection[0]?.findings[0]?.scrapedContent).toBe(
        pageTextFor(sourceUrlFor('section-1'))
      );
      expect(result.metadata.degradation).toEqual({
        research: { strategy: 'individual', sectionsTotal: 4, recoveredSectionIds: [], placeholderSectionIds: [] },
        augmentation: { totalUrls: 4, eligibleUrls: 4, fetchedUrls: 4, skippedUrls: 0, degraded: false },
        failedSectionIds: [],
        enhancement: { status: 'applied' },
      });
      expect(Object.values(result.metadata.phaseSources)).toEqual(Array(6).fill('computed'));
    });

    it('writes the body sections in plan order', async () => {
      const { fake, run } = setup();

      const result = await run();

      expect(result.synthesized.concatenatedText).toBe(
        SUPPLY_CHAIN_SECTION_TITLES.map((title) => `## ${title}\n\nSummary of ${title}`).join('\n\n')
      );
      expect(fake.handlers.composer.mock.calls[0]?.[0].synthesizedText).toBe(result.synthesized.concatenatedText);
    });

    it('walks the state machine from start to done', async () => {
      const transitions: [PipelineState, PipelineState][] = [];
      const { run } = setup({ options: { onStateChange: (from, to) => transitions.push([from, to]) } });

      await run();

      expect(transitions).toEqual([
        ['start', 'planning'],
        ['planning', 'researching'],
        ['researching', 'contentAugmentation'],
        ['contentAugmentation', 'sectionSynthesis'],
        ['sectionSynthesis', 'finalComposition'],
        ['finalComposition', 'enhancement'],
        ['enhancement', 'done'],
      ]);
    });

    it('reports metadata from the injected clock and correlation id', async () => {
      const { run } = setup({ options: { clock: createMockClock(0, 10), correlationId: 'test-run' } });

      const { metadata } = await run();

      expect(metadata.correlationId).toBe('test-run');
      expect(metadata.runIdentifier).toBe(NAMESPACE);
      expect(metadata.phaseDurations.planning).toBe(10);
      expect(metadata.totalDurationMs).toBe(60);
      expect(metadata.tokenUsage).toEqual({ input: 0, output: 0 });
    });
  });

  // ==========================================================================
  // Caching
  // ==========================================================================

  describe('phase cache', () => {
    it('replays a finished run without any collaborator call', async () => {
      const first = await setup().run();
      const { fake, contentFetch, run } = setup();

      const second = await run();

      expect(countAgentCalls(fake.handlers)).toBe(0);
      expect(contentFetch.fetchMany).not.toHaveBeenCalled();
      expect(second.plans).toEqual(first.plans);
      expect(second.research).toEqual(first.research);
      expect(second.synthesized).toEqual(first.synthesized);
      expect(second.finalArticle).toEqual(first.finalArticle);
      expect(second.enhanced).toEqual(first.enhanced);
      expect(Object.values(second.metadata.phaseSources)).toEqual(Array(6).fill('cached'));
      expect(second.metadata.degradation.enhancement).toEqual({ status: 'cached' });
      expect(second.metadata.degradation.research).toEqual({
        strategy: 'individual',
        sectionsTotal: 4,
        recoveredSectionIds: [],
        placeholderSectionIds: [],
      });
    });

    it('recomputes from a cleared phase onward and keeps earlier phases', async () => {
      await setup().run();
      await cache.clear(NAMESPACE, 'researching');

      expect(await cache.load(NAMESPACE, 'planning', SectionPlansSchema)).not.toBeNull();

      const { fake, run } = setup();
      const result = await run();

      expect(fake.handlers.planner).not.toHaveBeenCalled();
      expect(fake.handlers.researcher).toHaveBeenCalledTimes(4);
      expect(fake.handlers.synthesizer).toHaveBeenCalledTimes(4);
      expect(fake.handlers.enhancer).toHaveBeenCalledTimes(1);
      expect(result.metadata.phaseSources).toEqual({
        planning: 'cached',
        researching: 'computed',
        contentAugmentation: 'computed',
        sectionSynthesis: 'computed',
        finalComposition: 'computed',
        enhancement: 'computed',
      });
    });

    it('treats a corrupted artifact as a miss', async () => {
      await setup().run();
      await writeFile(cache.documentPath(NAMESPACE, 'researching'), '{"notesBySection": [', 'utf8');

      const { fake, run } = setup();
      const result = await run();

      expect(fake.handlers.planner).not.toHaveBeenCalled();
      expect(fake.handlers.researcher).toHaveBeenCalledTimes(4);
      expect(result.metadata.phaseSources.researching).toBe('computed');
    });

    it('recomputes everything when the run configuration changes', async () => {
      await setup().run();

      const { fake, run } = setup({ runConfig: createRunConfigFixture({ wordCount: 2000 }) });
      const result = await run();

      expect(fake.handlers.planner).toHaveBeenCalledTimes(1);
      expect(result.plans.brief.desiredLengthWords).toBe(2000);
      expect(Object.values(result.metadata.phaseSources)).toEqual(Array(6).fill('computed'));
    });

    it('never mixes artifacts of an earlier request into a resumed run', async () => {
      await setup().run();
      const revised = createRunConfigFixture({ wordCount: 2000 });
      const [firstTitle] = SUPPLY_CHAIN_SECTION_TITLES;

      const interrupted = setup({ runConfig: revised });
      interrupted.fake.handlers.researcher.mockImplementation(async ({ plan }) => ({
        sectionId: plan.sectionId,
        findings: [{ sourceUrl: sourceUrlFor(plan.sectionId), snippet: `Snippet about ${plan.title}`, relevanceScore: null }],
        summary: `v2 summary of ${plan.title}`,
      }));
      interrupted.fake.handlers.synthesizer.mockRejectedValue(new Error('model overloaded'));

      await expect(interrupted.run()).rejects.toMatchObject({ code: 'SYNTHESIS_FAILED' });
      expect(await cache.exists(NAMESPACE, 'synthesize_sections')).toBe(false);
      expect(await cache.exists(NAMESPACE, 'final_article_creation')).toBe(false);
      expect(await cache.exists(NAMESPACE, 'enhancement')).toBe(false);

      const { fake, run } = setup({ runConfig: revised });
      const result = await run();

      expect(fake.handlers.researcher).not.toHaveBeenCalled();
      expect(fake.handlers.synthesizer).toHaveBeenCalledTimes(4);
      expect(result.synthesized.sections[0]?.content).toBe(`## ${firstTitle}\n\nv2 summary of ${firstTitle}`);
      expect(result.finalArticle.body).toBe(result.synthesized.concatenatedText);
      expect(result.metadata.phaseSources).toEqual({
        planning: 'cached',
        researching: 'cached',
        contentAugmentation: 'cached',
        sectionSynthesis: 'computed',
        finalComposition: 'computed',
        enhancement: 'computed',
      });
    });

    it('drops the old enhancement when a recomposed article fails to enhance', async () => {
      await setup().run();
      await cache.clear(NAMESPACE, 'final_article_creation');

      const composeDefault = createFakeHandlers().composer;
      const degraded = setup();
      degraded.fake.handlers.composer.mockImplementation(async (input, context) => {
        const article = parseRoleOutput('composer', await composeDefault(input, context));
        return { ...article, fullText: `${article.fullText}\n\nRevised for v2.` };
      });
      degraded.fake.handlers.enhancer.mockRejectedValue(new Error('model overloaded'));

      const second = await degraded.run();

      expect(second.enhanced).toBeNull();
      expect(await cache.exists(NAMESPACE, 'enhancement')).toBe(false);

      const { fake, run } = setup();
      const third = await run();

      expect(fake.handlers.composer).not.toHaveBeenCalled();
      expect(fake.handlers.enhancer).toHaveBeenCalledTimes(1);
      expect(third.finalArticle.fullText.endsWith('Revised for v2.')).toBe(true);
      expect(third.enhanced?.fullText).toBe(`${third.finalArticle.fullText}\n\nOne more polished paragraph.`);
      expect(third.metadata.phaseSources.enhancement).toBe('computed');
    });
  });

  // ==========================================================================
  // Degradation and failures
  // ==========================================================================

  describe('research failures', () => {
    it('makes exactly 3 researcher calls for maxRetries = 2 and continues with a placeholder', async () => {
      const { fake, contentFetch, run } = setup({
        agentOptions: { sectionTitles: ['Demand Forecasting'] },
        operational: { researchMaxRetries: 2 },
      });
      fake.handlers.researcher.mockRejectedValue(new Error('search failed: timeout'));

      const result = await run();

      expect(fake.handlers.researcher).toHaveBeenCalledTimes(3);
      expect(fake.handlers.recoveryAdvisor).toHaveBeenCalledTimes(1);
      expect(result.metadata.degradation.research?.placeholderSectionIds).toEqual(['section-1']);
      expect(result.research.notes.notesBySection[0]?.summary).toBe(
        'Research failed for section "Demand Forecasting": search failed: timeout'
      );
      expect(contentFetch.fetchMany).not.toHaveBeenCalled();
      expect(result.finalArticle.references).toEqual([]);
      expect(result.synthesized.sections).toHaveLength(1);
    });

    it('still reports placeholder sections when research comes from the cache', async () => {
      const first = setup({
        agentOptions: { sectionTitles: ['Demand Forecasting'] },
        operational: { researchMaxRetries: 2 },
      });
      first.fake.handlers.researcher.mockRejectedValue(new Error('search failed: timeout'));
      await first.run();

      const { fake, run } = setup({ agentOptions: { sectionTitles: ['Demand Forecasting'] } });
      const result = await run();

      expect(countAgentCalls(fake.handlers)).toBe(0);
      expect(result.metadata.phaseSources.researching).toBe('cached');
      expect(result.metadata.degradation.research).toEqual({
        strategy: 'individual',
        sectionsTotal: 1,
        recoveredSectionIds: [],
        placeholderSectionIds: ['section-1'],
      });
    });

    it('fails the run when batch research leaves a section uncovered', async () => {
      const { fake, run } = setup({ operational: { researchStrategy: 'batch' } });
      fake.handlers.batchResearcher.mockImplementationOnce(async ({ plans }) => ({
        notesBySection: plans.sections.slice(0, 3).map((plan) => ({ sectionId: plan.sectionId, findings: [], summary: 'Notes' })),
      }));

      const error = await run().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ArticleGenerationError);
      expect(error).toMatchObject({ code: 'RESEARCH_FAILED', phase: 'researching' });
      expect(String(error)).toContain('Research notes missing for section(s): section-4');
      expect(fake.handlers.researcher).not.toHaveBeenCalled();
      expect(await cache.exists(NAMESPACE, 'planning')).toBe(true);
      expect(await cache.exists(NAMESPACE, 'researching')).toBe(false);
    });
  });

  describe('section synthesis', () => {
    const FIVE_TITLES = ['One', 'Two', 'Three', 'Four', 'Five'];

    it('continues when 4 of 5 sections succeed', async () => {
      const { fake, run } = setup({ agentOptions: { sectionTitles: FIVE_TITLES } });
      fake.handlers.synthesizer.mockImplementation(async ({ plan, notes }) => {
        if (plan.sectionId === 'section-3') throw new Error('model overloaded');
        return { sectionId: plan.sectionId, title: plan.title, content: `## ${plan.title}\n\n${notes.summary}` };
      });

      const result = await run();

      expect(result.synthesized.sections.map((s) => s.sectionId)).toEqual([
        'section-1',
        'section-2',
        'section-4',
        'section-5',
      ]);
      expect(result.metadata.degradation.failedSectionIds).toEqual(['section-3']);
    });

    it('fails the run when all 5 sections fail', async () => {
      const { fake, run } = setup({ agentOptions: { sectionTitles: FIVE_TITLES } });
      fake.handlers.synthesizer.mockRejectedValue(new Error('model overloaded'));

      await expect(run()).rejects.toMatchObject({ code: 'SYNTHESIS_FAILED', phase: 'sectionSynthesis' });
      expect(fake.handlers.composer).not.toHaveBeenCalled();
    });

    it('keeps plan order when an earlier section finishes last', async () => {
      const { fake, run } = setup();
      fake.handlers.synthesizer.mockImplementation(async ({ plan }) => {
        if (plan.sectionId === 'section-1') await sleep(30);
        return { sectionId: plan.sectionId, title: plan.title, content: `## ${plan.title}` };
      });

      const result = await run();

      expect(result.synthesized.sections.map((s) => s.sectionId)).toEqual([
        'section-1',
        'section-2',
        'section-3',
        'section-4',
      ]);
    });
  });

  describe('enhancement', () => {
    it('keeps the composed article under the degrade policy', async () => {
      const { fake, run } = setup({ operational: { enhancementFailurePolicy: 'degrade' } });
      fake.handlers.enhancer.mockRejectedValue(new Error('model overloaded'));

      const result = await run();

      expect(result.enhanced).toBeNull();
      expect(result.finalArticle.fullText.length).toBeGreaterThan(0);
      expect(result.metadata.degradation.enhancement).toEqual({ status: 'skipped', reason: 'model overloaded' });
      expect(result.metadata.phaseSources.enhancement).toBe('skipped');
      expect(await cache.exists(NAMESPACE, 'enhancement')).toBe(false);
      expect(await cache.exists(NAMESPACE, 'final_article_creation')).toBe(true);
    });

    it('rejects a shortened article under the degrade policy', async () => {
      const { fake, run } = setup();
      fake.handlers.enhancer.mockResolvedValue({ fullText: 'Too short.', htmlRendering: '' });

      const result = await run();

      expect(result.enhanced).toBeNull();
      expect(result.metadata.degradation.enhancement.reason).toMatch(/^Enhancer shortened the article from \d+ to 2 words$/);
    });

    it('fails the run under the abort policy', async () => {
      const { fake, run } = setup({ operational: { enhancementFailurePolicy: 'abort' } });
      fake.handlers.enhancer.mockRejectedValue(new Error('model overloaded'));

      await expect(run()).rejects.toMatchObject({
        code: 'ENHANCEMENT_FAILED',
        message: 'Article generation failed during Enhancement phase for "AI in Supply Chain": model overloaded',
      });
    });
  });

  describe('cancellation', () => {
    it('stops before the next phase and keeps completed artifacts', async () => {
      const controller = new AbortController();
      const { fake, run } = setup({
        options: {
          signal: controller.signal,
          onProgress: (phase, progress) => {
            if (phase === 'planning' && progress === 100) controller.abort();
          },
        },
      });

      await expect(run()).rejects.toMatchObject({ code: 'CANCELLED', phase: 'researching' });
      expect(fake.handlers.researcher).not.toHaveBeenCalled();
      expect(await cache.exists(NAMESPACE, 'planning')).toBe(true);
    });
  });
});
