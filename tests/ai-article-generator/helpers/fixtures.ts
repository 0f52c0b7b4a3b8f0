/**
 * Shared fakes for pipeline tests.
 *
 * The fake agent answers every role deterministically from its input, so
 * expected artifacts can be derived by hand. Each handler is a vi.fn and can
 * be overridden per test.
 */

import { vi, type Mock } from 'vitest';

import {
  createRoleDispatchAgent,
  type AgentRole,
  type RoleHandler,
  type TextGenerationAgent,
} from '../../../src/ai/articles/agents/text-generation-agent';
import type { RunConfig, SectionPlan, SectionPlans } from '../../../src/ai/articles/article-schemas';
import type { ContentFetchService } from '../../../src/ai/articles/services/content-fetch-service';
import type { Logger } from '../../../src/utils/logger';

export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export const createMockLogger = (): MockLogger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

export const SUPPLY_CHAIN_SECTION_TITLES = [
  'Demand Forecasting',
  'Inventory Optimization',
  'Logistics and Routing',
  'Risks and Adoption',
] as const;

export const createRunConfigFixture = (overrides: Partial<RunConfig> = {}): RunConfig => ({
  title: 'AI in Supply Chain',
  description: 'How machine learning is changing planning and logistics',
  wordCount: 1500,
  runIdentifier: 'ai-in-supply-chain',
  ...overrides,
});

export const createSectionPlanFixture = (index: number, title: string): SectionPlan => ({
  sectionId: `section-${index + 1}`,
  title,
  keyPoints: [`Why ${title.toLowerCase()} matters`],
  researchQueries: [`${title} with AI`],
});

export const createSectionPlansFixture = (
  titles: readonly string[] = SUPPLY_CHAIN_SECTION_TITLES,
  desiredLengthWords = 1500
): SectionPlans => ({
  sections: titles.map((title, index) => createSectionPlanFixture(index, title)),
  brief: {
    topic: 'AI in Supply Chain',
    keywords: ['ai', 'supply chain'],
    targetAudience: 'Operations leaders',
    tone: 'informative',
    desiredLengthWords,
  },
});

/** URL the fake researcher cites for a section */
export const sourceUrlFor = (sectionId: string): string => `https://example.com/research/${sectionId}`;

export type FakeRoleHandlers = { [R in AgentRole]: Mock<RoleHandler<R>> };

export interface FakeAgentOptions {
  /** Section titles the fake planner returns */
  readonly sectionTitles?: readonly string[];
}

export function createFakeHandlers(options: FakeAgentOptions = {}): FakeRoleHandlers {
  const titles = options.sectionTitles ?? SUPPLY_CHAIN_SECTION_TITLES;

  return {
    planner: vi.fn<RoleHandler<'planner'>>(async (input) => createSectionPlansFixture(titles, input.wordCount)),
    researcher: vi.fn<RoleHandler<'researcher'>>(async ({ plan }) => ({
      sectionId: plan.sectionId,
      findings: [{ sourceUrl: sourceUrlFor(plan.sectionId), snippet: `Snippet about ${plan.title}`, relevanceScore: null }],
      summary: `Summary of ${plan.title}`,
    })),
    batchResearcher: vi.fn<RoleHandler<'batchResearcher'>>(async ({ plans }) => ({
      notesBySection: plans.sections.map((plan) => ({
        sectionId: plan.sectionId,
        findings: [{ sourceUrl: sourceUrlFor(plan.sectionId), snippet: `Snippet about ${plan.title}`, relevanceScore: null }],
        summary: `Summary of ${plan.title}`,
      })),
    })),
    recoveryAdvisor: vi.fn<RoleHandler<'recoveryAdvisor'>>(async ({ plan }) => ({
      sectionId: plan.sectionId,
      title: plan.title,
      keyPoints: plan.keyPoints,
      researchQueries: [`${plan.title} case study`, `${plan.title} 2026`, `${plan.title} examples`],
      improvementRationale: 'Narrower queries with a year',
    })),
    synthesizer: vi.fn<RoleHandler<'synthesizer'>>(async ({ plan, notes }) => ({
      sectionId: plan.sectionId,
      title: plan.title,
      content: `## ${plan.title}\n\n${notes.summary}`,
    })),
    composer: vi.fn<RoleHandler<'composer'>>(async ({ synthesizedText, sourceUrls }, context) => ({
      title: context.title,
      metaDescription: `A guide to ${context.title}`,
      metaKeywords: ['ai'],
      imageDescription: 'Warehouse robots at work',
      tableOfContents: [],
      summary: 'Short summary.',
      body: synthesizedText,
      conclusion: 'Closing thoughts.',
      references: [...sourceUrls],
      fullText: `# ${context.title}\n\n${synthesizedText}\n\nClosing thoughts.`,
    })),
    enhancer: vi.fn<RoleHandler<'enhancer'>>(async ({ fullText }) => ({
      fullText: `${fullText}\n\nOne more polished paragraph.`,
      htmlRendering: '<article><p>Polished</p></article>',
    })),
  };
}

export interface FakeAgent {
  readonly agent: TextGenerationAgent;
  readonly handlers: FakeRoleHandlers;
}

export function createFakeAgent(options: FakeAgentOptions = {}): FakeAgent {
  const handlers = createFakeHandlers(options);
  return { agent: createRoleDispatchAgent(handlers), handlers };
}

/** Total handler calls across every role */
export function countAgentCalls(handlers: FakeRoleHandlers): number {
  return Object.values(handlers).reduce((sum, handler) => sum + handler.mock.calls.length, 0);
}

export type FakeContentFetch = ContentFetchService & {
  readonly fetchMany: Mock<ContentFetchService['fetchMany']>;
};

export const pageTextFor = (url: string): string => `Full page text fetched from ${url}`;

export function createFakeContentFetch(): FakeContentFetch {
  return {
    fetchMany: vi.fn<ContentFetchService['fetchMany']>(
      async (urls) => new Map(urls.map((url) => [url, pageTextFor(url)] as const))
    ),
  };
}
