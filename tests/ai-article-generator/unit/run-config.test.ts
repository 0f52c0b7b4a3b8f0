import { describe, expect, it } from 'vitest';

import {
  createRunConfig,
  DEFAULT_OPERATIONAL_CONFIG,
  isSameRunRequest,
  loadOperationalConfig,
} from '../../../src/ai/articles/run-config';
import { ArticleGenerationError } from '../../../src/ai/articles/types';
import { slugify } from '../../../src/utils/slug';

describe('slugify', () => {
  it('lowercases and hyphenates', () => {
    expect(slugify('AI in Supply Chain')).toBe('ai-in-supply-chain');
  });

  it('removes diacritics and trims separators', () => {
    expect(slugify('  ¿Logística en España?  ')).toBe('logistica-en-espana');
  });
});

describe('createRunConfig', () => {
  it('trims inputs and derives the run identifier', () => {
    const config = createRunConfig({ title: '  AI in Supply Chain ', wordCount: 1500 });

    expect(config).toEqual({
      title: 'AI in Supply Chain',
      description: '',
      wordCount: 1500,
      runIdentifier: 'ai-in-supply-chain',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps a layout when given', () => {
    const config = createRunConfig({ title: 'Cold Chain', wordCount: 800, layout: 'Intro, three sections, FAQ' });
    expect(config.layout).toBe('Intro, three sections, FAQ');
  });

  it('rejects a non-positive word count', () => {
    expect(() => createRunConfig({ title: 'Cold Chain', wordCount: 0 })).toThrow(
      'Invalid run configuration: wordCount: wordCount must be a positive integer'
    );
  });

  it('rejects a title with no usable characters', () => {
    try {
      createRunConfig({ title: '!!!', wordCount: 500 });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ArticleGenerationError);
      expect(error).toMatchObject({ code: 'CONTEXT_INVALID' });
    }
  });
});

describe('isSameRunRequest', () => {
  const base = createRunConfig({ title: 'AI in Supply Chain', description: 'Planning', wordCount: 1500 });

  it('matches identical requests', () => {
    expect(isSameRunRequest(base, createRunConfig({ title: 'AI in Supply Chain', description: 'Planning', wordCount: 1500 }))).toBe(true);
  });

  it('detects a changed word count', () => {
    expect(isSameRunRequest(base, { ...base, wordCount: 2000 })).toBe(false);
  });
});

describe('loadOperationalConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadOperationalConfig({})).toEqual(DEFAULT_OPERATIONAL_CONFIG);
    expect(DEFAULT_OPERATIONAL_CONFIG).toEqual({
      researchStrategy: 'individual',
      researchMaxRetries: 2,
      synthesisConcurrency: 0,
      enhancementFailurePolicy: 'degrade',
      dataDir: 'data',
    });
  });

  it('reads values from the environment and treats blanks as unset', () => {
    const config = loadOperationalConfig({
      RESEARCH_STRATEGY: 'batch',
      RESEARCH_MAX_RETRIES: '4',
      SYNTHESIS_CONCURRENCY: '  ',
      ENHANCEMENT_FAILURE_POLICY: 'abort',
    });

    expect(config.researchStrategy).toBe('batch');
    expect(config.researchMaxRetries).toBe(4);
    expect(config.synthesisConcurrency).toBe(0);
    expect(config.enhancementFailurePolicy).toBe('abort');
  });

  it('lets overrides win over the environment', () => {
    const config = loadOperationalConfig({ RESEARCH_MAX_RETRIES: '4' }, { researchMaxRetries: 0, dataDir: '/tmp/articles' });

    expect(config.researchMaxRetries).toBe(0);
    expect(config.dataDir).toBe('/tmp/articles');
  });

  it('rejects unknown strategies', () => {
    const load = () => loadOperationalConfig({ RESEARCH_STRATEGY: 'parallel' });

    expect(load).toThrow(ArticleGenerationError);
    expect(load).toThrow(/^Invalid operational configuration: RESEARCH_STRATEGY: /);
  });
});
