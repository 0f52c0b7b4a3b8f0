import { z } from 'zod';

import { PLAN_CONSTRAINTS } from './config';

// ============================================================================
// Run Configuration Schema
// ============================================================================

export const ArticleLayoutSchema = z.string().min(1);

export const RunConfigSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  layout: ArticleLayoutSchema.optional(),
  wordCount: z.number().int().positive(),
  /** Filesystem-safe slug of the title; the cache namespace of the run */
  runIdentifier: z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'runIdentifier must be a slug'),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

// ============================================================================
// Planning Schemas
// ============================================================================

export const ArticleBriefSchema = z.object({
  topic: z.string().min(1),
  keywords: z.array(z.string()),
  targetAudience: z.string(),
  tone: z.string(),
  desiredLengthWords: z.number().int().positive(),
});

export type ArticleBrief = z.infer<typeof ArticleBriefSchema>;

export const SectionPlanSchema = z.object({
  sectionId: z.string().min(1),
  title: z.string().min(1),
  keyPoints: z.array(z.string()),
  researchQueries: z
    .array(z.string().min(1))
    .max(PLAN_CONSTRAINTS.MAX_RESEARCH_QUERIES_PER_SECTION)
    .optional(),
});

export type SectionPlan = z.infer<typeof SectionPlanSchema>;

/**
 * Section plans for one run.
 *
 * NOTE: sectionId uniqueness is a refinement, so it is enforced when the
 * planner output or a cached document is parsed, not in the JSON schema
 * the model sees.
 */
export const SectionPlansSchema = z
  .object({
    sections: z
      .array(SectionPlanSchema)
      .min(PLAN_CONSTRAINTS.MIN_SECTIONS)
      .max(PLAN_CONSTRAINTS.MAX_SECTIONS),
    brief: ArticleBriefSchema,
  })
  .superRefine((plans, ctx) => {
    const duplicate = findDuplicateId(plans.sections.map((section) => section.sectionId));
    if (duplicate !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sections'],
        message: `Duplicate sectionId "${duplicate}"`,
      });
    }
  });

export type SectionPlans = z.infer<typeof SectionPlansSchema>;

/**
 * Plan returned by the recovery advisor after research failed for a section.
 */
export const ImprovedSectionPlanSchema = z.object({
  sectionId: z.string().min(1),
  title: z.string().min(1),
  keyPoints: z.array(z.string()),
  researchQueries: z
    .array(z.string().min(1))
    .min(PLAN_CONSTRAINTS.MIN_RECOVERY_QUERIES)
    .max(PLAN_CONSTRAINTS.MAX_RECOVERY_QUERIES),
  improvementRationale: z.string(),
});

export type ImprovedSectionPlan = z.infer<typeof ImprovedSectionPlanSchema>;

// ============================================================================
// Research Schemas
// ============================================================================

export const FindingSchema = z.object({
  sourceUrl: z.string().min(1),
  snippet: z.string(),
  /** Reserved; findings are not scored */
  relevanceScore: z.number().nullable(),
  scrapedContent: z.string().optional(),
});

export type Finding = z.infer<typeof FindingSchema>;

export const SectionResearchNotesSchema = z.object({
  sectionId: z.string().min(1),
  findings: z.array(FindingSchema),
  summary: z.string(),
});

export type SectionResearchNotes = z.infer<typeof SectionResearchNotesSchema>;

export const ResearchNotesSchema = z
  .object({
    notesBySection: z.array(SectionResearchNotesSchema),
  })
  .superRefine((notes, ctx) => {
    const duplicate = findDuplicateId(notes.notesBySection.map((entry) => entry.sectionId));
    if (duplicate !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['notesBySection'],
        message: `Duplicate research notes for sectionId "${duplicate}"`,
      });
    }
  });

export type ResearchNotes = z.infer<typeof ResearchNotesSchema>;

export const AugmentationStatsSchema = z.object({
  totalUrls: z.number().int().nonnegative(),
  eligibleUrls: z.number().int().nonnegative(),
  fetchedUrls: z.number().int().nonnegative(),
  skippedUrls: z.number().int().nonnegative(),
  /** True when the fetch service failed and notes passed through unchanged */
  degraded: z.boolean(),
});

export type AugmentationStats = z.infer<typeof AugmentationStatsSchema>;

export const AugmentedResearchSchema = z.object({
  notes: ResearchNotesSchema,
  stats: AugmentationStatsSchema,
});

export type AugmentedResearch = z.infer<typeof AugmentedResearchSchema>;

// ============================================================================
// Synthesis Schemas
// ============================================================================

export const SynthesizedSectionSchema = z.object({
  sectionId: z.string().min(1),
  title: z.string().min(1),
  content: z.string().min(1),
});

export type SynthesizedSection = z.infer<typeof SynthesizedSectionSchema>;

export const SynthesizedArticleSchema = z.object({
  sections: z.array(SynthesizedSectionSchema).min(1),
  concatenatedText: z.string(),
  /** Sections whose synthesis failed; absent from `sections` */
  failedSectionIds: z.array(z.string()),
});

export type SynthesizedArticle = z.infer<typeof SynthesizedArticleSchema>;

// ============================================================================
// Composition Schemas
// ============================================================================

export const FinalArticleSchema = z.object({
  title: z.string().min(1),
  metaDescription: z.string(),
  metaKeywords: z.array(z.string()),
  imageDescription: z.string(),
  tableOfContents: z.array(z.string()),
  summary: z.string(),
  body: z.string().min(1),
  conclusion: z.string(),
  references: z.array(z.string()),
  fullText: z.string().min(1),
});

export type FinalArticle = z.infer<typeof FinalArticleSchema>;

export const EnhancedArticleSchema = z.object({
  fullText: z.string().min(1),
  htmlRendering: z.string(),
});

export type EnhancedArticle = z.infer<typeof EnhancedArticleSchema>;

// ============================================================================
// Helpers
// ============================================================================

function findDuplicateId(ids: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) return id;
    seen.add(id);
  }
  return undefined;
}
