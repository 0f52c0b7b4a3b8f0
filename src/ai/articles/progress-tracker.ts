/**
 * Progress Tracker
 *
 * Centralized utility for tracking and reporting pipeline progress.
 * Encapsulates progress calculation logic and provides a clean API for phases.
 */

import { GENERATOR_CONFIG } from './config';
import type { ArticleProgressCallback, PipelinePhase } from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress tracker configuration.
 */
interface ProgressTrackerConfig {
  /** Start percentage for per-section progress (default: 10) */
  readonly sectionProgressStart: number;
  /** End percentage for per-section progress (default: 90) */
  readonly sectionProgressEnd: number;
}

// ============================================================================
// ProgressTracker Class
// ============================================================================

/**
 * Tracks and reports progress for a pipeline run.
 *
 * @example
 * const tracker = new ProgressTracker(onProgress);
 *
 * tracker.startPhase('planning');
 * tracker.completePhase('planning', 'Planned 4 sections');
 *
 * tracker.startPhase('sectionSynthesis');
 * tracker.reportSectionProgress('sectionSynthesis', 1, 4, 'Demand Forecasting');
 * tracker.completePhase('sectionSynthesis', 'Wrote 4 sections');
 */
export class ProgressTracker {
  private readonly config: ProgressTrackerConfig;

  constructor(
    private readonly onProgress?: ArticleProgressCallback,
    config?: Partial<ProgressTrackerConfig>
  ) {
    this.config = {
      sectionProgressStart: config?.sectionProgressStart ?? GENERATOR_CONFIG.SYNTHESIS_PROGRESS_START,
      sectionProgressEnd: config?.sectionProgressEnd ?? GENERATOR_CONFIG.SYNTHESIS_PROGRESS_END,
    };
  }

  /**
   * Reports the start of a phase (0% progress).
   */
  startPhase(phase: PipelinePhase, message?: string): void {
    this.onProgress?.(phase, 0, message ?? this.getDefaultStartMessage(phase));
  }

  /**
   * Reports the completion of a phase (100% progress).
   */
  completePhase(phase: PipelinePhase, message: string): void {
    this.onProgress?.(phase, 100, message);
  }

  /**
   * Reports a phase that was satisfied from the cache.
   */
  reportCached(phase: PipelinePhase): void {
    this.onProgress?.(phase, 100, 'Loaded from cache');
  }

  /**
   * Reports per-section progress within the research or synthesis phase.
   *
   * Progress is scaled between sectionProgressStart and sectionProgressEnd
   * based on how many sections have finished.
   *
   * @param current - Sections finished so far (1-indexed)
   * @param total - Total number of sections
   * @param title - Title of the section that just finished
   */
  reportSectionProgress(phase: PipelinePhase, current: number, total: number, title: string): void {
    const { sectionProgressStart, sectionProgressEnd } = this.config;
    const progressRange = sectionProgressEnd - sectionProgressStart;
    const sectionProgress = Math.round(sectionProgressStart + (current / Math.max(1, total)) * progressRange);
    this.onProgress?.(phase, sectionProgress, `Section ${current}/${total}: ${title}`);
  }

  /**
   * Returns whether a progress callback is registered.
   */
  get hasCallback(): boolean {
    return this.onProgress !== undefined;
  }

  private getDefaultStartMessage(phase: PipelinePhase): string {
    switch (phase) {
      case 'planning':
        return 'Planning article sections';
      case 'researching':
        return 'Researching sections';
      case 'contentAugmentation':
        return 'Fetching source pages';
      case 'sectionSynthesis':
        return 'Writing article sections';
      case 'finalComposition':
        return 'Composing final article';
      case 'enhancement':
        return 'Enhancing article';
    }
  }
}
