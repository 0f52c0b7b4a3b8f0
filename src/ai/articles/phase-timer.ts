/**
 * Phase Timer
 *
 * Utility class for tracking phase durations during a pipeline run.
 * Cached phases are never started, so they report a duration of 0.
 */

import type { Clock, PipelinePhase } from './types';
import { PIPELINE_PHASES, systemClock } from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Duration information for all phases.
 */
export type PhaseDurations = { readonly [P in PipelinePhase]: number };

// ============================================================================
// PhaseTimer Class
// ============================================================================

/**
 * Tracks timing for pipeline phases.
 *
 * Provides a clean API for starting phases, recording durations,
 * and retrieving all phase durations at the end.
 *
 * @example
 * const timer = new PhaseTimer(clock);
 *
 * timer.start('planning');
 * // ... run the planner ...
 * timer.end('planning');
 *
 * const durations = timer.getDurations();
 * // { planning: 1500, researching: 0, contentAugmentation: 0, ... }
 */
export class PhaseTimer {
  private readonly clock: Clock;
  private readonly startTimes = new Map<PipelinePhase, number>();
  private readonly durations = new Map<PipelinePhase, number>();

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * Starts timing for a phase.
   * If the phase was already started, this restarts the timer.
   *
   * @param phase - The phase to start timing
   */
  start(phase: PipelinePhase): void {
    this.startTimes.set(phase, this.clock.now());
  }

  /**
   * Ends timing for a phase and records the duration.
   * If the phase was never started, duration will be 0.
   *
   * @param phase - The phase to end timing
   * @returns The duration in milliseconds
   */
  end(phase: PipelinePhase): number {
    const startTime = this.startTimes.get(phase);
    // Use !== undefined instead of truthy check because startTime of 0 is valid
    const duration = startTime !== undefined ? this.clock.now() - startTime : 0;
    this.durations.set(phase, duration);
    this.startTimes.delete(phase);
    return duration;
  }

  /**
   * Gets the duration for a specific phase.
   * Returns 0 if the phase hasn't been timed yet.
   *
   * @param phase - The phase to get duration for
   * @returns The duration in milliseconds
   */
  getDuration(phase: PipelinePhase): number {
    return this.durations.get(phase) ?? 0;
  }

  /**
   * Gets all phase durations.
   * Phases that haven't been timed will have duration 0.
   *
   * @returns Object with all phase durations
   */
  getDurations(): PhaseDurations {
    return {
      planning: this.getDuration('planning'),
      researching: this.getDuration('researching'),
      contentAugmentation: this.getDuration('contentAugmentation'),
      sectionSynthesis: this.getDuration('sectionSynthesis'),
      finalComposition: this.getDuration('finalComposition'),
      enhancement: this.getDuration('enhancement'),
    };
  }

  /**
   * Gets the total duration across all phases.
   *
   * @returns Total duration in milliseconds
   */
  getTotalDuration(): number {
    return PIPELINE_PHASES.reduce((total, phase) => total + this.getDuration(phase), 0);
  }

  /**
   * Checks if a phase has been started but not ended.
   *
   * @param phase - The phase to check
   * @returns True if the phase is currently being timed
   */
  isRunning(phase: PipelinePhase): boolean {
    return this.startTimes.has(phase);
  }

  /**
   * Checks if a phase has been completed (started and ended).
   *
   * @param phase - The phase to check
   * @returns True if the phase has a recorded duration
   */
  isCompleted(phase: PipelinePhase): boolean {
    return this.durations.has(phase);
  }

  /**
   * Resets all timing data.
   * Useful for reusing the timer across multiple runs.
   */
  reset(): void {
    this.startTimes.clear();
    this.durations.clear();
  }
}

/**
 * Creates a new PhaseTimer instance.
 *
 * @param clock - Optional clock for time operations (defaults to systemClock)
 * @returns A new PhaseTimer instance
 */
export function createPhaseTimer(clock?: Clock): PhaseTimer {
  return new PhaseTimer(clock);
}

