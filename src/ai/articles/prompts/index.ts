/**
 * Pipeline Prompts
 *
 * One module per role. Each exposes a system prompt and a user prompt builder.
 */

export * from './shared';
export * from './planner';
export * from './researcher';
export * from './recovery';
export * from './synthesizer';
export * from './composer';
export * from './enhancer';
