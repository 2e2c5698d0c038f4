/**
 * Prerequisite Planner
 * Eligibility, level-based study plans and cycle diagnostics over a course
 * requirement graph.
 */

export * from './analytics';
export * from './catalog';
export * from './cycles';
export * from './eligibility';
export * from './errors';
export * from './graph';
export * from './ids';
export * from './memory-store';
export * from './planner';
export * from './scheduler';
export * from './shortest-path';
export type * from './store';
export type * from './types';
