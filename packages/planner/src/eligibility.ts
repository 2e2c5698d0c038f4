import { DEFAULT_MAX_DEPTH, type PrerequisiteGraph } from './graph';
import type { CourseId } from './ids';
import type { CompletionSet } from './types';

export interface Eligibility {
  eligible: boolean;
  missing: CourseId[];
}

/**
 * Missing = transitive prerequisites of `target` not yet completed.
 * A course the student already completed is always eligible.
 */
export function evaluateEligibility(
  graph: PrerequisiteGraph,
  target: CourseId,
  completed: CompletionSet,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Eligibility {
  if (completed.has(target)) {
    return { eligible: true, missing: [] };
  }

  const missing = [...graph.transitivePrerequisites(target, maxDepth)]
    .filter((course) => !completed.has(course))
    .sort();

  return { eligible: missing.length === 0, missing };
}
