/**
 * Level Scheduler
 *
 * Breadth-first variant of Kahn's algorithm: instead of removing one ready
 * node at a time, every course whose prerequisites are all done is released
 * together as a level. Levels are sorted so identical inputs always give
 * identical plans.
 */

import type { PrerequisiteGraph } from './graph';
import type { CourseId } from './ids';
import type { CompletionSet, Level, Sequence } from './types';

export interface LevelSchedule {
  sequence: Sequence;
  /** Courses bundled into the trailing degenerate level; empty when none. */
  unresolved: CourseId[];
}

function sortLevel(courses: Iterable<CourseId>): Level {
  return [...courses].sort();
}

export function scheduleLevels(
  graph: PrerequisiteGraph,
  target: CourseId,
  completed: CompletionSet
): LevelSchedule {
  const done = new Set<CourseId>();
  const remaining = new Set<CourseId>();
  for (const course of graph.nodes) {
    if (completed.has(course)) {
      done.add(course);
    } else {
      remaining.add(course);
    }
  }

  // Nothing to plan
  if (done.has(target)) {
    return { sequence: [], unresolved: [] };
  }

  const sequence: Sequence = [];

  // Each pass either empties at least one course out of `remaining` or stops,
  // so there are at most |N| passes.
  while (remaining.size > 0) {
    const level = sortLevel(
      [...remaining].filter((course) => [...graph.prerequisitesOf(course)].every((p) => done.has(p)))
    );

    if (level.length === 0) {
      // Cycle: nothing left can be unlocked, bundle the rest
      const unresolved = sortLevel(remaining);
      sequence.push(unresolved);
      return { sequence, unresolved };
    }

    sequence.push(level);
    for (const course of level) {
      done.add(course);
      remaining.delete(course);
    }
  }

  return { sequence, unresolved: [] };
}
