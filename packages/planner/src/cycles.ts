/**
 * Cycle Detector
 *
 * Enumerates elementary cycles of the requirement graph for diagnostics.
 * A search rooted at course `s` only walks through courses sorting after `s`,
 * so each cycle is found exactly once, already rotated to start at its
 * smallest course. The closing course is not repeated at the end.
 *
 * Every cycle lies inside one strongly connected component, so the search
 * only starts in, and only walks through, components that can hold one.
 * An acyclic catalog never reaches the path enumeration at all.
 */

import type { PrerequisiteGraph } from './graph';
import type { CourseId } from './ids';
import type { PrerequisiteCycle } from './types';

export const DEFAULT_MAX_CYCLE_LENGTH = 10;
export const DEFAULT_CYCLE_LIMIT = 50;

export interface CycleSearchOptions {
  /** Maximum number of edges in a cycle. */
  maxLength?: number;
  limit?: number;
}

/**
 * Tarjan's algorithm. Maps each course to the index of its strongly
 * connected component; courses share an index exactly when each one
 * (transitively) requires the other.
 */
export function stronglyConnectedComponents(graph: PrerequisiteGraph): Map<CourseId, number> {
  const component = new Map<CourseId, number>();
  const index = new Map<CourseId, number>();
  const stack: CourseId[] = [];
  const onStack = new Set<CourseId>();
  let nextIndex = 0;
  let nextComponent = 0;

  const visit = (course: CourseId): number => {
    const own = nextIndex++;
    let low = own;
    index.set(course, own);
    stack.push(course);
    onStack.add(course);

    for (const prereq of graph.prerequisitesOf(course)) {
      const seen = index.get(prereq);
      if (seen === undefined) {
        low = Math.min(low, visit(prereq));
      } else if (onStack.has(prereq)) {
        low = Math.min(low, seen);
      }
    }

    if (low === own) {
      let member: CourseId | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.set(member, nextComponent);
      } while (member !== course);
      nextComponent++;
    }
    return low;
  };

  for (const course of graph.nodes) {
    if (!index.has(course)) visit(course);
  }
  return component;
}

export function detectCycles(graph: PrerequisiteGraph, options: CycleSearchOptions = {}): PrerequisiteCycle[] {
  const maxLength = options.maxLength ?? DEFAULT_MAX_CYCLE_LENGTH;
  const limit = options.limit ?? DEFAULT_CYCLE_LIMIT;

  const cycles: PrerequisiteCycle[] = [];
  const seen = new Set<string>();
  const sortedPrereqs = new Map<CourseId, CourseId[]>();
  const neighbours = (course: CourseId): CourseId[] => {
    let list = sortedPrereqs.get(course);
    if (!list) {
      list = [...graph.prerequisitesOf(course)].sort();
      sortedPrereqs.set(course, list);
    }
    return list;
  };

  const component = stronglyConnectedComponents(graph);
  const componentSize = new Map<number, number>();
  for (const id of component.values()) {
    componentSize.set(id, (componentSize.get(id) ?? 0) + 1);
  }

  // A singleton component is cyclic only through a self-requirement
  const starts = [...graph.nodes]
    .filter((course) => {
      const id = component.get(course);
      return (id !== undefined && (componentSize.get(id) ?? 0) > 1) || graph.prerequisitesOf(course).has(course);
    })
    .sort();

  for (const start of starts) {
    if (cycles.length >= limit) break;

    const home = component.get(start);
    const path: CourseId[] = [start];
    const onPath = new Set<CourseId>([start]);

    const walk = (current: CourseId): void => {
      for (const next of neighbours(current)) {
        if (cycles.length >= limit) return;

        if (next === start) {
          const key = path.join('\u0000');
          if (!seen.has(key)) {
            seen.add(key);
            cycles.push({ courses: [...path] });
          }
          continue;
        }

        // path.length counts nodes; one more edge closes the cycle
        if (next < start || component.get(next) !== home || onPath.has(next) || path.length >= maxLength) continue;

        path.push(next);
        onPath.add(next);
        walk(next);
        path.pop();
        onPath.delete(next);
      }
    };

    walk(start);
  }

  return cycles;
}
