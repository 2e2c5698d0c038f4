import type { PrerequisiteGraph } from './graph';
import type { CourseId } from './ids';

/**
 * Fewest-hop route from `from` down to `to` along REQUIRES edges.
 * Prerequisites are explored in sorted order, so ties resolve the same way
 * on every call. Returns an empty array when `to` is unreachable.
 */
export function findShortestPath(graph: PrerequisiteGraph, from: CourseId, to: CourseId): CourseId[] {
  if (from === to) return [from];

  const parent = new Map<CourseId, CourseId>();
  const visited = new Set<CourseId>([from]);
  let frontier: CourseId[] = [from];

  while (frontier.length > 0) {
    const next: CourseId[] = [];
    for (const current of frontier) {
      for (const prereq of [...graph.prerequisitesOf(current)].sort()) {
        if (visited.has(prereq)) continue;
        visited.add(prereq);
        parent.set(prereq, current);

        if (prereq === to) {
          const path: CourseId[] = [to];
          let step = parent.get(to);
          while (step !== undefined) {
            path.push(step);
            step = parent.get(step);
          }
          return path.reverse();
        }

        next.push(prereq);
      }
    }
    frontier = next;
  }

  return [];
}
