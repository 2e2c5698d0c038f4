/**
 * Prerequisite Graph
 * Request-local adjacency view: course -> set of direct prerequisites.
 */

import { NotFoundError } from './errors';
import type { CourseId } from './ids';
import type { GraphStore } from './store';
import type { RequirementEdge } from './types';

export const DEFAULT_MAX_DEPTH = 10;

export class PrerequisiteGraph {
  private readonly prereqs = new Map<CourseId, Set<CourseId>>();

  /**
   * Build a graph from requirement edges. Both endpoints of every edge become
   * nodes; `extraNodes` (typically the target course) are added even when no
   * edge mentions them.
   */
  static fromEdges(edges: Iterable<RequirementEdge>, extraNodes: Iterable<CourseId> = []): PrerequisiteGraph {
    const graph = new PrerequisiteGraph();
    for (const node of extraNodes) {
      graph.addNode(node);
    }
    for (const { course, prerequisite } of edges) {
      graph.addNode(course).add(prerequisite);
      graph.addNode(prerequisite);
    }
    return graph;
  }

  private addNode(course: CourseId): Set<CourseId> {
    let set = this.prereqs.get(course);
    if (!set) {
      set = new Set();
      this.prereqs.set(course, set);
    }
    return set;
  }

  get size(): number {
    return this.prereqs.size;
  }

  get nodes(): IterableIterator<CourseId> {
    return this.prereqs.keys();
  }

  has(course: CourseId): boolean {
    return this.prereqs.has(course);
  }

  /** Direct prerequisites, empty for unknown courses. */
  prerequisitesOf(course: CourseId): ReadonlySet<CourseId> {
    return this.prereqs.get(course) ?? new Set();
  }

  *edges(): IterableIterator<RequirementEdge> {
    for (const [course, set] of this.prereqs) {
      for (const prerequisite of set) {
        yield { course, prerequisite };
      }
    }
  }

  /**
   * Every course reachable through prerequisites within `maxDepth` hops.
   * The start course is never part of its own result, even inside a cycle.
   */
  transitivePrerequisites(course: CourseId, maxDepth: number = DEFAULT_MAX_DEPTH): Set<CourseId> {
    const seen = new Set<CourseId>();
    let frontier: CourseId[] = [course];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: CourseId[] = [];
      for (const current of frontier) {
        for (const prereq of this.prerequisitesOf(current)) {
          if (prereq === course || seen.has(prereq)) continue;
          seen.add(prereq);
          next.push(prereq);
        }
      }
      frontier = next;
    }

    return seen;
  }
}

/**
 * Fetch the bounded subgraph below `target` and build it.
 * An empty edge set is only valid when the course exists on its own.
 */
export async function loadPrerequisiteGraph(
  store: GraphStore,
  target: CourseId,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Promise<PrerequisiteGraph> {
  const edges = await store.edgesReachableFrom(target, maxDepth);

  if (edges.length === 0 && !(await store.courseExists(target))) {
    throw NotFoundError.course(target);
  }

  return PrerequisiteGraph.fromEdges(edges, [target]);
}
