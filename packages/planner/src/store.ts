/**
 * GraphStore contract
 *
 * The only way the planner reads course data. A Neo4j client or the
 * in-memory store satisfies it; the planner never sees a query language.
 * Implementations surface connectivity failures and timeouts as
 * `UpstreamUnavailableError` and own any retry policy.
 */

import type { CourseId, StudentId } from './ids';
import type { CoursePrereqCount, RequirementEdge } from './types';

export interface GraphStore {
  /**
   * Edges lying on some REQUIRES path of at most `maxDepth` hops that starts
   * at `course`. Completeness beyond the depth bound is not guaranteed.
   */
  edgesReachableFrom(course: CourseId, maxDepth: number): Promise<RequirementEdge[]>;

  courseExists(course: CourseId): Promise<boolean>;

  studentExists(student: StudentId): Promise<boolean>;

  /** Empty for a student who has completed nothing (or does not exist). */
  completedCourses(student: StudentId): Promise<Set<CourseId>>;

  allCoursesWithPrereqCounts(): Promise<CoursePrereqCount[]>;

  studentCount(): Promise<number>;

  /** Every REQUIRES edge in the store. */
  requirementEdges(): Promise<RequirementEdge[]>;
}
