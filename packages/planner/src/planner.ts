/**
 * Course Planner
 *
 * Entry point for the planning engine. Each call validates its raw inputs,
 * reads a bounded subgraph from the injected store, runs one algorithm and
 * returns a plain result object. Nothing is cached between calls.
 */

import { summarizeCourses } from './analytics';
import { DEFAULT_CYCLE_LIMIT, DEFAULT_MAX_CYCLE_LENGTH, detectCycles } from './cycles';
import { evaluateEligibility } from './eligibility';
import { NotFoundError, type MissingEntity } from './errors';
import { DEFAULT_MAX_DEPTH, PrerequisiteGraph, loadPrerequisiteGraph } from './graph';
import { parseCourseId, parseLimit, parseStudentId, type CourseId, type StudentId } from './ids';
import { scheduleLevels } from './scheduler';
import { findShortestPath } from './shortest-path';
import type { GraphStore } from './store';
import type {
  CourseAnalytics,
  EligibilityResult,
  PrerequisiteCycle,
  SequencePlan,
  ShortestPathResult,
} from './types';

export interface PlannerOptions {
  /** Hop bound for every prerequisite traversal. */
  maxDepth?: number;
  /** Longest cycle (in edges) `findCycles` reports. */
  maxCycleLength?: number;
}

export class CoursePlanner {
  private readonly maxDepth: number;
  private readonly maxCycleLength: number;

  constructor(
    private readonly store: GraphStore,
    options: PlannerOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxCycleLength = options.maxCycleLength ?? DEFAULT_MAX_CYCLE_LENGTH;
  }

  /**
   * Can the student take the course right now, and if not, which
   * prerequisites (direct or indirect) are still missing.
   */
  async checkEligibility(rawStudentId: string, rawCourseId: string): Promise<EligibilityResult> {
    const studentId = parseStudentId(rawStudentId);
    const courseId = parseCourseId(rawCourseId);
    await this.assertExists(studentId, courseId);

    const [graph, completed] = await Promise.all([
      loadPrerequisiteGraph(this.store, courseId, this.maxDepth),
      this.store.completedCourses(studentId),
    ]);

    const { eligible, missing } = evaluateEligibility(graph, courseId, completed, this.maxDepth);
    return { studentId, courseId, eligible, missing };
  }

  /**
   * Group every course still needed for the target into levels that can be
   * taken together. A cyclic subgraph still yields a plan; its unresolved
   * courses close the sequence and are reported as a warning.
   */
  async planSequence(rawStudentId: string, rawCourseId: string): Promise<SequencePlan> {
    const studentId = parseStudentId(rawStudentId);
    const target = parseCourseId(rawCourseId);
    await this.assertExists(studentId, target);

    const [graph, completed] = await Promise.all([
      loadPrerequisiteGraph(this.store, target, this.maxDepth),
      this.store.completedCourses(studentId),
    ]);

    const { sequence, unresolved } = scheduleLevels(graph, target, completed);

    if (unresolved.length === 0) {
      return { studentId, target, sequence, warnings: [] };
    }

    console.warn(`⚠️  Plan for ${target} has ${unresolved.length} unresolvable course(s): ${unresolved.join(', ')}`);
    return {
      studentId,
      target,
      sequence,
      warnings: [
        {
          code: 'DEGENERATE_GRAPH',
          message: 'Prerequisite cycle prevents full ordering; remaining courses were grouped into the last level',
          courses: unresolved,
        },
      ],
    };
  }

  /** Courses that eventually require themselves. */
  async findCycles(rawLimit?: number | string | null): Promise<PrerequisiteCycle[]> {
    const limit = parseLimit(rawLimit, DEFAULT_CYCLE_LIMIT);
    const graph = PrerequisiteGraph.fromEdges(await this.store.requirementEdges());
    return detectCycles(graph, { maxLength: this.maxCycleLength, limit });
  }

  /**
   * Fewest-hop chain of requirements leading from one course down to another.
   */
  async shortestPath(rawFrom: string, rawTo: string): Promise<ShortestPathResult> {
    const fromCourse = parseCourseId(rawFrom, 'from');
    const toCourse = parseCourseId(rawTo, 'to');

    const [graph, toExists] = await Promise.all([
      loadPrerequisiteGraph(this.store, fromCourse, this.maxDepth),
      this.store.courseExists(toCourse),
    ]);
    if (!toExists) {
      throw NotFoundError.course(toCourse);
    }

    const path = findShortestPath(graph, fromCourse, toCourse);
    return { fromCourse, toCourse, path, length: path.length };
  }

  async summarize(): Promise<CourseAnalytics> {
    const [counts, totalStudents] = await Promise.all([
      this.store.allCoursesWithPrereqCounts(),
      this.store.studentCount(),
    ]);
    return summarizeCourses(counts, totalStudents);
  }

  // Both lookups always run so the caller learns every missing entity at once.
  private async assertExists(studentId: StudentId, courseId: CourseId): Promise<void> {
    const [studentFound, courseFound] = await Promise.all([
      this.store.studentExists(studentId),
      this.store.courseExists(courseId),
    ]);

    const missing: MissingEntity[] = [];
    if (!studentFound) missing.push({ entity: 'student', id: studentId });
    if (!courseFound) missing.push({ entity: 'course', id: courseId });
    if (missing.length > 0) {
      throw new NotFoundError(missing);
    }
  }
}
