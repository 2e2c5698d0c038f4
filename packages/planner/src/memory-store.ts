/**
 * In-memory GraphStore
 *
 * Holds a whole catalog in maps. Good for tests and local runs without a
 * graph database. Requirements may point at courses the catalog does not
 * declare; those never count as existing courses.
 */

import { parseCatalog, type CourseCatalogInput } from './catalog';
import type { CourseId, StudentId } from './ids';
import type { GraphStore } from './store';
import type { CoursePrereqCount, RequirementEdge } from './types';

export class InMemoryGraphStore implements GraphStore {
  private readonly courses: Set<CourseId>;
  private readonly prereqs = new Map<CourseId, CourseId[]>();
  private readonly passed = new Map<StudentId, Set<CourseId>>();

  constructor(catalog: CourseCatalogInput) {
    const parsed = parseCatalog(catalog);

    this.courses = new Set(parsed.courses);
    for (const { course, prerequisite } of parsed.requirements) {
      const list = this.prereqs.get(course) ?? [];
      if (!list.includes(prerequisite)) list.push(prerequisite);
      this.prereqs.set(course, list);
    }
    for (const student of parsed.students) {
      this.passed.set(student.id, new Set(student.passed));
    }
  }

  async edgesReachableFrom(course: CourseId, maxDepth: number): Promise<RequirementEdge[]> {
    if (!this.courses.has(course)) return [];

    // An edge u -> v is on a path of <= maxDepth hops iff u is within maxDepth - 1 hops.
    const edges: RequirementEdge[] = [];
    const visited = new Set<CourseId>([course]);
    let frontier: CourseId[] = [course];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: CourseId[] = [];
      for (const current of frontier) {
        for (const prerequisite of this.prereqs.get(current) ?? []) {
          edges.push({ course: current, prerequisite });
          if (!visited.has(prerequisite)) {
            visited.add(prerequisite);
            next.push(prerequisite);
          }
        }
      }
      frontier = next;
    }

    return edges;
  }

  async courseExists(course: CourseId): Promise<boolean> {
    return this.courses.has(course);
  }

  async studentExists(student: StudentId): Promise<boolean> {
    return this.passed.has(student);
  }

  async completedCourses(student: StudentId): Promise<Set<CourseId>> {
    return new Set(this.passed.get(student));
  }

  async allCoursesWithPrereqCounts(): Promise<CoursePrereqCount[]> {
    return [...this.courses].map((course) => ({
      course,
      prereqCount: (this.prereqs.get(course) ?? []).filter((p) => this.courses.has(p)).length,
    }));
  }

  async studentCount(): Promise<number> {
    return this.passed.size;
  }

  async requirementEdges(): Promise<RequirementEdge[]> {
    const edges: RequirementEdge[] = [];
    for (const [course, list] of this.prereqs) {
      for (const prerequisite of list) {
        edges.push({ course, prerequisite });
      }
    }
    return edges;
  }
}
