/**
 * Test fixtures for the planning engine
 */

import { PrerequisiteGraph } from '../../graph';
import { parseCourseId, type CourseId } from '../../ids';
import type { CourseCatalogInput } from '../../catalog';

export function course(raw: string): CourseId {
  return parseCourseId(raw);
}

export function courses(...raw: string[]): Set<CourseId> {
  return new Set(raw.map(course));
}

/** Build a graph from `[course, prerequisite]` pairs. */
export function graphOf(pairs: Array<[string, string]>, extra: string[] = []): PrerequisiteGraph {
  return PrerequisiteGraph.fromEdges(
    pairs.map(([c, p]) => ({ course: course(c), prerequisite: course(p) })),
    extra.map(course)
  );
}

// CS 101 -> CS 201 -> CS 301 <- MATH 100, plus a PHIL 1 <-> PHIL 2 cycle
export const sampleCatalog: CourseCatalogInput = {
  courses: ['CS 101', 'CS 201', 'CS 301', 'MATH 100', 'PHIL 1', 'PHIL 2'],
  requirements: [
    { course: 'CS 201', prerequisite: 'CS 101' },
    { course: 'CS 301', prerequisite: 'CS 201' },
    { course: 'CS 301', prerequisite: 'MATH 100' },
    { course: 'PHIL 1', prerequisite: 'PHIL 2' },
    { course: 'PHIL 2', prerequisite: 'PHIL 1' },
  ],
  students: [
    { id: 's1', passed: ['CS 101'] },
    { id: 's2', passed: [] },
    { id: 's3', passed: ['CS 101', 'CS 201', 'MATH 100', 'CS 301'] },
  ],
};
