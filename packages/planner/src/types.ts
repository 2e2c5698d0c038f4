import type { CourseId, StudentId } from './ids';

// ============== Graph ==============

/** `course` depends on `prerequisite`. */
export interface RequirementEdge {
  course: CourseId;
  prerequisite: CourseId;
}

export type CompletionSet = ReadonlySet<CourseId>;

/** Courses that can be taken together once every earlier level is done. */
export type Level = CourseId[];

export type Sequence = Level[];

export interface CoursePrereqCount {
  course: CourseId;
  prereqCount: number;
}

// ============== Results ==============

export interface EligibilityResult {
  studentId: StudentId;
  courseId: CourseId;
  eligible: boolean;
  missing: CourseId[];
}

export interface PlanWarning {
  code: 'DEGENERATE_GRAPH';
  message: string;
  courses: CourseId[];
}

export interface SequencePlan {
  studentId: StudentId;
  target: CourseId;
  sequence: Sequence;
  warnings: PlanWarning[];
}

export interface PrerequisiteCycle {
  courses: CourseId[];
}

export interface ShortestPathResult {
  fromCourse: CourseId;
  toCourse: CourseId;
  path: CourseId[];
  length: number;
}

export interface CourseAnalytics {
  totalCourses: number;
  totalStudents: number;
  avgPrereqs: number;
  maxPrereqs: number;
  coursesWithoutPrereqs: number;
}
