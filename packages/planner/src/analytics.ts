import type { CourseAnalytics, CoursePrereqCount } from './types';

/** Roll up one-hop prerequisite counts over the whole catalog. */
export function summarizeCourses(counts: readonly CoursePrereqCount[], totalStudents: number): CourseAnalytics {
  if (counts.length === 0) {
    return {
      totalCourses: 0,
      totalStudents,
      avgPrereqs: 0,
      maxPrereqs: 0,
      coursesWithoutPrereqs: 0,
    };
  }

  let sum = 0;
  let max = 0;
  let withoutPrereqs = 0;
  for (const { prereqCount } of counts) {
    sum += prereqCount;
    max = Math.max(max, prereqCount);
    if (prereqCount === 0) withoutPrereqs++;
  }

  return {
    totalCourses: counts.length,
    totalStudents,
    avgPrereqs: sum / counts.length,
    maxPrereqs: max,
    coursesWithoutPrereqs: withoutPrereqs,
  };
}
