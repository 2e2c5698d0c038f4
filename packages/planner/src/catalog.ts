/**
 * Course catalog documents
 * Used to seed a graph store and to build the in-memory store.
 */

import { z } from 'zod';
import { courseIdSchema, studentIdSchema } from './ids';

export const requirementSchema = z.object({
  course: courseIdSchema,
  prerequisite: courseIdSchema,
});

export const catalogStudentSchema = z.object({
  id: studentIdSchema,
  passed: z.array(courseIdSchema).default([]),
});

export const courseCatalogSchema = z.object({
  courses: z.array(courseIdSchema),
  requirements: z.array(requirementSchema).default([]),
  students: z.array(catalogStudentSchema).default([]),
});

export type CatalogStudent = z.infer<typeof catalogStudentSchema>;
export type CourseCatalog = z.infer<typeof courseCatalogSchema>;
export type CourseCatalogInput = z.input<typeof courseCatalogSchema>;

export function parseCatalog(raw: unknown): CourseCatalog {
  const result = courseCatalogSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid course catalog: ${details}`);
  }
  return result.data;
}
