/**
 * Course and student identifiers
 *
 * Raw strings coming from a request or from the graph store are validated
 * here once and branded, so the planning code never handles unchecked ids.
 */

import { z } from 'zod';
import { InvalidInputError } from './errors';

export const courseIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^\w[\w .\-/&:]*$/, 'contains unsupported characters')
  .brand<'CourseId'>();

export const studentIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[\w.\-@]+$/, 'contains unsupported characters')
  .brand<'StudentId'>();

export type CourseId = z.infer<typeof courseIdSchema>;
export type StudentId = z.infer<typeof studentIdSchema>;

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, field: string, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(field, result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}

export function parseCourseId(raw: unknown, field: string = 'courseId'): CourseId {
  return parseWith(courseIdSchema, field, raw);
}

export function parseStudentId(raw: unknown, field: string = 'studentId'): StudentId {
  return parseWith(studentIdSchema, field, raw);
}

// Result limits (cycle enumeration)
export const MAX_RESULT_LIMIT = 500;

export function parseLimit(raw: unknown, fallback: number, field: string = 'limit'): number {
  if (raw === undefined || raw === null || raw === '') return fallback;
  const schema = z.coerce.number().int().min(1).max(MAX_RESULT_LIMIT);
  return parseWith(schema, field, raw);
}
