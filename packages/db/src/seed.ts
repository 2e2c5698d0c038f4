/**
 * Catalog seeding
 * Loads a course catalog document into Neo4j, replacing whatever is there.
 */

import { readFile } from 'node:fs/promises';
import { parseCatalog, type CourseCatalog } from '@prereq-planner/planner';
import type { CourseGraphClient } from './neo4j';

export async function readCatalogFile(path: string): Promise<CourseCatalog> {
  const raw = await readFile(path, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Catalog file ${path} is not valid JSON`, { cause: error });
  }
  return parseCatalog(json);
}

export interface SeedSummary {
  courses: number;
  requirements: number;
  students: number;
}

export async function seedCatalog(client: CourseGraphClient, catalog: CourseCatalog): Promise<SeedSummary> {
  console.log('🧹 Clearing existing graph...');
  await client.clear();
  await client.initializeSchema();

  console.log(`📚 Creating ${catalog.courses.length} courses...`);
  await client.mergeCourses(catalog.courses);

  console.log(`🔗 Linking ${catalog.requirements.length} requirements...`);
  await client.mergeRequirements(catalog.requirements);

  console.log(`👤 Creating ${catalog.students.length} students...`);
  await client.mergeStudents(catalog.students);

  return {
    courses: catalog.courses.length,
    requirements: catalog.requirements.length,
    students: catalog.students.length,
  };
}
