import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseCatalog } from '@prereq-planner/planner';
import { loadGraphConfig } from '../config';
import { CourseGraphClient } from '../neo4j';
import { readCatalogFile, seedCatalog } from '../seed';
import { fakeSession, resetFakeDriver } from './utils/fake-driver';

vi.mock('neo4j-driver', async (importOriginal) => {
  const actual = await importOriginal<typeof import('neo4j-driver')>();
  const { fakeDriver: driverStub } = await import('./utils/fake-driver');
  const driver = vi.fn(() => driverStub);
  return { ...actual, driver, default: { ...actual.default, driver } };
});

const catalogPath = fileURLToPath(new URL('../../data/catalog.json', import.meta.url));

describe('readCatalogFile', () => {
  it('should load the bundled catalog', async () => {
    const catalog = await readCatalogFile(catalogPath);

    expect(catalog.courses).toHaveLength(20);
    expect(catalog.requirements).toHaveLength(24);
    expect(catalog.students.map((s) => s.id)).toEqual(['s1', 's2', 's3', 's4']);
  });

  describe('with a scratch directory', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'catalog-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should reject a file that is not JSON', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ courses: ');

      await expect(readCatalogFile(path)).rejects.toThrow(`Catalog file ${path} is not valid JSON`);
    });

    it('should reject a catalog with invalid course codes', async () => {
      const path = join(dir, 'invalid.json');
      await writeFile(path, JSON.stringify({ courses: ['CS 101', '!!'] }));

      await expect(readCatalogFile(path)).rejects.toThrow(/^Invalid course catalog: courses\.1/);
    });
  });
});

describe('seedCatalog', () => {
  beforeEach(() => {
    resetFakeDriver();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should clear, constrain and load the catalog in order', async () => {
    const client = new CourseGraphClient(loadGraphConfig({}));
    const catalog = parseCatalog({
      courses: ['CS 101', 'CS 201'],
      requirements: [{ course: 'CS 201', prerequisite: 'CS 101' }],
      students: [{ id: 's1', passed: ['CS 101'] }],
    });

    const summary = await seedCatalog(client, catalog);

    expect(summary).toEqual({ courses: 2, requirements: 1, students: 1 });

    const queries: string[] = fakeSession.run.mock.calls.map((call) => String(call[0]));
    expect(queries).toHaveLength(6);
    expect(queries[0]).toContain('DETACH DELETE');
    expect(queries[1]).toContain('course_code_unique');
    expect(queries[2]).toContain('student_id_unique');
    expect(fakeSession.run.mock.calls[3][1]).toEqual({ codes: ['CS 101', 'CS 201'] });
    expect(fakeSession.run.mock.calls[4][1]).toEqual({
      edges: [{ course: 'CS 201', prerequisite: 'CS 101' }],
    });
    expect(fakeSession.run.mock.calls[5][1]).toEqual({ students: [{ id: 's1', passed: ['CS 101'] }] });
  });
});
