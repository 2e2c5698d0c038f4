/**
 * Neo4j Course Graph Client
 * Stores courses, REQUIRES relationships and students' HAS_PASSED history,
 * and serves them to the planner through the GraphStore contract.
 */

import neo4j, { Neo4jError, isRetriableError, type Driver, type Session } from 'neo4j-driver';
import { z } from 'zod';
import {
  InvalidInputError,
  UpstreamUnavailableError,
  courseIdSchema,
  type CatalogStudent,
  type CourseId,
  type CoursePrereqCount,
  type GraphStore,
  type RequirementEdge,
  type StudentId,
} from '@prereq-planner/planner';
import type { GraphConfig } from './config';

export const MAX_TRAVERSAL_DEPTH = 25;
export const EDGE_LIMIT = 5000;

// Driver failures that mean "try again later" rather than "bad query"
const UNAVAILABLE_CODES = new Set<string>([
  neo4j.error.SERVICE_UNAVAILABLE,
  neo4j.error.SESSION_EXPIRED,
  'Neo.ClientError.Transaction.TransactionTimedOut',
  'Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration',
]);

// The pool raises these with code 'N/A' when no connection frees up in time
const ACQUISITION_TIMEOUT_PREFIX = 'Connection acquisition timed out';

function isUnavailable(error: Neo4jError): boolean {
  return (
    UNAVAILABLE_CODES.has(error.code) ||
    isRetriableError(error) ||
    (error.code === 'N/A' && error.message.startsWith(ACQUISITION_TIMEOUT_PREFIX))
  );
}

export function toStoreError(error: unknown): unknown {
  if (error instanceof Neo4jError && isUnavailable(error)) {
    return new UpstreamUnavailableError(`Neo4j unavailable: ${error.message}`, { cause: error });
  }
  return error;
}

const count = z.preprocess(
  (value) => (neo4j.isInt(value) ? value.toNumber() : value),
  z.number().int().nonnegative()
);

const edgeRecord = z.object({ course: courseIdSchema, prerequisite: courseIdSchema });
const codeRecord = z.object({ code: courseIdSchema });
const foundRecord = z.object({ found: z.boolean() });
const prereqCountRecord = z.object({ course: courseIdSchema, prereqCount: count });
const totalRecord = z.object({ total: count });

type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function parseRecord<T>(label: string, schema: RecordSchema<T>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Malformed ${label} record from Neo4j: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

class CourseGraphClient implements GraphStore {
  private driver: Driver;

  constructor(private readonly config: GraphConfig) {
    this.driver = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
      connectionTimeout: config.connectionTimeoutMs,
      connectionAcquisitionTimeout: config.connectionTimeoutMs,
    });
  }

  getSession(mode: 'READ' | 'WRITE' = 'READ'): Session {
    return this.driver.session({
      database: this.config.database,
      defaultAccessMode: mode,
    });
  }

  /**
   * Check the server is reachable. Never throws, so the process can start
   * before the database does; /api/health reports the state meanwhile.
   */
  async connect(): Promise<boolean> {
    try {
      await this.driver.verifyConnectivity({ database: this.config.database });
      console.log(`✅ Connected to Neo4j at ${this.config.uri}`);
      return true;
    } catch (error) {
      console.warn('⚠️  Neo4j not reachable yet:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  /**
   * Health check for Neo4j connection
   */
  async healthCheck(): Promise<boolean> {
    const session = this.getSession();
    try {
      await session.run('RETURN 1');
      return true;
    } catch (error) {
      console.error('❌ Neo4j health check failed:', error);
      return false;
    } finally {
      await session.close();
    }
  }

  private async read<T>(
    label: string,
    query: string,
    params: Record<string, unknown>,
    schema: RecordSchema<T>
  ): Promise<T[]> {
    const session = this.getSession();
    try {
      const result = await session.run(query, params, { timeout: this.config.queryTimeoutMs });
      return result.records.map((record) => parseRecord(label, schema, record.toObject()));
    } catch (error) {
      throw toStoreError(error);
    } finally {
      await session.close();
    }
  }

  private async write(query: string, params: Record<string, unknown> = {}): Promise<void> {
    const session = this.getSession('WRITE');
    try {
      await session.run(query, params);
    } catch (error) {
      throw toStoreError(error);
    } finally {
      await session.close();
    }
  }

  // ============== GraphStore ==============

  /**
   * Every REQUIRES edge on a path of at most `maxDepth` hops from the course.
   * Variable-length bounds cannot be parameters, so the depth is validated
   * and inlined.
   */
  async edgesReachableFrom(course: CourseId, maxDepth: number): Promise<RequirementEdge[]> {
    if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > MAX_TRAVERSAL_DEPTH) {
      throw new InvalidInputError('maxDepth', [`must be an integer between 1 and ${MAX_TRAVERSAL_DEPTH}`]);
    }

    const edges = await this.read(
      'requirement edge',
      `
      MATCH (target:Course {code: $code})
      MATCH p = (target)-[:REQUIRES*1..${maxDepth}]->(:Course)
      UNWIND relationships(p) AS r
      WITH DISTINCT startNode(r) AS c, endNode(r) AS pr
      RETURN c.code AS course, pr.code AS prerequisite
      LIMIT $limit
      `,
      { code: course, limit: neo4j.int(EDGE_LIMIT) },
      edgeRecord
    );

    if (edges.length >= EDGE_LIMIT) {
      console.warn(`⚠️  Prerequisite subgraph of ${course} hit the ${EDGE_LIMIT}-edge limit; plans may be incomplete`);
    }
    return edges;
  }

  async courseExists(course: CourseId): Promise<boolean> {
    const [record] = await this.read(
      'course existence',
      'OPTIONAL MATCH (c:Course {code: $code}) RETURN c IS NOT NULL AS found LIMIT 1',
      { code: course },
      foundRecord
    );
    return record?.found ?? false;
  }

  async studentExists(student: StudentId): Promise<boolean> {
    const [record] = await this.read(
      'student existence',
      'OPTIONAL MATCH (s:Student {id: $id}) RETURN s IS NOT NULL AS found LIMIT 1',
      { id: student },
      foundRecord
    );
    return record?.found ?? false;
  }

  async completedCourses(student: StudentId): Promise<Set<CourseId>> {
    const records = await this.read(
      'completed course',
      'MATCH (:Student {id: $id})-[:HAS_PASSED]->(c:Course) RETURN DISTINCT c.code AS code',
      { id: student },
      codeRecord
    );
    return new Set(records.map((record) => record.code));
  }

  async allCoursesWithPrereqCounts(): Promise<CoursePrereqCount[]> {
    return this.read(
      'prerequisite count',
      `
      MATCH (c:Course)
      OPTIONAL MATCH (c)-[:REQUIRES]->(p:Course)
      RETURN c.code AS course, count(DISTINCT p) AS prereqCount
      ORDER BY course
      `,
      {},
      prereqCountRecord
    );
  }

  async studentCount(): Promise<number> {
    const [record] = await this.read('student count', 'MATCH (s:Student) RETURN count(s) AS total', {}, totalRecord);
    return record?.total ?? 0;
  }

  async requirementEdges(): Promise<RequirementEdge[]> {
    return this.read(
      'requirement edge',
      'MATCH (c:Course)-[:REQUIRES]->(p:Course) RETURN DISTINCT c.code AS course, p.code AS prerequisite',
      {},
      edgeRecord
    );
  }

  // ============== Schema & seeding ==============

  /**
   * Create uniqueness constraints (which also index the lookup keys)
   */
  async initializeSchema(): Promise<void> {
    await this.write(`
      CREATE CONSTRAINT course_code_unique IF NOT EXISTS
      FOR (c:Course) REQUIRE c.code IS UNIQUE
    `);
    await this.write(`
      CREATE CONSTRAINT student_id_unique IF NOT EXISTS
      FOR (s:Student) REQUIRE s.id IS UNIQUE
    `);
    console.log('✅ Neo4j schema initialized');
  }

  async clear(): Promise<void> {
    await this.write('MATCH (n) DETACH DELETE n');
  }

  async mergeCourses(codes: CourseId[]): Promise<void> {
    await this.write('UNWIND $codes AS code MERGE (:Course {code: code})', { codes });
  }

  /**
   * Creates edge: course -> prerequisite (course REQUIRES prerequisite).
   * Both courses must already exist.
   */
  async mergeRequirements(edges: RequirementEdge[]): Promise<void> {
    await this.write(
      `
      UNWIND $edges AS edge
      MATCH (c:Course {code: edge.course})
      MATCH (p:Course {code: edge.prerequisite})
      MERGE (c)-[:REQUIRES]->(p)
      `,
      { edges }
    );
  }

  async mergeStudents(students: CatalogStudent[]): Promise<void> {
    await this.write(
      `
      UNWIND $students AS student
      MERGE (s:Student {id: student.id})
      WITH s, student
      UNWIND student.passed AS code
      MATCH (c:Course {code: code})
      MERGE (s)-[:HAS_PASSED]->(c)
      `,
      { students }
    );
  }
}

export { CourseGraphClient };
export default CourseGraphClient;
