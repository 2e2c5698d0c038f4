/**
 * Planner wiring for route handlers
 *
 * One Neo4j driver per server process. It lives on globalThis so dev-mode
 * hot reloads reuse it instead of leaking connection pools; instrumentation
 * connects it at startup and closes it on shutdown.
 */

import { CourseGraphClient, loadGraphConfig } from '@prereq-planner/db';
import { CoursePlanner } from '@prereq-planner/planner';

const globalForGraph = globalThis as unknown as {
  graphClient: CourseGraphClient | undefined;
};

export function getGraphClient(): CourseGraphClient {
  globalForGraph.graphClient ??= new CourseGraphClient(loadGraphConfig());
  return globalForGraph.graphClient;
}

export function getPlanner(): CoursePlanner {
  return new CoursePlanner(getGraphClient());
}

export async function closeGraphClient(): Promise<void> {
  const client = globalForGraph.graphClient;
  if (!client) return;

  globalForGraph.graphClient = undefined;
  await client.close();
  console.log('👋 Neo4j driver closed');
}
