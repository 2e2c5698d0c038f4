/**
 * Vitest Setup File
 *
 * Runs before each test file. Keeps tests away from a real Neo4j server and
 * from whatever NEO4J_* variables the developer's shell exports.
 */

import { afterAll, beforeAll } from 'vitest';

const NEO4J_VARS = [
  'NEO4J_URI',
  'NEO4J_USER',
  'NEO4J_PASSWORD',
  'NEO4J_DATABASE',
  'NEO4J_CONNECTION_TIMEOUT_MS',
  'NEO4J_QUERY_TIMEOUT_MS',
];

const saved = new Map<string, string | undefined>();

beforeAll(() => {
  for (const name of NEO4J_VARS) {
    saved.set(name, process.env[name]);
    delete process.env[name];
  }
});

afterAll(() => {
  for (const [name, value] of saved) {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
});
