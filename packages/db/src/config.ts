import { z } from 'zod';

export interface GraphConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  connectionTimeoutMs: number;
  queryTimeoutMs: number;
}

const envSchema = z.object({
  NEO4J_URI: z.string().url().default('bolt://localhost:7687'),
  NEO4J_USER: z.string().min(1).default('neo4j'),
  NEO4J_PASSWORD: z.string().min(1).default('neo4j_dev_password'),
  NEO4J_DATABASE: z.string().min(1).optional(),
  NEO4J_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  NEO4J_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

/**
 * Read Neo4j settings from the environment.
 * Empty variables count as unset.
 */
export function loadGraphConfig(env: NodeJS.ProcessEnv = process.env): GraphConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid Neo4j configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    uri: parsed.NEO4J_URI,
    user: parsed.NEO4J_USER,
    password: parsed.NEO4J_PASSWORD,
    database: parsed.NEO4J_DATABASE,
    connectionTimeoutMs: parsed.NEO4J_CONNECTION_TIMEOUT_MS,
    queryTimeoutMs: parsed.NEO4J_QUERY_TIMEOUT_MS,
  };
}
