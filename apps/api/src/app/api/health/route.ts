import { NextResponse } from 'next/server';
import { getGraphClient } from '@/lib/planner';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

async function neo4jHealthy(): Promise<boolean> {
  try {
    return await getGraphClient().healthCheck();
  } catch (error) {
    // e.g. invalid NEO4J_* settings: the client cannot even be built
    console.error('❌ Neo4j client unavailable:', error);
    return false;
  }
}

export async function GET() {
  const neo4j = await neo4jHealthy();
  return NextResponse.json({
    status: neo4j ? 'ok' : 'error',
    neo4j,
    now: new Date().toISOString(),
  });
}
