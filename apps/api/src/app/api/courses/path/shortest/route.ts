import type { NextRequest } from 'next/server';
import { respond } from '@/lib/http';
import { getPlanner } from '@/lib/planner';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /api/courses/path/shortest?from=<code>&to=<code>
 */
export async function GET(req: NextRequest) {
  const { searchParams } = req.nextUrl;
  return respond(() => getPlanner().shortestPath(searchParams.get('from') ?? '', searchParams.get('to') ?? ''));
}
