import type { NextRequest } from 'next/server';
import { respond } from '@/lib/http';
import { getPlanner } from '@/lib/planner';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /api/courses/prerequisites/cycles?limit=<n>
 */
export async function GET(req: NextRequest) {
  const limit = req.nextUrl.searchParams.get('limit');
  return respond(() => getPlanner().findCycles(limit));
}
