import { respond } from '@/lib/http';
import { getPlanner } from '@/lib/planner';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  return respond(() => getPlanner().summarize());
}
