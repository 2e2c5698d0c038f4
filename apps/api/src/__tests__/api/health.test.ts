import { describe, it, expect, vi, afterEach } from 'vitest';
import { CourseGraphClient, loadGraphConfig } from '@prereq-planner/db';
import { getGraphClient } from '@/lib/planner';
import { GET } from '@/app/api/health/route';

vi.mock('@/lib/planner', () => ({
  getPlanner: vi.fn(),
  getGraphClient: vi.fn(),
}));

describe('GET /api/health', () => {
  const client = new CourseGraphClient(loadGraphConfig({}));

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report a reachable database', async () => {
    vi.spyOn(client, 'healthCheck').mockResolvedValue(true);
    vi.mocked(getGraphClient).mockReturnValue(client);

    const res = await GET();

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', neo4j: true });
  });

  it('should report an unreachable database without failing', async () => {
    vi.spyOn(client, 'healthCheck').mockResolvedValue(false);
    vi.mocked(getGraphClient).mockReturnValue(client);

    const res = await GET();

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'error', neo4j: false });
  });

  it('should report an error when the client cannot be configured', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('Invalid Neo4j configuration: NEO4J_URI: Invalid url');
    vi.mocked(getGraphClient).mockImplementation(() => {
      throw failure;
    });

    const res = await GET();

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'error', neo4j: false });
    expect(consoleError).toHaveBeenCalledWith('❌ Neo4j client unavailable:', failure);
  });
});
