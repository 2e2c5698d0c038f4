/**
 * In-process stand-in for a neo4j-driver Driver
 *
 * Test files swap `neo4j.driver()` for a factory returning `fakeDriver`,
 * then script `fakeSession.run` per test.
 *
 * This module must not import neo4j-driver: the mock factory loads it while
 * neo4j-driver itself is still being mocked.
 */

import { vi } from 'vitest';

export function record(values: Record<string, unknown>) {
  return { toObject: () => values };
}

export function records(...rows: Array<Record<string, unknown>>) {
  return { records: rows.map(record) };
}

export const fakeSession = {
  run: vi.fn(),
  close: vi.fn(async () => undefined),
};

export const fakeDriver = {
  session: vi.fn(() => fakeSession),
  close: vi.fn(async () => undefined),
  verifyConnectivity: vi.fn(async () => ({})),
};

export function resetFakeDriver(): void {
  fakeSession.run.mockReset();
  fakeSession.run.mockResolvedValue(records());
  fakeSession.close.mockClear();
  fakeDriver.session.mockClear();
  fakeDriver.close.mockClear();
  fakeDriver.verifyConnectivity.mockReset();
  fakeDriver.verifyConnectivity.mockResolvedValue({});
}
