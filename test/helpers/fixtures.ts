/**
 * Shared fixtures for the analysis tests.
 */

import { RunState, type Plan, type Run } from '../../src/types/index.js';

export const WINDOW_START = new Date('2025-03-10T00:00:00.000Z');
export const WINDOW_END = new Date('2025-03-11T00:00:00.000Z');

export function createMockRun(overrides: Partial<Run> = {}): Run {
  return {
    id: 'run-1',
    planId: 'plan-a',
    state: RunState.COMPLETE,
    createdAt: new Date('2025-03-10T09:00:00.000Z'),
    completedAt: new Date('2025-03-10T09:00:10.000Z'),
    durationMs: 10000,
    metadata: {},
    ...overrides,
  };
}

export function createMockPlan(overrides: Partial<Plan> = {}): Plan {
  return {
    id: 'plan-a',
    name: 'Plan A',
    description: null,
    createdAt: new Date('2025-03-01T00:00:00.000Z'),
    updatedAt: new Date('2025-03-01T00:00:00.000Z'),
    ...overrides,
  };
}

/**
 * Clock that returns the given instants in order, repeating the last one.
 */
export function sequenceClock(...instants: Date[]): () => Date {
  let index = 0;
  return () => {
    const instant = instants[Math.min(index, instants.length - 1)] ?? new Date(0);
    index++;
    return instant;
  };
}
