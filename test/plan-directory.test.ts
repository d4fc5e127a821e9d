/**
 * Plan Directory Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  PlanDirectory,
  createPlaceholderPlan,
  isPlaceholderPlan,
} from '../src/metrics/plans.js';
import { InMemoryRecordSource, type RecordSource } from '../src/source/index.js';
import type { Plan } from '../src/types/index.js';
import { createMockPlan } from './helpers/fixtures.js';

const NOW = new Date('2025-03-11T08:00:00.000Z');

describe('createPlaceholderPlan', () => {
  it('should name the plan after the first eight characters of its ID', () => {
    const plan = createPlaceholderPlan('abcdef1234567890', NOW);
    expect(plan.name).toBe('Plan abcdef12');
    expect(plan.id).toBe('abcdef1234567890');
    expect(plan.description).toBeNull();
    expect(plan.createdAt).toBe(NOW);
    expect(isPlaceholderPlan(plan)).toBe(true);
  });

  it('should keep short IDs whole', () => {
    expect(createPlaceholderPlan('p1', NOW).name).toBe('Plan p1');
  });
});

describe('PlanDirectory', () => {
  it('should resolve fetched plans by ID', async () => {
    const source = new InMemoryRecordSource({ plans: [createMockPlan({ id: 'plan-a', name: 'Nightly sync' })] });
    const directory = await PlanDirectory.load(source, ['plan-a'], NOW);

    expect(directory.nameOf('plan-a')).toBe('Nightly sync');
    expect(isPlaceholderPlan(directory.resolve('plan-a'))).toBe(false);
    expect(directory.placeholderCount).toBe(0);
  });

  it('should use a placeholder for a plan the source does not know', async () => {
    const directory = await PlanDirectory.load(new InMemoryRecordSource(), ['abcdef1234567890'], NOW);

    expect(directory.nameOf('abcdef1234567890')).toBe('Plan abcdef12');
    expect(directory.placeholderCount).toBe(1);
  });

  it('should isolate a failed lookup to its own plan', async () => {
    const known = createMockPlan({ id: 'plan-ok', name: 'Healthy plan' });
    const source: RecordSource = {
      listRuns: () => Promise.resolve([]),
      listPlans: () => Promise.resolve([]),
      getPlan: (id: string): Promise<Plan | null> =>
        id === 'plan-broken-123'
          ? Promise.reject(new Error('connection reset'))
          : Promise.resolve(known),
    };

    const directory = await PlanDirectory.load(source, ['plan-broken-123', 'plan-ok'], NOW);

    expect(directory.nameOf('plan-broken-123')).toBe('Plan plan-bro');
    expect(directory.nameOf('plan-ok')).toBe('Healthy plan');
    expect(directory.placeholderCount).toBe(1);
  });

  it('should resolve IDs that were never loaded to placeholders', () => {
    const directory = new PlanDirectory([], NOW);
    expect(directory.nameOf('zzzzzzzzzz')).toBe('Plan zzzzzzzz');
    expect(directory.placeholderCount).toBe(1);
  });
});
