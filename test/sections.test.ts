/**
 * Report Section Unit Tests
 *
 * Histograms, failures, execution rate and resource usage.
 */

import { describe, it, expect } from 'vitest';
import { computeDailyDistribution, computeHourlyDistribution } from '../src/metrics/temporal.js';
import { analyzeFailures, extractErrorMessage } from '../src/metrics/failures.js';
import { computeExecutionRate, describePlansCreated } from '../src/metrics/execution.js';
import { computeResourceUsage } from '../src/metrics/resources.js';
import { PlanDirectory } from '../src/metrics/plans.js';
import { RunState } from '../src/types/index.js';
import { createMockPlan, createMockRun } from './helpers/fixtures.js';

const NOW = new Date('2025-03-11T08:00:00.000Z');

describe('temporal distribution', () => {
  const runs = [
    createMockRun({ id: '1', completedAt: new Date('2025-03-10T14:05:00Z') }),
    createMockRun({ id: '2', completedAt: new Date('2025-03-10T09:30:00Z') }),
    createMockRun({ id: '3', completedAt: new Date('2025-03-11T14:59:59Z') }),
    createMockRun({ id: '4', completedAt: null }),
  ];

  it('should bucket completions by UTC hour', () => {
    const hourly = computeHourlyDistribution(runs);
    expect(hourly).toEqual({ '9': 1, '14': 2 });
  });

  it('should bucket completions by UTC date in ascending order', () => {
    const daily = computeDailyDistribution(runs);
    expect(Object.entries(daily)).toEqual([
      ['2025-03-10', 2],
      ['2025-03-11', 1],
    ]);
  });

  it('should account for every run with a completion time', () => {
    const total = Object.values(computeHourlyDistribution(runs)).reduce((a, b) => a + b, 0);
    expect(total).toBe(3);
  });
});

describe('failure analysis', () => {
  it('should read the error message from metadata', () => {
    expect(extractErrorMessage({ error: 'Tool timed out' })).toBe('Tool timed out');
  });

  it('should fall back only when the error or the metadata is missing', () => {
    expect(extractErrorMessage({})).toBe('Unknown error');
    expect(extractErrorMessage({ error: null })).toBe('Unknown error');
    expect(extractErrorMessage(null)).toBe('Unknown error');
    expect(extractErrorMessage(undefined)).toBe('Unknown error');
  });

  it('should keep an empty error string as it is', () => {
    expect(extractErrorMessage({ error: '' })).toBe('');
  });

  it('should render structured and primitive errors as text', () => {
    expect(extractErrorMessage({ error: { message: 'boom' } })).toBe('{"message":"boom"}');
    expect(extractErrorMessage({ error: ['a', 'b'] })).toBe('["a","b"]');
    expect(extractErrorMessage({ error: 500 })).toBe('500');
    expect(extractErrorMessage({ error: false })).toBe('false');
  });

  it('should list failed runs in input order with plan names', () => {
    const directory = new PlanDirectory([createMockPlan({ id: 'plan-a', name: 'Ingest' })], NOW);
    const failed = [
      createMockRun({
        id: 'f2',
        state: RunState.FAILED,
        completedAt: new Date('2025-03-10T12:00:00Z'),
        metadata: { error: 'Rate limited' },
      }),
      createMockRun({ id: 'f1', planId: 'deadbeefcafe', state: RunState.FAILED, completedAt: null }),
    ];

    expect(analyzeFailures(failed, directory)).toEqual({
      count: 2,
      details: [
        {
          run_id: 'f2',
          plan_id: 'plan-a',
          plan_name: 'Ingest',
          failed_at: '2025-03-10T12:00:00.000Z',
          error_message: 'Rate limited',
        },
        {
          run_id: 'f1',
          plan_id: 'deadbeefcafe',
          plan_name: 'Plan deadbeef',
          failed_at: null,
          error_message: 'Unknown error',
        },
      ],
    });
  });
});

describe('execution rate', () => {
  it('should compute the share of created plans that ran', () => {
    const created = ['A', 'B', 'C'].map(id => createMockPlan({ id }));
    const runs = ['B', 'C', 'D'].map(planId => createMockRun({ id: `run-${planId}`, planId }));

    const rate = computeExecutionRate(created, runs);

    expect(rate.rate).toBeCloseTo(66.67, 2);
    expect(rate.executed_plans).toBe(2);
    expect(rate.total_plans).toBe(3);
    expect(rate.executed_plan_ids).toEqual(['B', 'C']);
  });

  it('should be 0 when no plans were created', () => {
    expect(computeExecutionRate([], [createMockRun()])).toEqual({
      rate: 0,
      executed_plans: 0,
      total_plans: 0,
      executed_plan_ids: [],
    });
  });

  it('should describe created plans newest first', () => {
    const details = describePlansCreated([
      createMockPlan({ id: 'old', name: 'Old', createdAt: new Date('2025-03-10T01:00:00Z') }),
      createMockPlan({ id: 'new', name: 'New', createdAt: new Date('2025-03-10T05:00:00Z') }),
    ]);

    expect(details.count).toBe(2);
    expect(details.details.map(d => d.plan_id)).toEqual(['new', 'old']);
    expect(details.details[0]).toEqual({
      plan_id: 'new',
      plan_name: 'New',
      created_at: '2025-03-10T05:00:00.000Z',
      updated_at: '2025-03-01T00:00:00.000Z',
    });
  });
});

describe('resource usage', () => {
  it('should divide total duration by every successful run', () => {
    const usage = computeResourceUsage([
      createMockRun({ id: '1', durationMs: 30000 }),
      createMockRun({ id: '2', durationMs: 15000 }),
      createMockRun({ id: '3', durationMs: null }),
    ]);

    expect(usage).toEqual({ total_duration: 45, avg_duration: 15, total_runs: 3 });
  });

  it('should report zeros without runs', () => {
    expect(computeResourceUsage([])).toEqual({ total_duration: 0, avg_duration: 0, total_runs: 0 });
  });
});
