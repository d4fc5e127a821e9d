/**
 * Record Source Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { PlanDigestClient } from '../src/client/index.js';
import { ApiRecordSource, InMemoryRecordSource } from '../src/source/index.js';
import { RunState } from '../src/types/index.js';
import { WINDOW_END, WINDOW_START, createMockPlan, createMockRun } from './helpers/fixtures.js';

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: new Headers(),
    json: async () => body,
  };
}

function createSource() {
  const mockFetch = vi.fn();
  const client = new PlanDigestClient({
    baseUrl: 'https://api.test/api/v0',
    apiKey: 'test-api-key',
    orgId: 'test-org',
    fetch: mockFetch as unknown as typeof fetch,
  });
  return { mockFetch, source: new ApiRecordSource(client) };
}

describe('ApiRecordSource', () => {
  it('should send run states upper-cased with the window', async () => {
    const { mockFetch, source } = createSource();
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: [] }));

    await source.listRuns({ since: WINDOW_START, until: WINDOW_END, state: RunState.FAILED, limit: 100 });

    const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(url.searchParams.get('run_state')).toBe('FAILED');
    expect(url.searchParams.get('page_size')).toBe('100');
    expect(url.searchParams.get('created_after')).toBe('2025-03-10T00:00:00.000Z');
    expect(url.searchParams.get('created_before')).toBe('2025-03-11T00:00:00.000Z');
  });

  it('should omit the state filter for all runs', async () => {
    const { mockFetch, source } = createSource();
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: [] }));

    await source.listRuns({ since: WINDOW_START, until: WINDOW_END });

    const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
    expect(url.searchParams.has('run_state')).toBe(false);
  });

  it('should return null for a plan that does not exist', async () => {
    const { mockFetch, source } = createSource();
    mockFetch.mockResolvedValueOnce(jsonResponse({ detail: 'Not found.' }, 404));

    await expect(source.getPlan('missing')).resolves.toBeNull();
  });

  it('should rethrow other lookup failures', async () => {
    const { mockFetch, source } = createSource();
    mockFetch.mockResolvedValueOnce(jsonResponse({ detail: 'boom' }, 500));

    await expect(source.getPlan('plan-a')).rejects.toMatchObject({ name: 'ServerError' });
  });
});

describe('InMemoryRecordSource', () => {
  const runs = [
    createMockRun({ id: 'start', createdAt: WINDOW_START }),
    createMockRun({ id: 'end', createdAt: WINDOW_END }),
    createMockRun({ id: 'failed', state: RunState.FAILED, createdAt: new Date('2025-03-10T05:00:00Z') }),
  ];
  const plans = [
    createMockPlan({ id: 'at-start', createdAt: WINDOW_START }),
    createMockPlan({ id: 'at-end', createdAt: WINDOW_END }),
    createMockPlan({ id: 'before', createdAt: new Date('2025-03-09T23:59:59Z') }),
  ];
  const source = new InMemoryRecordSource({ runs, plans });

  it('should select runs in the half-open window', async () => {
    const selected = await source.listRuns({ since: WINDOW_START, until: WINDOW_END });
    expect(selected.map(r => r.id)).toEqual(['start', 'failed']);
  });

  it('should filter runs by state and limit', async () => {
    const failed = await source.listRuns({ since: WINDOW_START, until: WINDOW_END, state: RunState.FAILED });
    const limited = await source.listRuns({ since: WINDOW_START, until: WINDOW_END, limit: 1 });

    expect(failed.map(r => r.id)).toEqual(['failed']);
    expect(limited.map(r => r.id)).toEqual(['start']);
  });

  it('should select plans created within the closed window', async () => {
    const selected = await source.listPlans({ since: WINDOW_START, until: WINDOW_END });
    expect(selected.map(p => p.id)).toEqual(['at-start', 'at-end']);
  });

  it('should look plans up by ID', async () => {
    await expect(source.getPlan('before')).resolves.toMatchObject({ id: 'before' });
    await expect(source.getPlan('unknown')).resolves.toBeNull();
  });
});
