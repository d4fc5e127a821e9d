/**
 * Platform Client Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  PlanDigestClient,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  RateLimitError,
  ServerError,
  PlanDigestError,
} from '../src/client/index.js';
import { computeHourlyDistribution } from '../src/metrics/index.js';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: new Headers(headers),
    json: async () => body,
  };
}

const runRecord = {
  id: 'run-1',
  plan_id: 'plan-a',
  state: 'COMPLETE',
  created_at: '2025-03-10T09:00:00Z',
  completed_at: '2025-03-10T09:00:12Z',
  duration_ms: 12000,
  metadata: { tools_used: [{ name: 'search' }] },
};

const planRecord = {
  id: 'plan-a',
  name: 'Daily import',
  description: 'Imports yesterday\'s orders',
  created_at: '2025-03-01T00:00:00Z',
  updated_at: '2025-03-02T00:00:00Z',
};

describe('PlanDigestClient', () => {
  let mockFetch: ReturnType<typeof vi.fn>;
  let client: PlanDigestClient;

  beforeEach(() => {
    mockFetch = vi.fn();
    client = new PlanDigestClient({
      baseUrl: 'https://api.test/api/v0/',
      apiKey: 'test-api-key',
      orgId: 'test-org',
      timeout: 5000,
      fetch: mockFetch as unknown as typeof fetch,
    });
  });

  function calledUrl(): URL {
    const call = mockFetch.mock.calls[0];
    return new URL(String(call?.[0]));
  }

  describe('request headers', () => {
    it('should send the API key and organisation', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ results: [] }));

      await client.plans.list();

      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.test/api/v0/plans/',
        expect.objectContaining({
          method: 'GET',
          headers: {
            Accept: 'application/json',
            Authorization: 'Api-Key test-api-key',
            'X-Organization-Id': 'test-org',
          },
        })
      );
    });
  });

  describe('plans', () => {
    it('should list plans with a page size', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ results: [planRecord] }));

      const plans = await client.plans.list({ limit: 25 });

      expect(calledUrl().pathname).toBe('/api/v0/plans/');
      expect(calledUrl().searchParams.get('page_size')).toBe('25');
      expect(plans).toEqual([
        {
          id: 'plan-a',
          name: 'Daily import',
          description: 'Imports yesterday\'s orders',
          createdAt: new Date('2025-03-01T00:00:00Z'),
          updatedAt: new Date('2025-03-02T00:00:00Z'),
        },
      ]);
    });

    it('should accept a bare array body', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([planRecord]));

      const plans = await client.plans.list();
      expect(plans.map(p => p.id)).toEqual(['plan-a']);
    });

    it('should get a plan by ID', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ ...planRecord, description: null }));

      const plan = await client.plans.get('plan-a');

      expect(calledUrl().pathname).toBe('/api/v0/plans/plan-a/');
      expect(plan.description).toBeNull();
    });
  });

  describe('runs', () => {
    it('should pass window and state filters as query parameters', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ results: [runRecord] }));

      await client.runs.list({
        planId: 'plan-a',
        state: 'COMPLETE',
        since: new Date('2025-03-10T00:00:00Z'),
        until: new Date('2025-03-11T00:00:00Z'),
        limit: 50,
      });

      const params = calledUrl().searchParams;
      expect(calledUrl().pathname).toBe('/api/v0/plan-runs/');
      expect(params.get('page_size')).toBe('50');
      expect(params.get('plan_id')).toBe('plan-a');
      expect(params.get('run_state')).toBe('COMPLETE');
      expect(params.get('created_after')).toBe('2025-03-10T00:00:00.000Z');
      expect(params.get('created_before')).toBe('2025-03-11T00:00:00.000Z');
    });

    it('should convert wire records to runs', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ results: [runRecord] }));

      const [run] = await client.runs.list();

      expect(run).toEqual({
        id: 'run-1',
        planId: 'plan-a',
        state: 'complete',
        createdAt: new Date('2025-03-10T09:00:00Z'),
        completedAt: new Date('2025-03-10T09:00:12Z'),
        durationMs: 12000,
        metadata: { tools_used: [{ name: 'search' }] },
      });
    });

    it('should read timestamps without an offset as UTC', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          results: [
            {
              ...runRecord,
              created_at: '2025-03-10T09:00:00',
              completed_at: '2025-03-10 09:00:10.500',
            },
          ],
        })
      );

      const runs = await client.runs.list();

      expect(runs.map(r => r.createdAt.toISOString())).toEqual(['2025-03-10T09:00:00.000Z']);
      expect(runs.map(r => r.completedAt?.toISOString())).toEqual(['2025-03-10T09:00:10.500Z']);
      expect(computeHourlyDistribution(runs)).toEqual({ '9': 1 });
    });

    it('should keep explicit offsets on timestamps', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ ...planRecord, created_at: '2025-03-01T02:00:00+02:00', updated_at: '2025-03-02' })
      );

      const plan = await client.plans.get('plan-a');

      expect(plan.createdAt.toISOString()).toBe('2025-03-01T00:00:00.000Z');
      expect(plan.updatedAt.toISOString()).toBe('2025-03-02T00:00:00.000Z');
    });

    it('should default missing optional fields', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ id: 'run-2', plan_id: 'plan-b', state: 'RUNNING', created_at: '2025-03-10T10:00:00Z' })
      );

      const run = await client.runs.get('run-2');

      expect(calledUrl().pathname).toBe('/api/v0/plan-runs/run-2/');
      expect(run.completedAt).toBeNull();
      expect(run.durationMs).toBeNull();
      expect(run.metadata).toEqual({});
    });

    it('should reject a malformed body', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ results: [{ id: 'run-3' }] }));

      await expect(client.runs.list()).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('error handling', () => {
    it('should throw NotFoundError on 404', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ detail: 'Not found.' }, 404));

      const error: unknown = await client.plans.get('missing').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        message: 'Resource not found: /plans/missing/',
        path: '/plans/missing/',
        detail: 'Not found.',
      });
    });

    it('should throw AuthenticationError on 401 and 403', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ detail: 'Invalid API key' }, 401));
      await expect(client.plans.list()).rejects.toMatchObject({
        name: 'AuthenticationError',
        message: 'Invalid API key',
        status: 401,
      });

      mockFetch.mockResolvedValueOnce(jsonResponse({}, 403));
      await expect(client.plans.list()).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('should throw ValidationError on 400', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'bad page_size' }, 400));

      await expect(client.runs.list({ limit: 1 })).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'bad page_size',
      });
    });

    it('should throw RateLimitError with retry-after on 429', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 429, { 'Retry-After': '30' }));

      const error: unknown = await client.runs.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ retryAfter: 30, message: 'Request failed with status 429' });
    });

    it('should throw ServerError on 5xx', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'maintenance' }, 503));

      const error: unknown = await client.runs.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ status: 503, message: 'maintenance', path: '/plan-runs/' });
    });

    it('should carry the platform detail on server errors', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ detail: 'Database unavailable' }, 500));

      const error: unknown = await client.plans.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      if (!(error instanceof ServerError)) return;
      expect(error.message).toBe('Database unavailable');
      expect(error.detail).toBe('Database unavailable');
      expect(error.body).toEqual({ detail: 'Database unavailable' });
    });

    it('should throw a generic error for other statuses', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(null, 418));

      const error: unknown = await client.runs.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PlanDigestError);
      expect(error).toMatchObject({ code: 'HTTP_ERROR', status: 418 });
    });

    it('should wrap network failures', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.runs.list()).rejects.toMatchObject({
        name: 'NetworkError',
        message: 'Request failed',
        status: 0,
        path: '/plan-runs/',
      });
    });

    it('should report aborted requests as timeouts', async () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';
      mockFetch.mockRejectedValueOnce(abort);

      const error: unknown = await client.runs.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ message: 'Request timeout' });
    });
  });
});
