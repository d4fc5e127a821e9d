/**
 * Plan Runs Resource API
 */

import { runRecordSchema, type Run } from '../../types/index.js';
import type { ListOptions } from '../types.js';
import { pageOf, type RequestFn } from './shared.js';

const runPageSchema = pageOf(runRecordSchema);

export interface RunsListOptions extends ListOptions {
  planId?: string;
  /** Platform state filter, e.g. COMPLETE or FAILED */
  state?: string;
  /** Only runs created at or after this instant */
  since?: Date;
  /** Only runs created before this instant */
  until?: Date;
}

/**
 * Plan runs resource methods
 */
export class RunsResource {
  constructor(private request: RequestFn) {}

  /**
   * List plan runs with optional filters (first page only)
   */
  async list(options: RunsListOptions = {}): Promise<Run[]> {
    const params: Record<string, string> = {};
    if (options.limit) params['page_size'] = String(options.limit);
    if (options.planId) params['plan_id'] = options.planId;
    if (options.state) params['run_state'] = options.state;
    if (options.since) params['created_after'] = options.since.toISOString();
    if (options.until) params['created_before'] = options.until.toISOString();

    return this.request('/plan-runs/', runPageSchema, params);
  }

  /**
   * Get a plan run by ID
   */
  async get(id: string): Promise<Run> {
    return this.request(`/plan-runs/${encodeURIComponent(id)}/`, runRecordSchema);
  }
}
