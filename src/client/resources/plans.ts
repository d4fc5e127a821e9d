/**
 * Plans Resource API
 */

import { planRecordSchema, type Plan } from '../../types/index.js';
import type { ListOptions } from '../types.js';
import { pageOf, type RequestFn } from './shared.js';

const planPageSchema = pageOf(planRecordSchema);

/**
 * Plans resource methods
 */
export class PlansResource {
  constructor(private request: RequestFn) {}

  /**
   * List plans for the organisation (first page only)
   */
  async list(options: ListOptions = {}): Promise<Plan[]> {
    const params: Record<string, string> = {};
    if (options.limit) params['page_size'] = String(options.limit);

    return this.request('/plans/', planPageSchema, params);
  }

  /**
   * Get a plan by ID
   */
  async get(id: string): Promise<Plan> {
    return this.request(`/plans/${encodeURIComponent(id)}/`, planRecordSchema);
  }
}
