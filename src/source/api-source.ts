/**
 * Record source backed by the platform API.
 */

import { PlanDigestClient, NotFoundError } from '../client/index.js';
import type { Plan, Run } from '../types/index.js';
import type { PlanQuery, RecordSource, RunQuery } from './record-source.js';

export class ApiRecordSource implements RecordSource {
  constructor(private readonly client: PlanDigestClient) {}

  async listRuns(query: RunQuery): Promise<Run[]> {
    return this.client.runs.list({
      since: query.since,
      until: query.until,
      // The platform filters on upper-case states
      ...(query.state !== undefined ? { state: query.state.toUpperCase() } : {}),
      ...(query.limit !== undefined ? { limit: query.limit } : {}),
    });
  }

  /**
   * The plans endpoint has no creation-time filter: this returns the first
   * page and leaves the window filter to the analyzer.
   */
  async listPlans(query: PlanQuery): Promise<Plan[]> {
    return this.client.plans.list(query.limit !== undefined ? { limit: query.limit } : {});
  }

  async getPlan(id: string): Promise<Plan | null> {
    try {
      return await this.client.plans.get(id);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }
}
