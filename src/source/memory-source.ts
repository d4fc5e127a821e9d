/**
 * In-process record source over fixed collections.
 * Used for tests and for analysing exported run dumps.
 */

import type { Plan, Run } from '../types/index.js';
import type { PlanQuery, RecordSource, RunQuery } from './record-source.js';

function inHalfOpenWindow(date: Date, since: Date, until: Date): boolean {
  const time = date.getTime();
  return time >= since.getTime() && time < until.getTime();
}

export class InMemoryRecordSource implements RecordSource {
  private readonly runs: readonly Run[];
  private readonly plans: readonly Plan[];

  constructor(data: { runs?: readonly Run[]; plans?: readonly Plan[] } = {}) {
    this.runs = data.runs ?? [];
    this.plans = data.plans ?? [];
  }

  listRuns(query: RunQuery): Promise<Run[]> {
    const matching = this.runs.filter(
      run =>
        inHalfOpenWindow(run.createdAt, query.since, query.until) &&
        (query.state === undefined || run.state === query.state)
    );
    return Promise.resolve(
      query.limit !== undefined ? matching.slice(0, query.limit) : matching
    );
  }

  listPlans(query: PlanQuery): Promise<Plan[]> {
    // Plan creation windows are closed on both ends
    const matching = this.plans.filter(
      plan =>
        plan.createdAt.getTime() >= query.since.getTime() &&
        plan.createdAt.getTime() <= query.until.getTime()
    );
    return Promise.resolve(
      query.limit !== undefined ? matching.slice(0, query.limit) : matching
    );
  }

  getPlan(id: string): Promise<Plan | null> {
    return Promise.resolve(this.plans.find(plan => plan.id === id) ?? null);
  }
}
