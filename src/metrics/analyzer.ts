/**
 * Windowed plan-run analyzer.
 *
 * Fetches the window's runs and plans from a {@link RecordSource} and
 * assembles the analysis report. Queries run one after another; everything
 * after the fetch is pure computation.
 */

import {
  RunState,
  type AnalysisReport,
  type EmptyAnalysisReport,
  type Plan,
  type Run,
  type WindowReport,
} from '../types/index.js';
import type { RecordSource } from '../source/index.js';
import { createLogger } from '../utils/logger.js';
import { RunFetchError } from './errors.js';
import { PlanDirectory } from './plans.js';
import {
  computeDurationStats,
  computePerPlanStats,
  computePlanDurationStats,
  groupDurationsByPlan,
  isTimedRun,
} from './durations.js';
import { computePlanSuccessRates, rankPlans, rankRuns } from './rankings.js';
import { computeDailyDistribution, computeHourlyDistribution } from './temporal.js';
import { analyzeFailures } from './failures.js';
import { analyzeTools } from './tools.js';
import { computeExecutionRate, describePlansCreated } from './execution.js';
import { computeResourceUsage } from './resources.js';
import { compareKeys, ratePercent } from './statistics.js';

const log = createLogger('metrics:analyzer');

export const EMPTY_WINDOW_MESSAGE = 'No plan runs found in the specified window.';

export interface AnalyzerOptions {
  /** Length of the fastest/slowest lists (default 5) */
  topK?: number;
  /** Page size passed to every window query (default 1000) */
  fetchLimit?: number;
  /** Wall clock; fixes `generated_at` and the default window end */
  clock?: () => Date;
}

export interface AnalyzeOptions {
  /** Add tool_usage and tool_performance sections */
  includeToolMetrics?: boolean;
}

/**
 * Computes window reports over a record source. Holds no state between
 * calls beyond its configuration.
 */
export class PlanRunAnalyzer {
  private readonly topK: number;
  private readonly fetchLimit: number;
  private readonly clock: () => Date;

  constructor(
    private readonly source: RecordSource,
    options: AnalyzerOptions = {}
  ) {
    this.topK = options.topK ?? 5;
    this.fetchLimit = options.fetchLimit ?? 1000;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Analyze runs created in [since, until). `until` defaults to now.
   *
   * @throws RangeError when the window is inverted
   * @throws RunFetchError when a run query fails
   */
  async analyzeWindow(
    since: Date,
    until?: Date,
    options: AnalyzeOptions = {}
  ): Promise<WindowReport> {
    const now = this.clock();
    const end = until ?? now;
    if (since.getTime() > end.getTime()) {
      throw new RangeError('Window start must not be after window end');
    }

    const allRuns = await this.fetchRuns('all', since, end);
    const completedRuns = await this.fetchRuns(RunState.COMPLETE, since, end);
    const failedRuns = await this.fetchRuns(RunState.FAILED, since, end);
    const plansCreated = await this.fetchPlansCreated(since, end);

    const window = { since: since.toISOString(), until: end.toISOString() };

    if (allRuns.length === 0) {
      log.info({ window }, 'No runs in window');
      const empty: EmptyAnalysisReport = {
        generated_at: now.toISOString(),
        window,
        empty: true,
        total_runs: 0,
        message: EMPTY_WINDOW_MESSAGE,
      };
      return empty;
    }

    const planIds = new Set<string>();
    for (const run of [...allRuns, ...completedRuns, ...failedRuns]) {
      planIds.add(run.planId);
    }
    const plans = await PlanDirectory.load(
      this.source,
      [...planIds].sort(compareKeys),
      now
    );

    const timedRuns = completedRuns.filter(isTimedRun);
    const groups = groupDurationsByPlan(timedRuns);

    const report: AnalysisReport = {
      generated_at: now.toISOString(),
      window,
      empty: false,

      total_runs: allRuns.length,
      completed_runs: completedRuns.length,
      failed_runs: failedRuns.length,
      success_rate: ratePercent(completedRuns.length, allRuns.length),

      plans_created: plansCreated.length,
      plans_created_details: describePlansCreated(plansCreated),
      execution_rate: computeExecutionRate(plansCreated, allRuns),

      duration_stats: computeDurationStats(timedRuns),
      plan_duration_stats: computePlanDurationStats(groups, plans),
      per_plan_stats: computePerPlanStats(groups, plans),
      fastest_runs: rankRuns(timedRuns, plans, 'asc', this.topK),
      slowest_runs: rankRuns(timedRuns, plans, 'desc', this.topK),
      fastest_plans: rankPlans(groups, plans, 'asc', this.topK),
      slowest_plans: rankPlans(groups, plans, 'desc', this.topK),
      plan_success_rates: computePlanSuccessRates(allRuns, plans),

      hourly_distribution: computeHourlyDistribution(completedRuns),
      daily_distribution: computeDailyDistribution(completedRuns),

      failure_analysis: analyzeFailures(failedRuns, plans),
      resource_usage: computeResourceUsage(completedRuns),
    };

    if (options.includeToolMetrics) {
      const tools = analyzeTools(completedRuns);
      report.tool_usage = tools.usage;
      report.tool_performance = tools.performance;
    }

    log.info(
      {
        window,
        totalRuns: report.total_runs,
        completedRuns: report.completed_runs,
        failedRuns: report.failed_runs,
        placeholderPlans: plans.placeholderCount,
      },
      'Window analyzed'
    );

    return report;
  }

  /**
   * Primary query: failures propagate.
   */
  private async fetchRuns(state: string, since: Date, until: Date): Promise<Run[]> {
    try {
      const runs = await this.source.listRuns({
        since,
        until,
        limit: this.fetchLimit,
        ...(state === 'all' ? {} : { state }),
      });
      log.debug({ state, count: runs.length }, 'Fetched runs');
      return runs;
    } catch (error) {
      throw new RunFetchError(state, error);
    }
  }

  /**
   * Secondary query: a failure degrades to no plans. The source may return
   * plans outside the window, so the closed range is applied here.
   */
  private async fetchPlansCreated(since: Date, until: Date): Promise<Plan[]> {
    try {
      const plans = await this.source.listPlans({ since, until, limit: this.fetchLimit });
      const inWindow = plans.filter(
        plan =>
          plan.createdAt.getTime() >= since.getTime() &&
          plan.createdAt.getTime() <= until.getTime()
      );
      log.debug({ fetched: plans.length, inWindow: inWindow.length }, 'Fetched plans');
      return inWindow;
    } catch (error) {
      log.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Failed to fetch plans created in window'
      );
      return [];
    }
  }
}
