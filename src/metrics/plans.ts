/**
 * Plan resolution for display names.
 */

import type { Plan, PlaceholderPlan } from '../types/index.js';
import type { RecordSource } from '../source/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('metrics:plans');

const PLACEHOLDER_ID_LENGTH = 8;

/**
 * Stand-in for a plan that is missing or could not be fetched.
 */
export function createPlaceholderPlan(id: string, now: Date): PlaceholderPlan {
  return {
    id,
    name: `Plan ${id.slice(0, PLACEHOLDER_ID_LENGTH)}`,
    description: null,
    createdAt: now,
    updatedAt: now,
    placeholder: true,
  };
}

export function isPlaceholderPlan(plan: Plan): plan is PlaceholderPlan {
  return 'placeholder' in plan && plan.placeholder === true;
}

/**
 * Plans referenced by one analysis, keyed by ID. Every lookup resolves:
 * unknown IDs get a placeholder.
 */
export class PlanDirectory {
  private readonly plans = new Map<string, Plan>();

  constructor(
    plans: Iterable<Plan>,
    private readonly now: Date
  ) {
    for (const plan of plans) {
      this.plans.set(plan.id, plan);
    }
  }

  /**
   * Look up each ID one at a time. A failed or empty lookup only affects
   * that ID.
   */
  static async load(
    source: RecordSource,
    ids: Iterable<string>,
    now: Date
  ): Promise<PlanDirectory> {
    const directory = new PlanDirectory([], now);

    for (const id of ids) {
      try {
        const plan = await source.getPlan(id);
        directory.plans.set(id, plan ?? createPlaceholderPlan(id, now));
        if (!plan) {
          log.debug({ planId: id }, 'Plan not found, using placeholder');
        }
      } catch (error) {
        log.warn(
          { planId: id, error: error instanceof Error ? error.message : String(error) },
          'Plan lookup failed, using placeholder'
        );
        directory.plans.set(id, createPlaceholderPlan(id, now));
      }
    }

    return directory;
  }

  resolve(id: string): Plan {
    const known = this.plans.get(id);
    if (known) {
      return known;
    }
    const placeholder = createPlaceholderPlan(id, this.now);
    this.plans.set(id, placeholder);
    return placeholder;
  }

  nameOf(id: string): string {
    return this.resolve(id).name;
  }

  get placeholderCount(): number {
    let count = 0;
    for (const plan of this.plans.values()) {
      if (isPlaceholderPlan(plan)) count++;
    }
    return count;
  }
}
