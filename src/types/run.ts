import { z } from 'zod';
import { timestampSchema } from './timestamp.js';

// Run State (platform states, lowercased at ingestion)
export const RunState = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETE: 'complete',
  FAILED: 'failed',
} as const;

export type RunState = (typeof RunState)[keyof typeof RunState];

/**
 * Terminal success. Platform-defined states the engine does not know are
 * neither success nor failure.
 */
export function isSuccessState(state: string): boolean {
  return state === RunState.COMPLETE;
}

export function isFailureState(state: string): boolean {
  return state === RunState.FAILED;
}

// Run
export interface Run {
  id: string;
  planId: string;
  /** Lowercased platform state; see {@link RunState} for the known values */
  state: string;
  createdAt: Date;
  completedAt: Date | null;
  durationMs: number | null;
  /** Open metadata map; may carry `error` and `tools_used` */
  metadata: Record<string, unknown>;
}

// Tool Invocation (validated entry from metadata.tools_used)
export interface ToolInvocation {
  name: string;
  success: boolean;
  durationMs: number | null;
}

// ============================================================================
// Wire Schemas
// ============================================================================

/**
 * Plan run as returned by the platform API.
 */
export const runRecordSchema = z
  .object({
    id: z.string().min(1),
    plan_id: z.string().min(1),
    state: z.string().min(1),
    created_at: timestampSchema,
    completed_at: timestampSchema.nullish(),
    duration_ms: z.number().int().nonnegative().nullish(),
    metadata: z.record(z.unknown()).nullish(),
  })
  .transform(
    (record): Run => ({
      id: record.id,
      planId: record.plan_id,
      state: record.state.toLowerCase(),
      createdAt: record.created_at,
      completedAt: record.completed_at ?? null,
      durationMs: record.duration_ms ?? null,
      metadata: record.metadata ?? {},
    })
  );

export type RunRecord = z.input<typeof runRecordSchema>;

/**
 * One entry of `metadata.tools_used`.
 */
export const toolInvocationSchema = z
  .object({
    name: z.string().min(1),
    success: z.boolean().optional(),
    duration_ms: z.number().finite().nonnegative().nullish(),
  })
  .transform(
    (entry): ToolInvocation => ({
      name: entry.name,
      success: entry.success ?? true,
      durationMs: entry.duration_ms ?? null,
    })
  );
