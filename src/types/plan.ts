import { z } from 'zod';
import { timestampSchema } from './timestamp.js';

// Plan
export interface Plan {
  id: string;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Display-only stand-in for a plan that could not be resolved.
 * Never persisted and never merged into a fetched plan collection.
 */
export interface PlaceholderPlan extends Plan {
  placeholder: true;
}

/**
 * Plan as returned by the platform API.
 */
export const planRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    description: z.string().nullish(),
    created_at: timestampSchema,
    updated_at: timestampSchema,
  })
  .transform(
    (record): Plan => ({
      id: record.id,
      name: record.name,
      description: record.description ?? null,
      createdAt: record.created_at,
      updatedAt: record.updated_at,
    })
  );

export type PlanRecord = z.input<typeof planRecordSchema>;
