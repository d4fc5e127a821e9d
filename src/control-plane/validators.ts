import { z, type ZodError } from 'zod';

/**
 * Validation result type.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Convert Zod errors to our ValidationError format.
 */
function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Generic validation function for Zod schemas.
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodErrors(result.error) };
}

/**
 * Validate and throw on error.
 */
export function validateOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = validate(schema, data);

  if (!result.success) {
    const errorMessages = result.errors
      .map(e => `${e.path ? `${e.path}: ` : ''}${e.message}`)
      .join('; ');
    throw new Error(`Validation failed: ${errorMessages}`);
  }

  return result.data;
}

const limitSchema = z.coerce.number().int().positive().max(1000).default(10);

/**
 * Schema for `plans list` options.
 */
export const planListOptionsSchema = z.object({
  limit: limitSchema,
  json: z.boolean().default(false),
});

export type PlanListOptions = z.infer<typeof planListOptionsSchema>;

/**
 * Schema for `plan-runs list` options.
 */
export const runListOptionsSchema = z.object({
  planId: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  limit: limitSchema,
  since: z.string().optional(),
  json: z.boolean().default(false),
});

export type RunListOptions = z.infer<typeof runListOptionsSchema>;

/**
 * Window selection shared by analyze, summarize and preview-mail.
 */
export const windowOptionsSchema = z.object({
  today: z.boolean().default(false),
  yesterday: z.boolean().default(false),
  since: z.string().optional(),
  until: z.string().optional(),
  withTools: z.boolean().default(false),
});

export const analyzeOptionsSchema = windowOptionsSchema.extend({
  json: z.boolean().default(false),
});

export type AnalyzeCommandOptions = z.infer<typeof analyzeOptionsSchema>;

export const summarizeOptionsSchema = windowOptionsSchema.extend({
  jsonOnly: z.boolean().default(false),
});

export type SummarizeCommandOptions = z.infer<typeof summarizeOptionsSchema>;

export const previewMailOptionsSchema = windowOptionsSchema;

export type PreviewMailCommandOptions = z.infer<typeof previewMailOptionsSchema>;

/**
 * Plan and run identifiers.
 */
export const recordIdSchema = z.string().trim().min(1, 'ID is required');
