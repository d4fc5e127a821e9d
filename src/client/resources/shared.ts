import { z } from 'zod';
import type { QueryParams } from '../types.js';

export type RequestFn = <T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params?: QueryParams
) => Promise<T>;

/**
 * List endpoints answer with a page envelope; a bare array is accepted too.
 */
export function pageOf<T>(
  item: z.ZodType<T, z.ZodTypeDef, unknown>
): z.ZodType<T[], z.ZodTypeDef, unknown> {
  return z.union([
    z.object({ results: z.array(item) }).transform(page => page.results),
    z.array(item),
  ]);
}
