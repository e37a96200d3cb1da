import { z } from "zod";

/**
 * Pagination metadata. Unknown fields are kept.
 */
export const paginationSchema = z
  .object({
    total: z.number().int().nonnegative(),
    page: z.number().int().positive(),
    limit: z.number().int().positive(),
  })
  .passthrough();

/**
 * `{ data: [...], pagination: {...} }` envelope of list endpoints. Items are
 * decoded separately by the caller's item decoder.
 */
export const paginatedResponseSchema = z
  .object({
    data: z.array(z.unknown()),
    pagination: paginationSchema,
  })
  .passthrough();

export const operationStateSchema = z.enum([
  "ENQUEUED",
  "PROCESSING",
  "SUCCESS",
  "ERROR",
]);

/**
 * Status snapshot of an asynchronous operation, with the result payload
 * validated by `data`.
 */
export function operationStatusSchema<TData extends z.ZodTypeAny>(data: TData) {
  return z
    .object({
      operationId: z.string().min(1),
      status: operationStateSchema,
      progress: z.number().min(0).max(100).optional(),
      data: data.optional(),
      error: z.string().optional(),
    })
    .passthrough();
}
