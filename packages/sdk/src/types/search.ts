import { z } from 'zod';

export type SearchOperator = 'eq';

export interface SearchFilter {
  data: Array<string | number | boolean>;
  operator: SearchOperator;
}

/**
 * Body of `POST /v1/transactions/search`.
 * Filter keys are Knox field paths, e.g. `transaction_metadata_batch_id`.
 */
export interface SearchTransactionsRequest {
  filters: Record<string, SearchFilter>;
  pagination?: {
    limit: number;
  };
}

/** Records carry at least their transaction id; everything else passes through */
export const searchRecordSchema = z
  .object({
    transaction_id: z.string(),
  })
  .passthrough();

export const searchTransactionsResponseSchema = z
  .object({
    data: z.array(searchRecordSchema).nullish(),
  })
  .passthrough();

export type SearchRecord = z.infer<typeof searchRecordSchema>;

export interface SearchTransactionsResponse {
  data: SearchRecord[];
}

/** Shorthand for an `eq` filter */
export function eq(...values: Array<string | number | boolean>): SearchFilter {
  return { data: values, operator: 'eq' };
}
