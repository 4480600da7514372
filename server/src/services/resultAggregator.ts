import { DEFAULT_SEARCH_CONFIG } from "../config";

export interface PartitionedResults<T> {
  top: T[];
  others: T[][];
}

/**
 * Split ranked results into a top band and fixed-size rows for the rest.
 * Order is preserved and the input is left untouched.
 */
export function partition<T>(
  results: readonly T[],
  topN: number,
  rowSize: number = DEFAULT_SEARCH_CONFIG.rowSize
): PartitionedResults<T> {
  if (!Number.isInteger(topN) || topN < 0) {
    throw new RangeError(`topN must be a non-negative integer, got ${topN}`);
  }
  if (!Number.isInteger(rowSize) || rowSize < 1) {
    throw new RangeError(`rowSize must be a positive integer, got ${rowSize}`);
  }

  const top = results.slice(0, topN);
  const remaining = results.slice(topN);

  const others: T[][] = [];
  for (let start = 0; start < remaining.length; start += rowSize) {
    others.push(remaining.slice(start, start + rowSize));
  }

  return { top, others };
}
