import { z } from "zod";

const MAX_LIMIT = 100;
const MAX_TOP_N = 20;

/** Validates the body of POST /search/text */
export const textSearchSchema = z.object({
  // length rules belong to the dispatcher so they surface as InvalidQuery
  query: z.string({ required_error: "query is required" }),
  limit: z.number().int().min(1).max(MAX_LIMIT).optional(),
  topN: z.number().int().min(0).max(MAX_TOP_N).optional(),
});

/** Validates the query string of POST /search/image */
export const imageSearchParamsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).optional(),
  topN: z.coerce.number().int().min(0).max(MAX_TOP_N).optional(),
});
