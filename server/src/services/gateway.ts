/**
 * Search gateway: the full request path for both modalities,
 * normalise input → dispatch to the matching embedding space → partition.
 */

import { DEFAULT_IMAGE_CONFIG, DEFAULT_SEARCH_CONFIG, type ImageConfig } from "../config";
import { fail, ok, type Result } from "../errors";
import type { FoodItem, Modality, VectorSpace } from "../types/search";
import type { ConnectionProvider } from "../weaviate";
import { normalizeForQuery } from "./imageCodec";
import { partition } from "./resultAggregator";
import { imageQuery, search, textQuery } from "./search";

export interface GatewayOptions {
  limit?: number;
  topN?: number;
  rowSize?: number;
}

export interface GatewayResponse {
  modality: Modality;
  targetVector: VectorSpace;
  total: number;
  top: FoodItem[];
  others: FoodItem[][];
  warnings: string[];
}

function shape(
  modality: Modality,
  targetVector: VectorSpace,
  items: readonly FoodItem[],
  options: GatewayOptions,
  warnings: string[]
): GatewayResponse {
  const { top, others } = partition(
    items,
    options.topN ?? DEFAULT_SEARCH_CONFIG.topResults,
    options.rowSize ?? DEFAULT_SEARCH_CONFIG.rowSize
  );
  return { modality, targetVector, total: items.length, top, others, warnings };
}

export async function searchFoodsByText(
  connections: ConnectionProvider,
  text: string,
  options: GatewayOptions = {}
): Promise<Result<GatewayResponse>> {
  const result = await search(connections, textQuery(text, options.limit ?? DEFAULT_SEARCH_CONFIG.limit));
  if (!result.ok) return result;
  return ok(shape(result.value.modality, result.value.targetVector, result.value.items, options, []));
}

export async function searchFoodsByImage(
  connections: ConnectionProvider,
  upload: Buffer,
  options: GatewayOptions & { image?: ImageConfig } = {}
): Promise<Result<GatewayResponse>> {
  if (upload.length === 0) {
    return fail("InvalidQuery", "Upload an image to search");
  }

  const imageConfig = options.image ?? DEFAULT_IMAGE_CONFIG;
  const canonical = await normalizeForQuery(upload, imageConfig);
  if (!canonical.ok) return canonical;

  const warnings = canonical.value.oversized
    ? [
        `Image is larger than ${imageConfig.maxDimension}px and was resized to ` +
          `${canonical.value.width}x${canonical.value.height}`,
      ]
    : [];

  const result = await search(
    connections,
    imageQuery(canonical.value.base64, options.limit ?? DEFAULT_SEARCH_CONFIG.limit)
  );
  if (!result.ok) return result;
  return ok(shape(result.value.modality, result.value.targetVector, result.value.items, options, warnings));
}
