import { DEFAULT_SEARCH_CONFIG } from "../config";
import { errorMessage, fail, ok, type Result } from "../errors";
import type {
  FoodProperties,
  ImageQuery,
  NearQueryRequest,
  SearchQuery,
  SearchResult,
  TextQuery,
  VectorSpace,
} from "../types/search";
import { log } from "../utils/logger";
import type { ConnectionProvider } from "../weaviate";

export const MIN_QUERY_LENGTH = 2;

const RETURN_PROPERTIES: readonly (keyof FoodProperties)[] = [
  "name",
  "description",
  "price",
  "calories",
  "image",
];
const RETURN_METADATA = ["distance", "certainty"] as const;

export function textQuery(text: string, limit: number = DEFAULT_SEARCH_CONFIG.limit): TextQuery {
  return { kind: "text", text, limit };
}

export function imageQuery(image: string, limit: number = DEFAULT_SEARCH_CONFIG.limit): ImageQuery {
  return { kind: "image", image, limit };
}

/** Text and image embeddings live in separate, non-comparable spaces. */
export function targetVectorFor(query: SearchQuery): VectorSpace {
  switch (query.kind) {
    case "text":
      return "text_vector";
    case "image":
      return "image_vector";
    default: {
      const unreachable: never = query;
      throw new Error(`Unknown query kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

function validate(query: SearchQuery): Result<NearQueryRequest> {
  if (!Number.isInteger(query.limit) || query.limit < 1) {
    return fail("InvalidQuery", "Result limit must be a positive integer");
  }

  const shared = {
    targetVector: targetVectorFor(query),
    limit: query.limit,
    returnProperties: RETURN_PROPERTIES,
    returnMetadata: RETURN_METADATA,
  };

  switch (query.kind) {
    case "text": {
      const text = query.text.trim();
      if (text.length < MIN_QUERY_LENGTH) {
        return fail("InvalidQuery", `Please enter at least ${MIN_QUERY_LENGTH} characters`);
      }
      return ok<NearQueryRequest>({ ...shared, modality: "text", text });
    }
    case "image":
      if (!query.image) {
        return fail("InvalidQuery", "Invalid image data");
      }
      return ok<NearQueryRequest>({ ...shared, modality: "image", image: query.image });
  }
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/**
 * Run a similarity query against the embedding space of its modality.
 * Items come back in backend ranking order; zero matches is a success.
 */
export async function search(
  connections: ConnectionProvider,
  query: SearchQuery
): Promise<Result<SearchResult>> {
  const validated = validate(query);
  if (!validated.ok) return validated;
  const request = validated.value;

  const connection = await connections.getConnection();
  if (!connection.ok) return connection;

  log.search(`near${request.modality === "text" ? "Text" : "Image"}`, {
    targetVector: request.targetVector,
    limit: request.limit,
  });

  try {
    const items = await connection.value.nearQuery(request);
    log.search(`${items.length} match(es)`, { targetVector: request.targetVector });
    return ok({ modality: request.modality, targetVector: request.targetVector, items });
  } catch (err) {
    const label = request.modality === "text" ? "Search" : "Image search";
    log.error("search", `${label} failed`, err);
    return fail("SearchFailed", `${label} failed: ${errorMessage(err)}`, err);
  }
}
