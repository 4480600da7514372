/** Named embedding spaces on the catalog collection. */
export type VectorSpace = "text_vector" | "image_vector";

export type Modality = "text" | "image";

/** Catalog properties stored on every food object. */
export type FoodProperties = {
  name: string;
  description: string;
  price: number;
  calories: number;
  image: string; // canonical base64 JPEG
};

/** A ranked search hit: catalog properties plus backend similarity metadata. */
export interface FoodItem extends FoodProperties {
  distance?: number; // lower = closer
  certainty?: number; // 0..1, higher = closer
}

export interface TextQuery {
  kind: "text";
  text: string;
  limit: number;
}

export interface ImageQuery {
  kind: "image";
  image: string;
  limit: number;
}

export type SearchQuery = TextQuery | ImageQuery;

export interface SearchResult {
  modality: Modality;
  targetVector: VectorSpace;
  items: readonly FoodItem[]; // backend ranking order
}

export type NearQueryRequest = (
  | { modality: "text"; text: string }
  | { modality: "image"; image: string }
) & {
  targetVector: VectorSpace;
  limit: number;
  returnProperties: readonly (keyof FoodProperties)[];
  returnMetadata: readonly ("distance" | "certainty")[];
};

/**
 * A live session with the vector-search backend. Safe for concurrent queries.
 */
export interface SearchBackend {
  isReady(): Promise<boolean>;
  nearQuery(request: NearQueryRequest): Promise<FoodItem[]>;
  close(): Promise<void>;
}

export interface CanonicalImage {
  base64: string;
  width: number;
  height: number;
  /** Either source dimension was above the oversize threshold */
  oversized: boolean;
  source: { width: number; height: number; channels: number; format: string };
}

export interface DisplayableImage {
  data: Buffer;
  mimeType: string;
  width: number;
  height: number;
  dataUrl: string;
}
