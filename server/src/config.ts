import { z } from "zod";
import { log } from "./utils/logger";

export interface BackendConfig {
  host: string;
  port: number;
  grpcPort: number;
  cohereApiKey: string;
  collection: string;
}

export interface ImageConfig {
  size: number;
  quality: number;
  maxDimension: number;
}

export interface SearchConfig {
  limit: number;
  topResults: number;
  rowSize: number;
}

export interface AppConfig {
  port: number;
  uploadLimit: string;
  backend: BackendConfig;
  image: ImageConfig;
  search: SearchConfig;
}

/** Policy defaults; the environment overrides them. */
export const DEFAULT_IMAGE_CONFIG: ImageConfig = {
  size: 400,
  quality: 85,
  maxDimension: 5000,
};

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  limit: 10,
  topResults: 3,
  rowSize: 3,
};

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  WEAVIATE_HOST: z.string().min(1).default("localhost"),
  WEAVIATE_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  WEAVIATE_GRPC_PORT: z.coerce.number().int().min(1).max(65535).default(50051),
  COHERE_API_KEY: z.string().default(""),
  COLLECTION_NAME: z.string().min(1).default("FoodsMultiModal"),
  SEARCH_LIMIT: z.coerce.number().int().min(1).max(100).default(DEFAULT_SEARCH_CONFIG.limit),
  TOP_RESULTS: z.coerce.number().int().min(0).max(20).default(DEFAULT_SEARCH_CONFIG.topResults),
  RESULT_ROW_SIZE: z.coerce.number().int().min(1).max(12).default(DEFAULT_SEARCH_CONFIG.rowSize),
  IMAGE_SIZE: z.coerce.number().int().min(16).max(4096).default(DEFAULT_IMAGE_CONFIG.size),
  IMAGE_QUALITY: z.coerce.number().int().min(1).max(100).default(DEFAULT_IMAGE_CONFIG.quality),
  IMAGE_MAX_DIMENSION: z.coerce.number().int().min(1).default(DEFAULT_IMAGE_CONFIG.maxDimension),
  UPLOAD_LIMIT: z.string().min(1).default("10mb"),
});

/**
 * Read and validate process configuration. Throws a ZodError listing every
 * offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings in .env files mean "unset"
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.parse(present);

  if (!parsed.COHERE_API_KEY) {
    log.warn("config", "COHERE_API_KEY is not set; Weaviate cannot vectorise queries");
  }

  return {
    port: parsed.PORT,
    uploadLimit: parsed.UPLOAD_LIMIT,
    backend: {
      host: parsed.WEAVIATE_HOST,
      port: parsed.WEAVIATE_PORT,
      grpcPort: parsed.WEAVIATE_GRPC_PORT,
      cohereApiKey: parsed.COHERE_API_KEY,
      collection: parsed.COLLECTION_NAME,
    },
    image: {
      size: parsed.IMAGE_SIZE,
      quality: parsed.IMAGE_QUALITY,
      maxDimension: parsed.IMAGE_MAX_DIMENSION,
    },
    search: {
      limit: parsed.SEARCH_LIMIT,
      topResults: parsed.TOP_RESULTS,
      rowSize: parsed.RESULT_ROW_SIZE,
    },
  };
}
