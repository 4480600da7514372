import weaviate, { type WeaviateClient } from "weaviate-client";
import type { BackendConfig } from "./config";
import { errorMessage, fail, ok, type Result } from "./errors";
import type {
  FoodItem,
  FoodProperties,
  NearQueryRequest,
  SearchBackend,
  VectorSpace,
} from "./types/search";
import { log } from "./utils/logger";

export type BackendConnector = () => Promise<SearchBackend>;

export interface ConnectionProvider {
  getConnection(): Promise<Result<SearchBackend>>;
}

// ---------------------------------------------------------------------------
// Weaviate adapter
// ---------------------------------------------------------------------------

type Nullable<T> = { [K in keyof T]?: T[K] | null };

export interface WeaviateHit {
  properties: Nullable<FoodProperties>;
  metadata?: { distance?: number; certainty?: number };
}

export interface NearOptions {
  limit: number;
  targetVector: VectorSpace;
  returnProperties: (keyof FoodProperties)[];
  returnMetadata: ("distance" | "certainty")[];
}

/** The slice of a Weaviate client the backend uses, bound to the foods collection. */
export interface WeaviateSession {
  isReady(): Promise<boolean>;
  close(): Promise<void>;
  nearText(text: string, options: NearOptions): Promise<{ objects: WeaviateHit[] }>;
  nearImage(image: string, options: NearOptions): Promise<{ objects: WeaviateHit[] }>;
}

function toFoodItem(hit: WeaviateHit): FoodItem {
  const p = hit.properties;
  return {
    name: p.name ?? "",
    description: p.description ?? "",
    price: p.price ?? 0,
    calories: p.calories ?? 0,
    image: p.image ?? "",
    distance: hit.metadata?.distance,
    certainty: hit.metadata?.certainty,
  };
}

export function openSession(client: WeaviateClient, collectionName: string): WeaviateSession {
  const foods = () => client.collections.get<FoodProperties>(collectionName).query;
  return {
    isReady: () => client.isReady(),
    close: () => client.close(),
    nearText: (text, options) => foods().nearText(text, options),
    nearImage: (image, options) => foods().nearImage(image, options),
  };
}

/** Expose a Weaviate session as a SearchBackend. */
export function createWeaviateBackend(session: WeaviateSession): SearchBackend {
  return {
    isReady: () => session.isReady(),

    async nearQuery(request: NearQueryRequest): Promise<FoodItem[]> {
      const options: NearOptions = {
        limit: request.limit,
        targetVector: request.targetVector,
        returnProperties: [...request.returnProperties],
        returnMetadata: [...request.returnMetadata],
      };

      const response =
        request.modality === "text"
          ? await session.nearText(request.text, options)
          : await session.nearImage(request.image, options);

      return response.objects.map(toFoodItem);
    },

    close: () => session.close(),
  };
}

/** Connector that opens a local Weaviate session with the Cohere credential attached. */
export function weaviateConnector(config: BackendConfig): BackendConnector {
  return async () => {
    const client = await weaviate.connectToLocal({
      host: config.host,
      port: config.port,
      grpcPort: config.grpcPort,
      headers: { "X-Cohere-Api-Key": config.cohereApiKey },
    });
    return createWeaviateBackend(openSession(client, config.collection));
  };
}

// ---------------------------------------------------------------------------
// Connection manager: one verified handle per process
// ---------------------------------------------------------------------------

export class ConnectionManager implements ConnectionProvider {
  private handle: SearchBackend | null = null;
  private pending: Promise<SearchBackend> | null = null;

  constructor(private readonly connect: BackendConnector) {}

  /**
   * Return the cached handle, creating and verifying it on first use.
   * Concurrent first callers share one creation attempt. A failed attempt is
   * not cached; the next call starts over.
   */
  async getConnection(): Promise<Result<SearchBackend>> {
    if (this.handle) return ok(this.handle);

    if (!this.pending) {
      this.pending = this.establish().finally(() => {
        this.pending = null;
      });
    }

    try {
      return ok(await this.pending);
    } catch (err) {
      return fail("BackendUnavailable", `Failed to connect to Weaviate: ${errorMessage(err)}`, err);
    }
  }

  /** Readiness of the cached handle; false when none exists yet. */
  async isReady(): Promise<boolean> {
    if (!this.handle) return false;
    try {
      return await this.handle.isReady();
    } catch (err) {
      log.warn("weaviate", "Readiness probe failed", errorMessage(err));
      return false;
    }
  }

  async disconnect(): Promise<void> {
    // Let an in-flight creation settle so its session is closed too
    if (this.pending) {
      await this.pending.catch((err) =>
        log.warn("weaviate", "Pending connection failed during disconnect", errorMessage(err))
      );
    }
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
      log.weaviate("Disconnected from Weaviate");
    }
  }

  private async establish(): Promise<SearchBackend> {
    const backend = await this.connect();

    let ready: boolean;
    try {
      ready = await backend.isReady();
    } catch (err) {
      await this.discard(backend);
      throw err;
    }

    if (!ready) {
      await this.discard(backend);
      throw new Error("Weaviate is not ready");
    }

    this.handle = backend;
    log.weaviate("Connected to Weaviate");
    return backend;
  }

  private async discard(backend: SearchBackend): Promise<void> {
    try {
      await backend.close();
    } catch (err) {
      log.warn("weaviate", "Failed to close rejected client", errorMessage(err));
    }
  }
}
