import { Request, Response, NextFunction } from "express";
import type { AppConfig } from "../config";
import { toFoodCard, type FoodCard } from "../services/foodCard";
import { searchFoodsByImage, searchFoodsByText, type GatewayResponse } from "../services/gateway";
import { imageSearchParamsSchema, textSearchSchema } from "../validation/search";
import type { ConnectionProvider } from "../weaviate";

export interface SearchResponseBody {
  modality: GatewayResponse["modality"];
  targetVector: GatewayResponse["targetVector"];
  total: number;
  headline: string | null;
  message: string | null;
  warnings: string[];
  top: FoodCard[];
  others: FoodCard[][];
}

function messageFor(result: GatewayResponse): string | null {
  if (result.modality === "text") {
    return result.total === 0 ? "No results found. Try different keywords." : null;
  }
  return result.total === 0 ? "No similar foods found." : `Found ${result.total} similar dishes!`;
}

async function present(result: GatewayResponse): Promise<SearchResponseBody> {
  const [top, others] = await Promise.all([
    Promise.all(result.top.map(toFoodCard)),
    Promise.all(result.others.map((row) => Promise.all(row.map(toFoodCard)))),
  ]);

  return {
    modality: result.modality,
    targetVector: result.targetVector,
    total: result.total,
    headline: result.top.length > 0 ? `Top ${result.top.length} Matches` : null,
    message: messageFor(result),
    warnings: result.warnings,
    top,
    others,
  };
}

export function createSearchController(connections: ConnectionProvider, config: AppConfig) {
  const layout = { rowSize: config.search.rowSize };

  return {
    // POST /search/text — similarity search in the text embedding space
    async searchByText(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body = textSearchSchema.parse(req.body);
        const result = await searchFoodsByText(connections, body.query, {
          ...layout,
          limit: body.limit ?? config.search.limit,
          topN: body.topN ?? config.search.topResults,
        });
        if (!result.ok) throw result.error;
        res.json({ success: true, data: await present(result.value) });
      } catch (err) {
        next(err);
      }
    },

    // POST /search/image — raw image/* body, searched in the image embedding space
    async searchByImage(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const params = imageSearchParamsSchema.parse(req.query);
        const upload = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        const result = await searchFoodsByImage(connections, upload, {
          ...layout,
          image: config.image,
          limit: params.limit ?? config.search.limit,
          topN: params.topN ?? config.search.topResults,
        });
        if (!result.ok) throw result.error;
        res.json({ success: true, data: await present(result.value) });
      } catch (err) {
        next(err);
      }
    },
  };
}

export type SearchController = ReturnType<typeof createSearchController>;
