import type { FoodItem } from "../types/search";
import { log } from "../utils/logger";
import { decodeForDisplay } from "./imageCodec";

export interface FoodCardImage {
  mimeType: string;
  width: number;
  height: number;
  dataUrl: string;
}

export interface FoodCard {
  name: string;
  description: string;
  priceLabel: string;
  caloriesLabel: string;
  matchLabel: string | null;
  distance: number | null;
  certainty: number | null;
  image: FoodCardImage | null;
}

export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

export function formatMatch(certainty: number): string {
  return `Match: ${(certainty * 100).toFixed(1)}%`;
}

/**
 * Shape one search hit for display. A stored image that fails to decode is
 * dropped from the card; the rest of the card still renders.
 */
export async function toFoodCard(item: FoodItem): Promise<FoodCard> {
  let image: FoodCardImage | null = null;
  if (item.image) {
    const decoded = await decodeForDisplay(item.image);
    if (decoded.ok) {
      const { mimeType, width, height, dataUrl } = decoded.value;
      image = { mimeType, width, height, dataUrl };
    } else {
      log.warn("image", `${decoded.error.message} (item "${item.name}")`);
    }
  }

  return {
    name: item.name || "Unknown",
    description: item.description || "No description available",
    priceLabel: formatPrice(item.price),
    caloriesLabel: `${item.calories} kcal`,
    matchLabel: item.certainty !== undefined ? formatMatch(item.certainty) : null,
    distance: item.distance ?? null,
    certainty: item.certainty ?? null,
    image,
  };
}
