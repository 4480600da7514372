/**
 * Image codec
 *
 * Turns uploaded image bytes into the canonical catalog form (fixed size,
 * gray or sRGB, JPEG, base64) and decodes stored canonical images for display.
 */

import sharp from "sharp";
import { DEFAULT_IMAGE_CONFIG, type ImageConfig } from "../config";
import { errorMessage, fail, ok, type Result } from "../errors";
import type { CanonicalImage, DisplayableImage } from "../types/search";
import { log } from "../utils/logger";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const MIME_TYPES: Record<string, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
  avif: "image/avif",
  tiff: "image/tiff",
};

// ---------------------------------------------------------------------------
// Upload → canonical
// ---------------------------------------------------------------------------

export async function normalizeForQuery(
  raw: Buffer,
  config: ImageConfig = DEFAULT_IMAGE_CONFIG
): Promise<Result<CanonicalImage>> {
  let meta: sharp.Metadata;
  try {
    meta = await sharp(raw).metadata();
  } catch (err) {
    return fail("DecodeError", `Failed to process image: ${errorMessage(err)}`, err);
  }

  const { width, height, channels, format } = meta;
  if (!width || !height || !channels || !format) {
    return fail("DecodeError", "Failed to process image: missing dimensions or format");
  }

  const oversized = width > config.maxDimension || height > config.maxDimension;
  if (oversized) {
    log.warn("image", `Image is too large (${width}x${height}). Resizing...`);
  }

  // Single-channel gray and three-channel colour pass through; anything else becomes sRGB
  let pipeline = sharp(raw);
  pipeline =
    channels === 1
      ? pipeline.toColourspace("b-w")
      : pipeline.removeAlpha().toColourspace("srgb");

  try {
    const { data, info } = await pipeline
      .resize(config.size, config.size, { fit: "fill" })
      .jpeg({ quality: config.quality })
      .toBuffer({ resolveWithObject: true });

    log.image(`Normalised ${format} ${width}x${height} to ${info.width}x${info.height} jpeg`, {
      bytes: data.length,
    });
    return ok({
      base64: data.toString("base64"),
      width: info.width,
      height: info.height,
      oversized,
      source: { width, height, channels, format },
    });
  } catch (err) {
    return fail("DecodeError", `Failed to process image: ${errorMessage(err)}`, err);
  }
}

// ---------------------------------------------------------------------------
// Stored canonical → displayable
// ---------------------------------------------------------------------------

export async function decodeForDisplay(encoded: string): Promise<Result<DisplayableImage>> {
  const compact = encoded.replace(/\s+/g, "");
  if (!compact || !BASE64_PATTERN.test(compact)) {
    return fail("DecodeError", "Failed to decode image: not valid base64");
  }

  const data = Buffer.from(compact, "base64");
  let meta: sharp.Metadata;
  try {
    meta = await sharp(data).metadata();
  } catch (err) {
    return fail("DecodeError", `Failed to decode image: ${errorMessage(err)}`, err);
  }

  const mimeType = meta.format ? MIME_TYPES[meta.format] : undefined;
  if (!mimeType || !meta.width || !meta.height) {
    return fail("DecodeError", `Failed to decode image: unsupported format ${meta.format ?? "unknown"}`);
  }

  return ok({
    data,
    mimeType,
    width: meta.width,
    height: meta.height,
    dataUrl: `data:${mimeType};base64,${compact}`,
  });
}
