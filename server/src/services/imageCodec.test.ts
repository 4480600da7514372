import sharp from "sharp";
import { afterEach, describe, expect, it, vi } from "vitest";
import { decodeForDisplay, normalizeForQuery } from "./imageCodec";

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

function solid(width: number, height: number, channels: 3 | 4) {
  return sharp({
    create: { width, height, channels, background: { r: 200, g: 120, b: 40, alpha: 0.5 } },
  });
}

describe("normalizeForQuery", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs the conversion under the image tag", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const png = await solid(640, 480, 3).png().toBuffer();

    await normalizeForQuery(png);

    const lines = logSpy.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.endsWith("[IMAGE] Normalised png 640x480 to 400x400 jpeg"))).toBe(true);
  });

  it("resizes colour images to 400x400 JPEG base64", async () => {
    const png = await solid(640, 480, 3).png().toBuffer();

    const result = await normalizeForQuery(png);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      width: 400,
      height: 400,
      oversized: false,
      source: { width: 640, height: 480, channels: 3, format: "png" },
    });
    expect(result.value.base64).toMatch(BASE64);

    const meta = await sharp(Buffer.from(result.value.base64, "base64")).metadata();
    expect(meta).toMatchObject({ format: "jpeg", width: 400, height: 400, channels: 3 });
  });

  it("drops alpha so RGBA input becomes three-channel colour", async () => {
    const png = await solid(120, 300, 4).png().toBuffer();

    const result = await normalizeForQuery(png);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const meta = await sharp(Buffer.from(result.value.base64, "base64")).metadata();
    expect(meta).toMatchObject({ width: 400, height: 400, channels: 3 });
  });

  it("keeps grayscale input single-channel", async () => {
    const gray = await solid(50, 50, 3).greyscale().toColourspace("b-w").png().toBuffer();

    const result = await normalizeForQuery(gray);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const meta = await sharp(Buffer.from(result.value.base64, "base64")).metadata();
    expect(meta).toMatchObject({ width: 400, height: 400, channels: 1 });
  });

  it("flags images over the size threshold but still resizes them", async () => {
    const wide = await solid(5001, 8, 3).png().toBuffer();

    const result = await normalizeForQuery(wide);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.oversized).toBe(true);
    expect(result.value.width).toBe(400);
    expect(result.value.height).toBe(400);
  });

  it("applies a configured canonical size and threshold", async () => {
    const png = await solid(300, 200, 3).png().toBuffer();

    const result = await normalizeForQuery(png, { size: 64, quality: 70, maxDimension: 250 });

    expect(result.ok && result.value).toMatchObject({ width: 64, height: 64, oversized: true });
  });

  it("fails with DecodeError on bytes that are not an image", async () => {
    const result = await normalizeForQuery(Buffer.from("definitely not an image"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("DecodeError");
      expect(result.error.message).toMatch(/^Failed to process image: /);
    }
  });
});

describe("decodeForDisplay", () => {
  it("round-trips a canonical image at the canonical resolution", async () => {
    const png = await solid(900, 700, 3).png().toBuffer();
    const canonical = await normalizeForQuery(png);
    expect(canonical.ok).toBe(true);
    if (!canonical.ok) return;

    const decoded = await decodeForDisplay(canonical.value.base64);

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value.mimeType).toBe("image/jpeg");
    expect(decoded.value.width).toBe(400);
    expect(decoded.value.height).toBe(400);
    expect(decoded.value.dataUrl).toBe(`data:image/jpeg;base64,${canonical.value.base64}`);
    expect(decoded.value.data.equals(Buffer.from(canonical.value.base64, "base64"))).toBe(true);
  });

  it("rejects strings that are not base64", async () => {
    for (const input of ["", "not base64!", "abc"]) {
      const result = await decodeForDisplay(input);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe("Failed to decode image: not valid base64");
    }
  });

  it("rejects valid base64 that does not hold an image", async () => {
    const result = await decodeForDisplay(Buffer.from("plain text payload").toString("base64"));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("DecodeError");
  });
});
