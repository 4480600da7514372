import { describe, expect, it, vi } from "vitest";
import { DEFAULT_SEARCH_CONFIG } from "../config";
import { ok, type Result } from "../errors";
import { FakeBackend, foods } from "../test/fakeBackend";
import type { SearchBackend } from "../types/search";
import { searchFoodsByImage, searchFoodsByText } from "./gateway";

function connected(backend: FakeBackend) {
  return { getConnection: vi.fn(async (): Promise<Result<SearchBackend>> => ok(backend)) };
}

describe("searchFoodsByText", () => {
  it("returns top three and remaining rows for seven matches", async () => {
    const backend = new FakeBackend(foods(7));

    const result = await searchFoodsByText(connected(backend), "pizza", { limit: 10, topN: 3 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const all = foods(7);
    expect(result.value.top).toEqual(all.slice(0, 3));
    expect(result.value.others).toEqual([all.slice(3, 6), all.slice(6)]);
    expect(result.value.total).toBe(7);
    expect(backend.requests[0].limit).toBe(10);
  });

  it("falls back to the configured search defaults", async () => {
    const backend = new FakeBackend(foods(12));

    const result = await searchFoodsByText(connected(backend), "pasta");

    expect(backend.requests[0].limit).toBe(DEFAULT_SEARCH_CONFIG.limit);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.total).toBe(DEFAULT_SEARCH_CONFIG.limit);
    expect(result.value.top).toHaveLength(DEFAULT_SEARCH_CONFIG.topResults);
    expect(result.value.others[0]).toHaveLength(DEFAULT_SEARCH_CONFIG.rowSize);
  });

  it("turns zero matches into empty bands", async () => {
    const result = await searchFoodsByText(connected(new FakeBackend([])), "pizza");

    expect(result).toEqual({
      ok: true,
      value: {
        modality: "text",
        targetVector: "text_vector",
        total: 0,
        top: [],
        others: [],
        warnings: [],
      },
    });
  });
});

describe("searchFoodsByImage", () => {
  it("stops at DecodeError before asking for a connection", async () => {
    const connections = connected(new FakeBackend(foods(3)));

    const result = await searchFoodsByImage(connections, Buffer.from([0xde, 0xad, 0xbe, 0xef]));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("DecodeError");
    expect(connections.getConnection).not.toHaveBeenCalled();
  });

  it("treats an empty upload as an invalid query", async () => {
    const connections = connected(new FakeBackend());

    const result = await searchFoodsByImage(connections, Buffer.alloc(0));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe("InvalidQuery");
    expect(connections.getConnection).not.toHaveBeenCalled();
  });
});
