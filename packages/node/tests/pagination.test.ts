import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

describe("cursors", () => {
  it("decode what they encode", () => {
    expect(decodeCursor(encodeCursor("version", 12), "version")).toBe(12);
  });

  it("ignore cursors for another field", () => {
    expect(decodeCursor(encodeCursor("version", 12), "globalPosition")).toBeUndefined();
  });

  it("ignore garbage", () => {
    expect(decodeCursor("not-a-cursor", "version")).toBeUndefined();
    expect(decodeCursor(Buffer.from('{"f":"version","v":"3"}').toString("base64url"), "version"))
      .toBeUndefined();
  });
});

describe("paginate", () => {
  const items = Array.from({ length: 12 }, (_, i) => ({ n: i + 1 }));

  it("returns the first page with a cursor", () => {
    const page = paginate(items, { limit: 5 }, (i) => i.n, "n");
    expect(page.data.map((i) => i.n)).toEqual([1, 2, 3, 4, 5]);
    expect(page.pagination.hasMore).toBe(true);
    expect(page.pagination.cursor).toBe(encodeCursor("n", 5));
  });

  it("compares keys numerically across digit boundaries", () => {
    const page = paginate(items, { limit: 5, cursor: encodeCursor("n", 9) }, (i) => i.n, "n");
    expect(page.data.map((i) => i.n)).toEqual([10, 11, 12]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });
});
