import { describe, expect, it } from "vitest";
import { fuse } from "../src/fusion/rrf.js";
import type { SearchResult } from "../src/types/search-result.js";

const r = (id: string, score = 0, extra: Partial<SearchResult> = {}): SearchResult => ({
  id,
  score,
  metadata: {},
  ...extra,
});

describe("reciprocal rank fusion", () => {
  it("sums contributions for ids present in both lists", () => {
    const fused = fuse([r("id1", 0.9), r("id2", 0.8)], [r("id1", 12), r("id3", 7)]);

    expect(fused.map((x) => x.id)).toEqual(["id1", "id2", "id3"]);
    expect(fused[0].score).toBeCloseTo(2 / 61, 12);
    expect(fused[1].score).toBeCloseTo(1 / 62, 12);
    expect(fused[2].score).toBeCloseTo(1 / 62, 12);
  });

  it("replaces input scores with fused scores", () => {
    const [only] = fuse([r("a", 100)], []);
    expect(only).toEqual({ id: "a", score: 1 / 61, metadata: {} });
  });

  it("applies list weights", () => {
    const fused = fuse([r("a"), r("b")], [r("b"), r("a")], { k: 0, weightA: 1, weightB: 3 });

    expect(fused.map((x) => x.id)).toEqual(["b", "a"]);
    expect(fused[0].score).toBeCloseTo(1 / 2 + 3 / 1, 12);
    expect(fused[1].score).toBeCloseTo(1 / 1 + 3 / 2, 12);
  });

  it("keeps first-seen order for equal scores", () => {
    const fused = fuse([r("x"), r("y")], [r("y"), r("x")]);
    expect(fused.map((x) => x.id)).toEqual(["x", "y"]);
    expect(fused[0].score).toBe(fused[1].score);
  });

  it("takes metadata and payload from the first occurrence that carries a payload", () => {
    const fused = fuse(
      [r("doc", 0, { metadata: { source: "semantic" } })],
      [r("doc", 0, { metadata: { source: "fulltext" }, payload: { text: "chunk" } })],
    );
    expect(fused).toEqual([{ id: "doc", score: 2 / 61, metadata: { source: "fulltext" }, payload: { text: "chunk" } }]);
  });

  it("keeps an existing payload over a later one", () => {
    const fused = fuse(
      [r("doc", 0, { metadata: { source: "a" }, payload: "first" })],
      [r("doc", 0, { metadata: { source: "b" }, payload: "second" })],
    );
    expect(fused[0].payload).toBe("first");
    expect(fused[0].metadata).toEqual({ source: "a" });
  });

  it("does not modify its inputs", () => {
    const listA = [r("doc", 0.5, { metadata: { source: "a" } })];
    const listB = [r("doc", 0.7, { payload: "p" })];
    fuse(listA, listB);

    expect(listA).toEqual([{ id: "doc", score: 0.5, metadata: { source: "a" } }]);
    expect(listB).toEqual([{ id: "doc", score: 0.7, metadata: {}, payload: "p" }]);
  });

  it("returns an empty list for empty inputs", () => {
    expect(fuse([], [])).toEqual([]);
  });

  it("accepts k = 0", () => {
    const fused = fuse([r("a"), r("b")], []);
    expect(fused.map((x) => x.id)).toEqual(["a", "b"]);
    expect(fuse([r("a")], [], { k: 0 })[0].score).toBe(1);
  });

  it("rejects a negative or non-finite k", () => {
    expect(() => fuse([], [], { k: -1 })).toThrow(RangeError);
    expect(() => fuse([], [], { k: Number.NaN })).toThrow("k must be a non-negative number, got NaN");
  });

  it("rejects a weight that is not a non-negative number", () => {
    expect(() => fuse([r("a")], [r("b")], { weightA: Number.NaN })).toThrow(
      "weightA must be a non-negative number, got NaN",
    );
    expect(() => fuse([r("a")], [r("b")], { weightB: Number.POSITIVE_INFINITY })).toThrow(
      "weightB must be a non-negative number, got Infinity",
    );
    expect(() => fuse([r("a")], [r("b")], { weightB: -1 })).toThrow(RangeError);
  });
});
