import type { SearchResult } from "../types/search-result.js";

export const DEFAULT_K = 60;
export const DEFAULT_WEIGHT = 1.0;

export type FuseOptions = {
  /** Rank offset; larger values flatten the difference between top ranks. */
  k?: number;
  weightA?: number;
  weightB?: number;
};

type Fused = {
  result: SearchResult;
  score: number;
  order: number;
};

/**
 * Reciprocal Rank Fusion of two ranked lists.
 *
 * Each occurrence at 1-based rank `r` adds `weight / (k + r)` to its id's
 * score. Every distinct id is returned, best first; equal scores keep the
 * order in which ids were first seen (listA, then listB).
 */
export function fuse(
  listA: readonly SearchResult[],
  listB: readonly SearchResult[],
  opts: FuseOptions = {},
): SearchResult[] {
  const k = nonNegative("k", opts.k ?? DEFAULT_K);
  const weightA = nonNegative("weightA", opts.weightA ?? DEFAULT_WEIGHT);
  const weightB = nonNegative("weightB", opts.weightB ?? DEFAULT_WEIGHT);

  const fused = new Map<string, Fused>();
  accumulate(fused, listA, weightA, k);
  accumulate(fused, listB, weightB, k);

  return [...fused.values()]
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .map(({ result, score }) => ({ ...result, score }));
}

function accumulate(fused: Map<string, Fused>, list: readonly SearchResult[], weight: number, k: number): void {
  list.forEach((result, index) => {
    const contribution = weight / (k + index + 1);
    const existing = fused.get(result.id);

    if (!existing) {
      fused.set(result.id, { result, score: contribution, order: fused.size });
      return;
    }

    existing.score += contribution;
    if (!hasPayload(existing.result) && hasPayload(result)) {
      existing.result = { ...existing.result, metadata: result.metadata, payload: result.payload };
    }
  });
}

function nonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${value}`);
  }
  return value;
}

function hasPayload(result: SearchResult): boolean {
  return result.payload !== undefined && result.payload !== null;
}
