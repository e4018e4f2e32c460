import fs from "node:fs";
import { fuse, type FuseOptions } from "../fusion/rrf.js";
import { loadAjv } from "../schema/ajv.js";
import type { SearchResult } from "../types/search-result.js";

const SEARCH_RESULTS_SCHEMA = {
  type: "array",
  items: {
    type: "object",
    required: ["id"],
    properties: {
      id: { type: "string", minLength: 1 },
      score: { type: "number", default: 0 },
      metadata: { type: "object", default: {} },
      payload: {},
    },
  },
};

export type FuseResult = { ok: true; results: SearchResult[] } | { ok: false; error: string };

async function readResults(filePath: string): Promise<{ ok: true; value: SearchResult[] } | { ok: false; error: string }> {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    return { ok: false, error: `Failed to read results (${filePath}): ${e instanceof Error ? e.message : String(e)}` };
  }

  const ajv = await loadAjv({ useDefaults: true });
  const validate = ajv.compile<SearchResult[]>(SEARCH_RESULTS_SCHEMA);
  if (!validate(data)) {
    return { ok: false, error: `Invalid results (${filePath}): ${ajv.errorsText(validate.errors)}` };
  }
  return { ok: true, value: data };
}

/** Fuse two JSON files of ranked search results. */
export async function fuseFiles(opts: { listA: string; listB: string } & FuseOptions): Promise<FuseResult> {
  const a = await readResults(opts.listA);
  if (!a.ok) return a;
  const b = await readResults(opts.listB);
  if (!b.ok) return b;

  try {
    return { ok: true, results: fuse(a.value, b.value, { k: opts.k, weightA: opts.weightA, weightB: opts.weightB }) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}
