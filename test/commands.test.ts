import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fuseFiles } from "../src/commands/fuse.js";
import { writeErrors } from "../src/commands/output.js";
import { validateManifest } from "../src/commands/validate.js";

const FIXTURES = path.resolve(import.meta.dirname, "../fixtures");

describe("validate command", () => {
  it("accepts a valid manifest and reports disabled adapters", async () => {
    const manifestPath = path.join(FIXTURES, "manifest.yaml");
    const res = await validateManifest({ manifestPath });
    if (!res.ok) throw new Error(res.errors[0].message);

    expect(res.manifest.version).toBe("1.0");
    expect(res.diagnostics).toEqual([
      {
        level: "info",
        code: "ADAPTER_DISABLED",
        message: "Adapter for port embedder is disabled",
        path: manifestPath,
        details: { port: "embedder", adapter: "static-embedder" },
      },
    ]);
  });

  it("reports an unreadable manifest", async () => {
    const res = await validateManifest({ manifestPath: path.join(FIXTURES, "nope.yaml") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("MANIFEST_READ_FAILED");
  });

  it("reports a schema violation with the offending field", async () => {
    const manifestPath = path.join(FIXTURES, "missing-version.yaml");
    const res = await validateManifest({ manifestPath });
    expect(res).toEqual({
      ok: false,
      errors: [
        {
          level: "error",
          code: "MANIFEST_INVALID",
          message: "Invalid manifest field version: must have required property 'version'",
          path: manifestPath,
          details: { field: "version", reason: "must have required property 'version'" },
        },
      ],
    });
  });
});

describe("fuse command", () => {
  it("fuses two result files", async () => {
    const res = await fuseFiles({
      listA: path.join(FIXTURES, "results-a.json"),
      listB: path.join(FIXTURES, "results-b.json"),
    });
    if (!res.ok) throw new Error(res.error);

    expect(res.results.map((r) => r.id)).toEqual(["doc-1", "doc-2", "doc-3"]);
    expect(res.results[0]).toEqual({
      id: "doc-1",
      score: 2 / 61,
      metadata: { source: "fulltext" },
      payload: "first chunk",
    });
    expect(res.results[2].metadata).toEqual({});
  });

  it("passes k and weights through", async () => {
    const res = await fuseFiles({
      listA: path.join(FIXTURES, "results-a.json"),
      listB: path.join(FIXTURES, "results-b.json"),
      k: 0,
      weightA: 0,
    });
    if (!res.ok) throw new Error(res.error);
    expect(res.results.map((r) => [r.id, r.score])).toEqual([
      ["doc-1", 1],
      ["doc-3", 0.5],
      ["doc-2", 0],
    ]);
  });

  it("reports a weight that is not a number", async () => {
    const res = await fuseFiles({
      listA: path.join(FIXTURES, "results-a.json"),
      listB: path.join(FIXTURES, "results-b.json"),
      weightB: Number.parseFloat("heavy"),
    });
    expect(res).toEqual({ ok: false, error: "weightB must be a non-negative number, got NaN" });
  });

  it("rejects entries without an id", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "portwire-fuse-"));
    const bad = path.join(dir, "bad.json");
    fs.writeFileSync(bad, JSON.stringify([{ score: 1 }]));

    const res = await fuseFiles({ listA: bad, listB: path.join(FIXTURES, "results-b.json") });
    expect(res).toEqual({
      ok: false,
      error: `Invalid results (${bad}): data/0 must have required property 'id'`,
    });
  });

  it("reports unreadable files", async () => {
    const missing = path.join(FIXTURES, "absent.json");
    const res = await fuseFiles({ listA: missing, listB: missing });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.startsWith(`Failed to read results (${missing}):`)).toBe(true);
  });
});

describe("error output", () => {
  const collect = () => {
    const chunks: string[] = [];
    return { chunks, write: (chunk: string) => chunks.push(chunk) };
  };

  it("writes manifest errors as JSON lines on stdout for jsonl", async () => {
    const res = await validateManifest({ manifestPath: path.join(FIXTURES, "missing-version.yaml") });
    if (res.ok) throw new Error("expected a failure");
    const stdout = collect();
    const stderr = collect();

    writeErrors(res.errors, "jsonl", stdout, stderr);

    expect(stderr.chunks).toEqual([]);
    expect(stdout.chunks).toHaveLength(1);
    expect(JSON.parse(stdout.chunks[0])).toEqual(res.errors[0]);
  });

  it("writes messages on stderr for human output", async () => {
    const res = await validateManifest({ manifestPath: path.join(FIXTURES, "missing-version.yaml") });
    if (res.ok) throw new Error("expected a failure");
    const stdout = collect();
    const stderr = collect();

    writeErrors(res.errors, "human", stdout, stderr);

    expect(stdout.chunks).toEqual([]);
    expect(stderr.chunks).toEqual(["Invalid manifest field version: must have required property 'version'\n"]);
  });
});
