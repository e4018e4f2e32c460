import fs from "node:fs";
import YAML from "yaml";
import { loadAjv, type AjvValidateFn, type SchemaError } from "../schema/ajv.js";
import { err, ok, type Result } from "../types/result.js";
import type { LoadError, SchemaViolation } from "../types/errors.js";
import type { ManifestDocument, ValidatedManifest } from "../types/manifest.js";
import { expandEnvVars, isPlainObject, type Env } from "./env.js";
import { MANIFEST_SCHEMA } from "./schema.js";

export type LoadOptions = {
  /** Variables used for `${NAME}` expansion. Defaults to `process.env`. */
  env?: Env;
};

export type LoadResult = Result<ValidatedManifest, LoadError>;

let validator: Promise<AjvValidateFn<ManifestDocument>> | null = null;

function manifestValidator(): Promise<AjvValidateFn<ManifestDocument>> {
  validator ??= loadAjv({ useDefaults: true }).then((ajv) => ajv.compile<ManifestDocument>(MANIFEST_SCHEMA));
  return validator;
}

/**
 * Load a manifest file: read → parse YAML → expand `${VAR}` → validate and
 * fill defaults. Any failure aborts the whole load.
 */
export async function loadManifestFile(filePath: string, opts: LoadOptions = {}): Promise<LoadResult> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    return err({ kind: "io_error", path: filePath, message: e instanceof Error ? e.message : String(e) });
  }
  return loadManifestString(raw, opts);
}

/** Same as {@link loadManifestFile} for manifest text already in memory. */
export async function loadManifestString(contents: string, opts: LoadOptions = {}): Promise<LoadResult> {
  let document: unknown;
  try {
    document = YAML.parse(contents);
  } catch (e) {
    return err({ kind: "parse_error", detail: e instanceof Error ? e.message : String(e) });
  }

  const expanded = expandEnvVars(document, opts.env ?? process.env);
  if (!expanded.ok) return expanded;

  return validateManifestDocument(expanded.value);
}

/**
 * Validate an expanded document. Defaults are filled into a copy; the input
 * is left untouched.
 */
export async function validateManifestDocument(
  document: unknown,
): Promise<Result<ValidatedManifest, SchemaViolation>> {
  if (!isPlainObject(document)) {
    return err({ kind: "schema_violation", field: "manifest", reason: "must be a mapping" });
  }

  const candidate = structuredClone(document);
  const validate = await manifestValidator();
  if (!validate(candidate)) {
    return err(toViolation(validate.errors));
  }

  return ok(deepFreeze(candidate));
}

function toViolation(errors: SchemaError[] | null | undefined): SchemaViolation {
  const first = errors?.[0];
  if (!first) return { kind: "schema_violation", field: "manifest", reason: "is invalid" };

  const segments = first.instancePath
    .split("/")
    .filter((s) => s.length > 0)
    .map((s) => s.replace(/~1/g, "/").replace(/~0/g, "~"));

  const missing: unknown = first.params.missingProperty;
  if (first.keyword === "required" && typeof missing === "string") segments.push(missing);

  const extra: unknown = first.params.additionalProperty;
  if (first.keyword === "additionalProperties" && typeof extra === "string") segments.push(extra);

  return {
    kind: "schema_violation",
    field: segments.length > 0 ? segments.join(".") : "manifest",
    reason: first.message ?? "is invalid",
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) deepFreeze(item);
  }
  return value;
}
