import { isPlainObject } from "../manifest/env.js";
import type { CapabilityError } from "../types/errors.js";
import type { AdapterMetadata } from "../types/registry.js";
import { err, ok, type Result } from "../types/result.js";

/** What a backend behind an adapter can do, and what it costs. */
export type BackendCapabilities = {
  backend_id: string;
  provider: string;
  models: string[];
  default_model: string | null;
  supports_streaming: boolean;
  supports_tools: boolean;
  supports_vision: boolean;
  supports_audio: boolean;
  supports_json_mode: boolean;
  supports_extended_thinking: boolean;
  supports_caching: boolean;
  max_tokens: number | null;
  max_context_length: number | null;
  max_images_per_request: number | null;
  requests_per_minute: number | null;
  tokens_per_minute: number | null;
  cost_per_million_input: number | null;
  cost_per_million_output: number | null;
  metadata: Record<string, unknown>;
};

type FlagField =
  | "supports_streaming"
  | "supports_tools"
  | "supports_vision"
  | "supports_audio"
  | "supports_json_mode"
  | "supports_extended_thinking"
  | "supports_caching";

type LimitField =
  | "max_tokens"
  | "max_context_length"
  | "max_images_per_request"
  | "requests_per_minute"
  | "tokens_per_minute";

type CostField = "cost_per_million_input" | "cost_per_million_output";

const FLAG_FIELDS: readonly FlagField[] = [
  "supports_streaming",
  "supports_tools",
  "supports_vision",
  "supports_audio",
  "supports_json_mode",
  "supports_extended_thinking",
  "supports_caching",
];

const LIMIT_FIELDS: readonly LimitField[] = [
  "max_tokens",
  "max_context_length",
  "max_images_per_request",
  "requests_per_minute",
  "tokens_per_minute",
];

const COST_FIELDS: readonly CostField[] = ["cost_per_million_input", "cost_per_million_output"];

/** Capability hints (the `capabilities` list) that switch a flag on. */
const HINT_FLAGS: ReadonlyMap<string, FlagField> = new Map<string, FlagField>([
  ["streaming", "supports_streaming"],
  ["function_calling", "supports_tools"],
  ["tools", "supports_tools"],
  ["tool_use", "supports_tools"],
  ["vision", "supports_vision"],
  ["audio", "supports_audio"],
  ["json_mode", "supports_json_mode"],
  ["extended_thinking", "supports_extended_thinking"],
  ["caching", "supports_caching"],
]);

export type CapabilityOptions = {
  /** Takes precedence over any `backend_id` in the metadata. */
  backend_id?: string;
  /** Takes precedence over any `provider` in the metadata. */
  provider?: string;
};

export function defaultCapabilities(backend_id: string, provider: string): BackendCapabilities {
  return {
    backend_id,
    provider,
    models: [],
    default_model: null,
    supports_streaming: true,
    supports_tools: true,
    supports_vision: false,
    supports_audio: false,
    supports_json_mode: true,
    supports_extended_thinking: false,
    supports_caching: false,
    max_tokens: null,
    max_context_length: null,
    max_images_per_request: null,
    requests_per_minute: null,
    tokens_per_minute: null,
    cost_per_million_input: null,
    cost_per_million_output: null,
    metadata: {},
  };
}

/**
 * Build a capability record from adapter metadata.
 *
 * Fields are read from `metadata.backend_capabilities` when present, else from
 * the metadata itself. Unknown keys and `null` values are skipped. Hints in
 * `metadata.capabilities` turn on the matching `supports_*` flag.
 */
export function fromMetadata(
  metadata: AdapterMetadata | null | undefined,
  opts: CapabilityOptions = {},
): Result<BackendCapabilities, CapabilityError> {
  const outer: AdapterMetadata = metadata ?? {};
  const nested = outer.backend_capabilities;
  const source: Record<string, unknown> = isPlainObject(nested) ? nested : outer;

  const backendId = opts.backend_id ?? firstString(source.backend_id, outer.backend_id);
  if (backendId === undefined) return err({ kind: "missing_backend_id" });
  const provider = opts.provider ?? firstString(source.provider, outer.provider);
  if (provider === undefined) return err({ kind: "missing_provider" });

  const caps = defaultCapabilities(backendId, provider);

  for (const field of FLAG_FIELDS) {
    const value = source[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== "boolean") return invalid(field, "must be boolean");
    caps[field] = value;
  }

  for (const field of LIMIT_FIELDS) {
    const value = source[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      return invalid(field, "must be a non-negative integer");
    }
    caps[field] = value;
  }

  for (const field of COST_FIELDS) {
    const value = source[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      return invalid(field, "must be a non-negative number");
    }
    caps[field] = value;
  }

  const models = source.models;
  if (models !== undefined && models !== null) {
    if (!Array.isArray(models) || !models.every((m): m is string => typeof m === "string")) {
      return invalid("models", "must be a list of strings");
    }
    caps.models = [...models];
  }

  const defaultModel = source.default_model;
  if (defaultModel !== undefined && defaultModel !== null) {
    if (typeof defaultModel !== "string") return invalid("default_model", "must be string");
    caps.default_model = defaultModel;
  }

  const extra = source.metadata;
  if (extra !== undefined && extra !== null) {
    if (!isPlainObject(extra)) return invalid("metadata", "must be a mapping");
    caps.metadata = { ...extra };
  }

  for (const hint of outer.capabilities ?? []) {
    const flag = HINT_FLAGS.get(hint);
    if (flag) caps[flag] = true;
  }

  return ok(caps);
}

function firstString(...candidates: unknown[]): string | undefined {
  for (const candidate of candidates) {
    if (typeof candidate === "string" && candidate.trim().length > 0) return candidate;
  }
  return undefined;
}

function invalid(field: string, reason: string): Result<never, CapabilityError> {
  return err({ kind: "invalid_capability", field, reason });
}
