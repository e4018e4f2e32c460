import { ENVIRONMENTS } from "../types/manifest.js";

const extensionSection = { type: "object", default: {} } as const;

const adapterDeclarationSchema = {
  type: "object",
  required: ["adapter"],
  additionalProperties: false,
  properties: {
    adapter: { type: "string", minLength: 1 },
    config: { type: "object", default: {} },
    enabled: { type: "boolean", default: true },
  },
} as const;

/** JSON Schema for a manifest. Unknown top-level sections pass through. */
export const MANIFEST_SCHEMA = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  required: ["version", "environment", "adapters"],
  properties: {
    version: { type: "string", minLength: 1 },
    environment: { type: "string", enum: [...ENVIRONMENTS] },
    adapters: {
      type: "object",
      additionalProperties: adapterDeclarationSchema,
    },
    router: {
      type: "object",
      additionalProperties: false,
      properties: {
        strategy: { type: "string", enum: ["fallback", "round_robin", "specialist", "cost_optimized"] },
        health_check_interval: { type: "integer", minimum: 0, default: 30_000 },
        providers: { type: "array", items: { type: "object" } },
      },
    },
    cache: {
      type: "object",
      additionalProperties: false,
      properties: {
        enabled: { type: "boolean", default: true },
        backend: { type: "string", enum: ["memory", "redis"] },
        default_ttl: { type: "integer", minimum: 1, default: 3600 },
        namespaces: { type: "object" },
      },
    },
    agent: {
      type: "object",
      additionalProperties: false,
      properties: {
        max_iterations: { type: "integer", minimum: 1, default: 10 },
        timeout: { type: "integer", minimum: 1, default: 300_000 },
        tools: { type: "array", items: { type: "string" } },
      },
    },
    pipelines: extensionSection,
    graphs: extensionSection,
    rag: extensionSection,
    telemetry: extensionSection,
  },
} as const;
