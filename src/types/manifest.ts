/** Manifest types: port → adapter wiring document. */
export const ENVIRONMENTS = ["dev", "test", "staging", "prod"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export type AdapterDeclaration = {
  adapter: string;
  config: Record<string, unknown>;
  enabled: boolean;
};

export type RouterStrategy = "fallback" | "round_robin" | "specialist" | "cost_optimized";

export type RouterSection = {
  strategy?: RouterStrategy;
  health_check_interval: number;
  providers?: Record<string, unknown>[];
};

export type CacheSection = {
  enabled: boolean;
  backend?: "memory" | "redis";
  default_ttl: number;
  namespaces?: Record<string, unknown>;
};

export type AgentSection = {
  max_iterations: number;
  timeout: number;
  tools?: string[];
};

export type ManifestDocument = {
  version: string;
  environment: Environment;
  adapters: Record<string, AdapterDeclaration>;
  router?: RouterSection;
  cache?: CacheSection;
  agent?: AgentSection;
  pipelines: Record<string, unknown>;
  graphs: Record<string, unknown>;
  rag: Record<string, unknown>;
  telemetry: Record<string, unknown>;
  /** Sections the schema does not declare are carried through as-is. */
  [section: string]: unknown;
};

/** A manifest after validation and default-filling. Frozen; replaced, never edited. */
export type ValidatedManifest = Readonly<ManifestDocument>;
