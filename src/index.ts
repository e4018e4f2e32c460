export { AdapterRegistry, type AdapterRegistryOptions } from "./registry/adapter-registry.js";
export {
  defaultCapabilities,
  fromMetadata,
  type BackendCapabilities,
  type CapabilityOptions,
} from "./registry/capabilities.js";
export {
  AdapterCatalog,
  type AdapterDefinition,
  type AdapterFactory,
  type ResolvedAdapter,
} from "./engine/catalog.js";
export {
  ManifestEngine,
  type EngineState,
  type ManifestEngineOptions,
  type WiredAdapter,
} from "./engine/manifest-engine.js";
export { loadManifestFile, loadManifestString, validateManifestDocument, type LoadOptions } from "./manifest/loader.js";
export { expandEnvVars, type Env } from "./manifest/env.js";
export { MANIFEST_SCHEMA } from "./manifest/schema.js";
export { fuse, DEFAULT_K, DEFAULT_WEIGHT, type FuseOptions } from "./fusion/rrf.js";
export {
  Telemetry,
  CORE_EVENTS,
  EVENT_PREFIX,
  noopTelemetry,
  emitSafely,
  type TelemetryEmitter,
  type TelemetryEvent,
  type TelemetryHandler,
} from "./telemetry/telemetry.js";
export { loadSettings, readSettingsLayers } from "./config/loader.js";
export { validateSettings } from "./config/validator.js";
export { logger, componentLogger, setLogLevel, type Logger } from "./log.js";
export { formatError, AdapterNotFoundError } from "./types/errors.js";
export type {
  AdapterFactoryFailed,
  CapabilityError,
  EngineError,
  InvalidCapability,
  IoError,
  LoadError,
  MissingBackendId,
  MissingEnvVar,
  MissingProvider,
  NoSourceConfigured,
  NotFound,
  ParseError,
  PortwireError,
  ResolveError,
  SchemaViolation,
  UnresolvableAdapter,
} from "./types/errors.js";
export type {
  AdapterDeclaration,
  AgentSection,
  CacheSection,
  Environment,
  ManifestDocument,
  RouterSection,
  RouterStrategy,
  ValidatedManifest,
} from "./types/manifest.js";
export type {
  AdapterConfig,
  AdapterEntry,
  AdapterMetadata,
  AdapterMetrics,
  CapabilityMatch,
  HealthStatus,
} from "./types/registry.js";
export type { FusionSettings, LogLevelName, PortwireSettings } from "./types/config.js";
export type { Result } from "./types/result.js";
export type { SearchResult } from "./types/search-result.js";
export { ENVIRONMENTS } from "./types/manifest.js";
