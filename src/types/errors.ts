/** Tagged error values returned by the loader, engine and registry. */
export type IoError = { kind: "io_error"; path: string; message: string };
export type ParseError = { kind: "parse_error"; detail: string };
export type MissingEnvVar = { kind: "missing_env_var"; name: string };
export type SchemaViolation = { kind: "schema_violation"; field: string; reason: string };
export type UnresolvableAdapter = { kind: "unresolvable_adapter"; port: string; reference: string };
export type AdapterFactoryFailed = {
  kind: "adapter_factory_failed";
  port: string;
  reference: string;
  message: string;
};
export type NoSourceConfigured = { kind: "no_source_configured" };
export type NotFound = { kind: "not_found"; port: string };
export type MissingBackendId = { kind: "missing_backend_id" };
export type MissingProvider = { kind: "missing_provider" };
export type InvalidCapability = { kind: "invalid_capability"; field: string; reason: string };

export type LoadError = IoError | ParseError | MissingEnvVar | SchemaViolation;
export type ResolveError = UnresolvableAdapter | AdapterFactoryFailed;
export type EngineError = LoadError | ResolveError | NoSourceConfigured;

export type CapabilityError = MissingBackendId | MissingProvider | InvalidCapability;

export type PortwireError = EngineError | NotFound | CapabilityError;

/** One-line description naming the field, variable, reference or port involved. */
export function formatError(error: PortwireError): string {
  switch (error.kind) {
    case "io_error":
      return `Cannot read manifest ${error.path}: ${error.message}`;
    case "parse_error":
      return `Malformed manifest: ${error.detail}`;
    case "missing_env_var":
      return `Missing environment variable: ${error.name}`;
    case "schema_violation":
      return `Invalid manifest field ${error.field}: ${error.reason}`;
    case "unresolvable_adapter":
      return `No adapter "${error.reference}" is defined (port ${error.port})`;
    case "adapter_factory_failed":
      return `Adapter "${error.reference}" failed to initialize for port ${error.port}: ${error.message}`;
    case "no_source_configured":
      return "No manifest source configured";
    case "not_found":
      return `No adapter registered for port: ${error.port}`;
    case "missing_backend_id":
      return "Adapter metadata has no backend_id";
    case "missing_provider":
      return "Adapter metadata has no provider";
    case "invalid_capability":
      return `Invalid capability field ${error.field}: ${error.reason}`;
  }
}

/** Thrown only by the explicit throwing accessors, never by the Result-returning API. */
export class AdapterNotFoundError extends Error {
  readonly port: string;

  constructor(port: string) {
    super(formatError({ kind: "not_found", port }));
    this.name = "AdapterNotFoundError";
    this.port = port;
  }
}
