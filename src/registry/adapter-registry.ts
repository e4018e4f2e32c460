import { componentLogger, type Logger } from "../log.js";
import { emitSafely, noopTelemetry, type TelemetryEmitter } from "../telemetry/telemetry.js";
import { AdapterNotFoundError, type CapabilityError, type NotFound } from "../types/errors.js";
import { err, ok, type Result } from "../types/result.js";
import { fromMetadata, type BackendCapabilities } from "./capabilities.js";
import type {
  AdapterConfig,
  AdapterEntry,
  AdapterMetadata,
  AdapterMetrics,
  CapabilityMatch,
  HealthStatus,
} from "../types/registry.js";

export type AdapterRegistryOptions = {
  now?: () => Date;
  telemetry?: TelemetryEmitter;
  logger?: Logger;
};

/**
 * Port name → resolved adapter, with health and call counters.
 *
 * Entries are frozen and replaced whole on every write, so a reader holding
 * an entry never sees it change and never sees old and new fields mixed.
 * All operations are synchronous; writes to one port apply in call order.
 */
export class AdapterRegistry {
  private entries = new Map<string, AdapterEntry>();
  private readonly now: () => Date;
  private readonly telemetry: TelemetryEmitter;
  private readonly log: Logger;

  constructor(opts: AdapterRegistryOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.telemetry = opts.telemetry ?? noopTelemetry;
    this.log = opts.logger ?? componentLogger("registry");
  }

  /** Insert or replace the entry for `port`, resetting health and counters. */
  register(port: string, handle: unknown, config: AdapterConfig, metadata: AdapterMetadata = {}): void {
    const entry: AdapterEntry = Object.freeze({
      port,
      handle,
      config: Object.freeze({ ...config }),
      metadata: Object.freeze({
        ...metadata,
        ...(metadata.capabilities ? { capabilities: Object.freeze([...metadata.capabilities]) } : {}),
      }),
      registeredAt: this.now(),
      healthy: true,
      callCount: 0,
      errorCount: 0,
    });

    const replaced = this.entries.has(port);
    this.entries.set(port, entry);
    this.log.debug(`${replaced ? "Replaced" : "Registered"} adapter for port ${port}`);
    emitSafely(this.telemetry, this.log, ["registry", "register"], { count: 1 }, { port, replaced });
  }

  get(port: string): Result<AdapterEntry, NotFound> {
    const entry = this.entries.get(port);
    return entry ? ok(entry) : err({ kind: "not_found", port });
  }

  getOrThrow(port: string): AdapterEntry {
    const entry = this.entries.get(port);
    if (!entry) throw new AdapterNotFoundError(port);
    return entry;
  }

  isRegistered(port: string): boolean {
    return this.entries.has(port);
  }

  listPorts(): string[] {
    return [...this.entries.keys()].sort();
  }

  findByCapability(capability: string): CapabilityMatch[] {
    const snapshot = [...this.entries.values()];
    return snapshot
      .filter((entry) => entry.metadata.capabilities?.includes(capability) ?? false)
      .map((entry) => ({ port: entry.port, handle: entry.handle, config: entry.config }));
  }

  /** Capability record for the backend behind `port`, built from the entry's metadata. */
  backendCapabilities(port: string): Result<BackendCapabilities, NotFound | CapabilityError> {
    const entry = this.entries.get(port);
    if (!entry) return err({ kind: "not_found", port });
    return fromMetadata(entry.metadata);
  }

  markHealthy(port: string): Result<void, NotFound> {
    return this.update(port, (entry) => ({ ...entry, healthy: true }));
  }

  markUnhealthy(port: string): Result<void, NotFound> {
    return this.update(port, (entry) => ({ ...entry, healthy: false }));
  }

  healthStatus(port: string): HealthStatus {
    const entry = this.entries.get(port);
    if (!entry) return "unknown";
    return entry.healthy ? "healthy" : "unhealthy";
  }

  recordCall(port: string, success: boolean): Result<void, NotFound> {
    return this.update(port, (entry) => ({
      ...entry,
      callCount: entry.callCount + 1,
      errorCount: success ? entry.errorCount : entry.errorCount + 1,
    }));
  }

  metrics(port: string): Result<AdapterMetrics, NotFound> {
    const entry = this.entries.get(port);
    if (!entry) return err({ kind: "not_found", port });

    return ok({
      callCount: entry.callCount,
      errorCount: entry.errorCount,
      errorRate: entry.callCount === 0 ? 0 : entry.errorCount / entry.callCount,
      healthy: entry.healthy,
      uptime: Math.max(0, Math.floor((this.now().getTime() - entry.registeredAt.getTime()) / 1000)),
    });
  }

  unregister(port: string): void {
    if (this.entries.delete(port)) {
      this.log.debug(`Unregistered adapter for port ${port}`);
    }
  }

  clear(): void {
    this.entries = new Map();
  }

  private update(port: string, fn: (entry: AdapterEntry) => AdapterEntry): Result<void, NotFound> {
    const entry = this.entries.get(port);
    if (!entry) return err({ kind: "not_found", port });
    this.entries.set(port, Object.freeze(fn(entry)));
    return ok(undefined);
  }
}
