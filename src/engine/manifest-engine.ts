import { componentLogger, type Logger } from "../log.js";
import { loadManifestFile } from "../manifest/loader.js";
import type { Env } from "../manifest/env.js";
import type { AdapterRegistry } from "../registry/adapter-registry.js";
import { emitSafely, noopTelemetry, type TelemetryEmitter } from "../telemetry/telemetry.js";
import { formatError, type EngineError } from "../types/errors.js";
import type { ValidatedManifest } from "../types/manifest.js";
import type { AdapterConfig } from "../types/registry.js";
import { err, ok, type Result } from "../types/result.js";
import type { AdapterCatalog, ResolvedAdapter } from "./catalog.js";

export type EngineState = "unloaded" | "loaded";

export type WiredAdapter = {
  handle: unknown;
  config: AdapterConfig;
};

export type ManifestEngineOptions = {
  registry: AdapterRegistry;
  catalog: AdapterCatalog;
  /** Loaded before `start` resolves; a failure fails the start. */
  manifestPath?: string;
  telemetry?: TelemetryEmitter;
  logger?: Logger;
  /** Variables for `${NAME}` expansion. Defaults to `process.env`. */
  env?: Env;
};

/** Everything one successful load produces, swapped in as a single value. */
type Snapshot = {
  manifest: ValidatedManifest;
  adapters: ReadonlyMap<string, WiredAdapter>;
  loadedAt: Date;
};

/**
 * Loads a manifest, resolves every enabled adapter through the catalog and
 * registers the results.
 *
 * Loads run one at a time in call order. Readers see the last committed
 * snapshot and never wait for a load in progress. A failed load leaves the
 * previous manifest and the registry as they were.
 */
export class ManifestEngine {
  private snapshot: Snapshot | null = null;
  private sourcePath: string | null;
  private queue: Promise<void> = Promise.resolve();

  private readonly registry: AdapterRegistry;
  private readonly catalog: AdapterCatalog;
  private readonly telemetry: TelemetryEmitter;
  private readonly log: Logger;
  private readonly env: Env | undefined;

  private constructor(opts: ManifestEngineOptions) {
    this.registry = opts.registry;
    this.catalog = opts.catalog;
    this.telemetry = opts.telemetry ?? noopTelemetry;
    this.log = opts.logger ?? componentLogger("engine");
    this.env = opts.env;
    this.sourcePath = opts.manifestPath ?? null;
  }

  /**
   * Create an engine. With `manifestPath` the manifest is loaded first and any
   * error is returned instead of an empty engine.
   */
  static async start(opts: ManifestEngineOptions): Promise<Result<ManifestEngine, EngineError>> {
    const engine = new ManifestEngine(opts);
    const manifestPath = opts.manifestPath;
    if (manifestPath === undefined) return ok(engine);

    const loaded = await engine.exclusive(() => engine.loadFrom(manifestPath, false));
    return loaded.ok ? ok(engine) : loaded;
  }

  getState(): EngineState {
    return this.snapshot ? "loaded" : "unloaded";
  }

  getManifest(): ValidatedManifest | null {
    return this.snapshot?.manifest ?? null;
  }

  /** Handle and config wired for `port` by the current manifest, if any. */
  getAdapter(port: string): WiredAdapter | null {
    return this.snapshot?.adapters.get(port) ?? null;
  }

  /** Source `reload()` reads from. */
  getManifestPath(): string | null {
    return this.sourcePath;
  }

  getLoadedAt(): Date | null {
    return this.snapshot?.loadedAt ?? null;
  }

  /** Re-read the current source. */
  reload(): Promise<Result<void, EngineError>> {
    return this.exclusive(async () => {
      const source = this.sourcePath;
      if (source === null) {
        const error: EngineError = { kind: "no_source_configured" };
        this.reportFailure(null, error);
        return err(error);
      }
      return this.loadFrom(source, true);
    });
  }

  /** Replace the whole configuration from `filePath`; it becomes the reload source. */
  load(filePath: string): Promise<Result<void, EngineError>> {
    return this.exclusive(() => this.loadFrom(filePath, true));
  }

  private async loadFrom(filePath: string, isReload: boolean): Promise<Result<void, EngineError>> {
    const loaded = await loadManifestFile(filePath, { env: this.env });
    if (!loaded.ok) {
      this.reportFailure(filePath, loaded.error);
      return loaded;
    }
    const manifest = loaded.value;

    // Resolve everything before touching the registry so a bad reference
    // leaves it unchanged.
    const resolved: ResolvedAdapter[] = [];
    for (const [port, declaration] of Object.entries(manifest.adapters)) {
      if (!declaration.enabled) continue;
      const result = this.catalog.resolve(port, declaration);
      if (!result.ok) {
        this.reportFailure(filePath, result.error);
        return result;
      }
      resolved.push(result.value);
    }

    const adapters = new Map<string, WiredAdapter>();
    for (const adapter of resolved) {
      this.registry.register(adapter.port, adapter.handle, adapter.config, adapter.metadata);
      adapters.set(adapter.port, { handle: adapter.handle, config: adapter.config });
    }
    for (const port of this.snapshot?.adapters.keys() ?? []) {
      if (!adapters.has(port)) this.registry.unregister(port);
    }

    this.snapshot = { manifest, adapters, loadedAt: new Date() };
    this.sourcePath = filePath;

    const ports = [...adapters.keys()];
    this.log.info(`Loaded manifest ${filePath} (${ports.length} adapter${ports.length === 1 ? "" : "s"})`);
    this.emit(["manifest", "loaded"], { path: filePath, ports });
    if (isReload) {
      this.emit(["manifest", "reload"], { path: filePath, ports });
    }
    return ok(undefined);
  }

  private reportFailure(filePath: string | null, error: EngineError): void {
    this.log.warn(`Manifest ${filePath ?? "(none)"} not applied: ${formatError(error)}`);
    this.emit(["manifest", "error"], { path: filePath, kind: error.kind });
  }

  private emit(event: readonly string[], metadata: Record<string, unknown>): void {
    emitSafely(this.telemetry, this.log, event, { count: 1 }, metadata);
  }

  /**
   * Run `operation` after every previously queued one has settled.
   */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation);
    this.queue = run.then(
      () => undefined,
      (error: unknown) => {
        this.log.error("Manifest load crashed:", error);
      },
    );
    return run;
  }
}
