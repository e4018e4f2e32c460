import { err, ok, type Result } from "../types/result.js";
import type { ResolveError } from "../types/errors.js";
import type { AdapterDeclaration } from "../types/manifest.js";
import type { AdapterConfig, AdapterMetadata } from "../types/registry.js";

/** Builds the handle for one port from the declaration's `config`. */
export type AdapterFactory<THandle = unknown> = (config: AdapterConfig) => THandle;

export type AdapterDefinition<THandle = unknown> = {
  create: AdapterFactory<THandle>;
  /** Copied into the registry entry as `metadata.capabilities`. */
  capabilities?: readonly string[];
  metadata?: Record<string, unknown>;
};

export type ResolvedAdapter = {
  port: string;
  reference: string;
  handle: unknown;
  config: AdapterConfig;
  metadata: AdapterMetadata;
};

/**
 * Maps the reference strings used in manifests to adapter factories. Adapter
 * packages define themselves here at startup; the manifest engine only ever
 * looks names up.
 */
export class AdapterCatalog {
  private readonly definitions = new Map<string, AdapterDefinition>();

  define<THandle>(reference: string, definition: AdapterDefinition<THandle>): this {
    const key = reference.trim();
    if (key.length === 0) {
      throw new Error("Adapter reference must not be empty.");
    }
    if (this.definitions.has(key)) {
      throw new Error(`Adapter "${key}" is already defined.`);
    }
    this.definitions.set(key, definition);
    return this;
  }

  has(reference: string): boolean {
    return this.definitions.has(reference.trim());
  }

  references(): string[] {
    return [...this.definitions.keys()].sort();
  }

  /**
   * Look up `declaration.adapter` and run its factory. A missing reference or
   * a factory that throws is returned as an error value.
   */
  resolve(port: string, declaration: AdapterDeclaration): Result<ResolvedAdapter, ResolveError> {
    const reference = declaration.adapter.trim();
    const definition = this.definitions.get(reference);
    if (!definition) {
      return err({ kind: "unresolvable_adapter", port, reference });
    }

    let handle: unknown;
    try {
      handle = definition.create(declaration.config);
    } catch (e) {
      return err({
        kind: "adapter_factory_failed",
        port,
        reference,
        message: e instanceof Error ? e.message : String(e),
      });
    }

    return ok({
      port,
      reference,
      handle,
      config: declaration.config,
      metadata: {
        ...definition.metadata,
        reference,
        ...(definition.capabilities ? { capabilities: definition.capabilities } : {}),
      },
    });
  }
}
