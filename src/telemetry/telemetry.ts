import { componentLogger, type Logger } from "../log.js";

export type Measurements = Record<string, number>;
export type EventMetadata = Record<string, unknown>;

/**
 * Fire-and-forget event sink the core reports to. Nothing it returns is read.
 */
export interface TelemetryEmitter {
  emit(event: readonly string[], measurements: Measurements, metadata: EventMetadata): void;
}

export type TelemetryEvent = {
  event: string[];
  measurements: Measurements;
  metadata: EventMetadata;
};

export type TelemetryHandler = (event: TelemetryEvent) => void;

export const EVENT_PREFIX = "portwire";

/** Events the manifest engine and registry emit. */
export const CORE_EVENTS: readonly (readonly string[])[] = [
  [EVENT_PREFIX, "manifest", "loaded"],
  [EVENT_PREFIX, "manifest", "reload"],
  [EVENT_PREFIX, "manifest", "error"],
  [EVENT_PREFIX, "registry", "register"],
];

export const noopTelemetry: TelemetryEmitter = {
  emit: () => undefined,
};

/**
 * Send one event to a caller-supplied emitter. A sink that throws is logged;
 * the error never reaches the operation that reported the event.
 */
export function emitSafely(
  emitter: TelemetryEmitter,
  log: Logger,
  event: readonly string[],
  measurements: Measurements,
  metadata: EventMetadata,
): void {
  try {
    emitter.emit(event, measurements, metadata);
  } catch (error) {
    log.warn(`Telemetry sink failed on ${event.join(".")}:`, error);
  }
}

type Attachment = {
  prefix: string[];
  handler: TelemetryHandler;
};

/**
 * In-process event dispatcher. Event names are prefixed with `portwire`;
 * handlers subscribe to every event whose path starts with their prefix.
 * A handler that throws is logged and detached.
 */
export class Telemetry implements TelemetryEmitter {
  private readonly attachments = new Map<string, Attachment>();
  private readonly log: Logger;

  constructor(opts?: { logger?: Logger }) {
    this.log = opts?.logger ?? componentLogger("telemetry");
  }

  attach(id: string, prefix: readonly string[], handler: TelemetryHandler): void {
    if (this.attachments.has(id)) {
      throw new Error(`Telemetry handler "${id}" is already attached.`);
    }
    this.attachments.set(id, { prefix: [...prefix], handler });
  }

  detach(id: string): boolean {
    return this.attachments.delete(id);
  }

  handlerIds(): string[] {
    return [...this.attachments.keys()].sort();
  }

  emit(event: readonly string[], measurements: Measurements, metadata: EventMetadata): void {
    const name = event[0] === EVENT_PREFIX ? [...event] : [EVENT_PREFIX, ...event];
    const payload: TelemetryEvent = { event: name, measurements, metadata };

    for (const [id, attachment] of [...this.attachments]) {
      if (!startsWith(name, attachment.prefix)) continue;
      try {
        attachment.handler(payload);
      } catch (error) {
        this.attachments.delete(id);
        this.log.warn(`Detached handler "${id}" after it failed on ${name.join(".")}:`, error);
      }
    }
  }

  /**
   * Time `fn` and emit `{ duration }` (ms) with `status` set to "ok" or "error".
   * Errors from `fn` are rethrown after the event is sent.
   */
  measure<T>(event: readonly string[], metadata: EventMetadata, fn: () => T): T {
    const start = performance.now();
    try {
      const result = fn();
      this.emit(event, { duration: performance.now() - start }, { ...metadata, status: "ok" });
      return result;
    } catch (error) {
      this.emit(
        event,
        { duration: performance.now() - start },
        { ...metadata, status: "error", error: describe(error) },
      );
      throw error;
    }
  }

  /** Emit `start`, then `stop` or `exception`, around `fn`. */
  span<T>(event: readonly string[], metadata: EventMetadata, fn: () => T): T {
    const start = performance.now();
    this.emit([...event, "start"], { system_time: Date.now() }, metadata);
    try {
      const result = fn();
      this.emit([...event, "stop"], { duration: performance.now() - start }, metadata);
      return result;
    } catch (error) {
      this.emit(
        [...event, "exception"],
        { duration: performance.now() - start },
        { ...metadata, error: describe(error) },
      );
      throw error;
    }
  }
}

function startsWith(event: readonly string[], prefix: readonly string[]): boolean {
  if (prefix.length > event.length) return false;
  return prefix.every((part, i) => event[i] === part);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
