/** Registry types: resolved adapters and their runtime counters. */
export type AdapterMetadata = {
  capabilities?: readonly string[];
  [key: string]: unknown;
};

export type AdapterConfig = Readonly<Record<string, unknown>>;

export type AdapterEntry = {
  readonly port: string;
  readonly handle: unknown;
  readonly config: AdapterConfig;
  readonly metadata: Readonly<AdapterMetadata>;
  readonly registeredAt: Date;
  readonly healthy: boolean;
  readonly callCount: number;
  readonly errorCount: number;
};

export type HealthStatus = "healthy" | "unhealthy" | "unknown";

export type AdapterMetrics = {
  callCount: number;
  errorCount: number;
  /** errorCount / callCount, 0 when no calls were recorded. */
  errorRate: number;
  healthy: boolean;
  /** Whole seconds since the entry was (re)registered. */
  uptime: number;
};

export type CapabilityMatch = {
  port: string;
  handle: unknown;
  config: AdapterConfig;
};
