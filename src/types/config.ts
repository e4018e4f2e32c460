/** Runtime settings: layered config system. */
export type LogLevelName = "silent" | "error" | "warn" | "info" | "debug";

export type FusionSettings = {
  k: number;
  weight_a: number;
  weight_b: number;
};

export type PortwireSettings = {
  schema_version: string;
  manifest_path: string;
  log_level: LogLevelName;
  fusion?: FusionSettings;
};
