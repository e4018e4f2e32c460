import { loadAjv } from "../schema/ajv.js";
import type { PortwireSettings } from "../types/config.js";

/** Settings schema: required fields plus defaults for the rest. */
const SETTINGS_SCHEMA = {
  type: "object",
  required: ["schema_version"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    manifest_path: { type: "string", minLength: 1, default: "config/manifest.yaml" },
    log_level: { type: "string", enum: ["silent", "error", "warn", "info", "debug"], default: "info" },
    fusion: {
      type: "object",
      additionalProperties: false,
      properties: {
        k: { type: "number", minimum: 0, default: 60 },
        weight_a: { type: "number", minimum: 0, default: 1 },
        weight_b: { type: "number", minimum: 0, default: 1 },
      },
    },
  },
};

export type SettingsValidationResult =
  | { valid: true; settings: PortwireSettings; errors: null }
  | { valid: false; errors: string };

/** Validate merged settings, filling defaults into a copy. */
export async function validateSettings(settings: unknown): Promise<SettingsValidationResult> {
  const ajv = await loadAjv({ useDefaults: true });
  const validate = ajv.compile<PortwireSettings>(SETTINGS_SCHEMA);
  const candidate: unknown = structuredClone(settings);
  if (validate(candidate)) {
    return { valid: true, settings: candidate, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
