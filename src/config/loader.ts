import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { PortwireSettings } from "../types/config.js";
import { err, ok, type Result } from "../types/result.js";
import { validateSettings } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "PORTWIRE_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const current = result[key];
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  return isRecord(parsed) ? parsed : {};
}

/** Apply PORTWIRE_ prefixed environment variable overrides. */
function applyEnvOverrides(
  settings: Record<string, unknown>,
  env: Readonly<Record<string, string | undefined>>,
): Record<string, unknown> {
  const result = { ...settings };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // PORTWIRE_MANIFEST_PATH → manifest_path
    result[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return result;
}

/**
 * Merge the settings layers: base.yaml ← {envName}.yaml ← environment variables.
 * The result is not validated yet.
 */
export function readSettingsLayers(
  envName?: string,
  configDir?: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}

/**
 * Load and validate layered settings.
 *
 * @param envName - Optional environment name (e.g., "prod", "test").
 *                  Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export async function loadSettings(
  envName?: string,
  configDir?: string,
  env?: Readonly<Record<string, string | undefined>>,
): Promise<Result<PortwireSettings, string>> {
  const validated = await validateSettings(readSettingsLayers(envName, configDir, env));
  return validated.valid ? ok(validated.settings) : err(validated.errors);
}
