import path from "node:path";
import { loadManifestFile } from "../manifest/loader.js";
import { formatError, type LoadError } from "../types/errors.js";
import type { ValidatedManifest } from "../types/manifest.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult =
  | { ok: true; manifest: ValidatedManifest; diagnostics: Diagnostic[] }
  | { ok: false; errors: Diagnostic[] };

const ERROR_CODES: Record<LoadError["kind"], string> = {
  io_error: "MANIFEST_READ_FAILED",
  parse_error: "MANIFEST_PARSE_FAILED",
  missing_env_var: "MANIFEST_ENV_MISSING",
  schema_violation: "MANIFEST_INVALID",
};

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/**
 * Load and validate a manifest without wiring it. Disabled adapters are
 * reported as info diagnostics.
 */
export async function validateManifest(opts: { manifestPath: string }): Promise<ValidateResult> {
  const manifestPath = path.resolve(opts.manifestPath);
  const loaded = await loadManifestFile(manifestPath);

  if (!loaded.ok) {
    const { kind, ...details } = loaded.error;
    return {
      ok: false,
      errors: [diag("error", ERROR_CODES[kind], formatError(loaded.error), { path: manifestPath, details })],
    };
  }

  const diagnostics: Diagnostic[] = [];
  for (const [port, declaration] of Object.entries(loaded.value.adapters)) {
    if (!declaration.enabled) {
      diagnostics.push(
        diag("info", "ADAPTER_DISABLED", `Adapter for port ${port} is disabled`, {
          path: manifestPath,
          details: { port, adapter: declaration.adapter },
        }),
      );
    }
  }

  return { ok: true, manifest: loaded.value, diagnostics };
}
