import { err, ok, type Result } from "../types/result.js";
import type { MissingEnvVar } from "../types/errors.js";

const PLACEHOLDER = /\$\{(\w+)\}/g;

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Replace every `${NAME}` inside string values, recursing through arrays and
 * plain objects. The first unset variable fails the whole expansion.
 */
export function expandEnvVars(value: unknown, env: Env = process.env): Result<unknown, MissingEnvVar> {
  if (typeof value === "string") return expandString(value, env);

  if (Array.isArray(value)) {
    const out: unknown[] = [];
    for (const item of value) {
      const expanded = expandEnvVars(item, env);
      if (!expanded.ok) return expanded;
      out.push(expanded.value);
    }
    return ok(out);
  }

  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const expanded = expandEnvVars(item, env);
      if (!expanded.ok) return expanded;
      // Own data property, so a key such as `__proto__` stays a key.
      Object.defineProperty(out, key, { value: expanded.value, enumerable: true, writable: true, configurable: true });
    }
    return ok(out);
  }

  return ok(value);
}

function expandString(value: string, env: Env): Result<string, MissingEnvVar> {
  for (const match of value.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (env[name] === undefined) return err({ kind: "missing_env_var", name });
  }
  return ok(value.replace(PLACEHOLDER, (_token, name: string) => env[name] ?? ""));
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
