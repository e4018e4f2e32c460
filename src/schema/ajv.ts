import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject } from "ajv";

export type SchemaError = ErrorObject;

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & {
  errors?: SchemaError[] | null;
};

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: SchemaError[] | null | undefined) => string;
};

export type AjvOptions = {
  /** Fill `default` values into the validated data in place. */
  useDefaults?: boolean;
};

export async function loadAjv(opts: AjvOptions = {}): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };

  return new AjvCtor({ allErrors: true, strict: true, useDefaults: opts.useDefaults ?? false });
}
