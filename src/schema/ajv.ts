import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject } from "ajv";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & {
  errors?: ErrorObject[] | null;
};

export type AjvInstance = {
  compile: <T = unknown>(schema: object) => AjvValidateFn<T>;
  errorsText: (errors?: ErrorObject[] | null) => string;
};

export type AjvOptions = {
  /** Reject unknown keywords and formats; off for schemas written by others. */
  strict?: boolean;
};

/** Draft 2020-12 validator with format support. */
export async function loadAjv(opts: AjvOptions = {}): Promise<AjvInstance> {
  // Both packages are CommonJS with a default export; under NodeNext the
  // default import is the module object, which the typings do not model.
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: opts.strict ?? true });
  add(ajv);
  return ajv;
}
