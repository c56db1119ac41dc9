import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** The slice of ajv the registry and the config validator rely on. */
export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

/**
 * ajv 2020-12 with formats. Strict mode stays off: the bundled schemas use
 * untyped `enum` and `oneOf` arms.
 */
export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: false });
  add(ajv);

  return ajv;
}

let shared: Promise<AjvInstance> | null = null;

/** One instance per process, for schemas that never change at run time. */
export function sharedAjv(): Promise<AjvInstance> {
  shared ??= loadAjv();
  return shared;
}
