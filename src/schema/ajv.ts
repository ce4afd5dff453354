import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

/** Outcome of checking a document against a compiled schema. */
export type SchemaCheckResult<T> = { valid: true; value: T; errors: null } | { valid: false; errors: string };

export type SchemaCheck<T> = (data: unknown) => SchemaCheckResult<T>;

export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}

/** Compile `schema` once; each call reports every violation as one line of text. */
export function compileCheck<T>(ajv: AjvInstance, schema: unknown): SchemaCheck<T> {
  const validate = ajv.compile<T>(schema);
  return (data) =>
    validate(data) ? { valid: true, value: data, errors: null } : { valid: false, errors: ajv.errorsText(validate.errors) };
}
