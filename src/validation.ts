import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import { SchemaViolationError } from "./errors.js";

export const ajv = new Ajv({ allErrors: false, discriminator: true });

export function describeErrors(errors: ErrorObject[] | null | undefined): { field: string; detail: string } {
  const first = errors?.[0];
  if (!first) return { field: "", detail: "is invalid" };
  const missing = first.keyword === "required" ? `/${String(first.params.missingProperty)}` : "";
  const extra =
    first.keyword === "additionalProperties" ? `/${String(first.params.additionalProperty)}` : "";
  return { field: `${first.instancePath}${missing}${extra}`, detail: first.message ?? "is invalid" };
}

/** Narrows `data` or throws a schema violation naming the task and the field. */
export function assertValid<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  label: string,
  fieldPrefix = ""
): asserts data is T {
  if (validate(data)) return;
  const { field, detail } = describeErrors(validate.errors);
  throw new SchemaViolationError(label, `${fieldPrefix}${field}`, detail);
}
