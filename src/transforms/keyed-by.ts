import { DecisionError } from "../errors.js";
import { isRecord, type JsonObject, type JsonValue } from "../json.js";

const KEYED_BY_PREFIX = "by-";

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `{ "by-level": { "3": ..., "default": ... } }` */
export function keyedByName(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  const keys = Object.keys(value);
  if (keys.length !== 1 || !keys[0].startsWith(KEYED_BY_PREFIX)) return undefined;
  return isRecord(value[keys[0]]) ? keys[0].slice(KEYED_BY_PREFIX.length) : undefined;
}

/**
 * Picks the alternative matching `keys[by]`, falling back to `default`.
 * Alternatives may themselves be keyed by something else.
 */
export function resolveKeyedBy(
  value: JsonValue,
  field: string,
  keys: Readonly<Record<string, string | undefined>>,
  label: string
): JsonValue {
  let current = value;
  for (let by = keyedByName(current); by !== undefined; by = keyedByName(current)) {
    if (!isObject(current)) break;
    const alternatives = current[`${KEYED_BY_PREFIX}${by}`];
    if (!isObject(alternatives)) break;

    const key = keys[by];
    const chosen: JsonValue | undefined =
      key !== undefined && Object.hasOwn(alternatives, key) ? alternatives[key] : alternatives.default;
    if (chosen === undefined) {
      throw new DecisionError(
        "keyed_by_unresolved",
        `task ${label}: ${field} is keyed by ${by}, but ${key === undefined ? `no ${by} is known` : `${by}=${key} has no alternative`} and there is no default`,
        { label }
      );
    }
    current = chosen;
  }
  return current;
}

/** Resolves every keyed-by value found anywhere inside `value`. */
export function resolveKeyedByDeep(
  value: JsonValue,
  keys: Readonly<Record<string, string | undefined>>,
  label: string,
  field = ""
): JsonValue {
  const resolved = keyedByName(value) !== undefined ? resolveKeyedBy(value, field, keys, label) : value;
  if (Array.isArray(resolved)) {
    return resolved.map((item, i) => resolveKeyedByDeep(item, keys, label, `${field}/${i}`));
  }
  if (isObject(resolved)) {
    const out: JsonObject = {};
    for (const [key, child] of Object.entries(resolved)) {
      out[key] = resolveKeyedByDeep(child, keys, label, `${field}/${key}`);
    }
    return out;
  }
  return resolved;
}
