/**
 * Type mapping between schema type tokens, live values and the five
 * canonical parameter types.
 */
import type { CanonicalType, DefaultValue } from "./ir.js";

/**
 * Built-in YANG types. Anything else (typedefs, prefixed types such as
 * `inet:ipv4-address`) falls back to `string` and is reported by the caller.
 */
export const SCHEMA_TYPE_MAP: Readonly<Record<string, CanonicalType>> = {
  string: "string",
  boolean: "boolean",
  empty: "boolean",
  int8: "integer",
  int16: "integer",
  int32: "integer",
  int64: "integer",
  uint8: "integer",
  uint16: "integer",
  uint32: "integer",
  uint64: "integer",
  decimal64: "number",
  enumeration: "string",
  identityref: "string",
  leafref: "string",
  "instance-identifier": "string",
  binary: "string",
  bits: "string",
  union: "string",
};

export type TypeResolution = {
  type: CanonicalType;
  known: boolean;
};

export function mapSchemaType(token: string): TypeResolution {
  const type = Object.hasOwn(SCHEMA_TYPE_MAP, token)
    ? SCHEMA_TYPE_MAP[token]
    : undefined;
  return type ? { type, known: true } : { type: "string", known: false };
}

const INTEGER_LITERAL = /^[+-]?\d+$/;

function isIntegerLike(value: unknown): boolean {
  if (typeof value === "bigint") return true;
  if (typeof value === "number") return Number.isInteger(value);
  return typeof value === "string" && INTEGER_LITERAL.test(value.trim());
}

function isBooleanLike(value: unknown): boolean {
  return typeof value === "boolean" || value === "true" || value === "false";
}

/**
 * Canonical type of a live sample value, or `undefined` when there is no
 * value to inspect.
 */
export function inferTypeFromValue(value: unknown): CanonicalType | undefined {
  if (value === undefined || value === null) return undefined;
  if (Array.isArray(value)) return "array";
  if (isBooleanLike(value)) return "boolean";
  if (isIntegerLike(value)) return "integer";
  if (typeof value === "number" && Number.isFinite(value)) return "number";
  return "string";
}

/**
 * Runtime kind recorded as `schemaType` for reflectively discovered leafs.
 */
export function describeRuntimeKind(value: unknown): string {
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export type CoercionResult =
  | { ok: true; value: DefaultValue }
  | { ok: false; reason: string };

/**
 * Convert a default literal into a value of the given canonical type.
 */
export function coerceDefault(raw: string, type: CanonicalType): CoercionResult {
  switch (type) {
    case "string":
      return { ok: true, value: raw };
    case "array":
      return { ok: true, value: [raw] };
    case "boolean":
      if (raw === "true") return { ok: true, value: true };
      if (raw === "false") return { ok: true, value: false };
      return { ok: false, reason: `"${raw}" is not a boolean` };
    case "integer": {
      if (!INTEGER_LITERAL.test(raw)) {
        return { ok: false, reason: `"${raw}" is not an integer` };
      }
      const value = Number(raw);
      if (!Number.isSafeInteger(value)) {
        return { ok: false, reason: `"${raw}" is outside the safe integer range` };
      }
      return { ok: true, value };
    }
    case "number": {
      const value = raw.trim() === "" ? Number.NaN : Number(raw);
      if (!Number.isFinite(value)) {
        return { ok: false, reason: `"${raw}" is not a number` };
      }
      return { ok: true, value };
    }
  }
}

/**
 * Convert a live scalar into a default of the given canonical type, if it fits.
 */
export function defaultFromValue(
  value: unknown,
  type: CanonicalType,
): DefaultValue | undefined {
  if (value === undefined || value === null) return undefined;
  if (type === "array") {
    return Array.isArray(value) ? value.map((item) => String(item)) : undefined;
  }
  if (typeof value === "bigint") {
    const coerced = coerceDefault(value.toString(), type);
    return coerced.ok ? coerced.value : undefined;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    const coerced = coerceDefault(String(value), type);
    return coerced.ok ? coerced.value : undefined;
  }
  return undefined;
}
