/**
 * Schema Validation — checks a candidate data value against a Schema.
 *
 * Fail-fast: fields are visited in declaration order (depth first) and the
 * first violation is reported. Pure function of (schema, data).
 */

import { z } from "zod";
import { ValidationError } from "../shared/errors.js";
import { describeType } from "./types.js";
import type { FieldType, Schema, SchemaField, UnknownFieldPolicy } from "./types.js";

export type ValidationResult = { ok: true } | { ok: false; error: ValidationError };

const IsoDate = z.union([z.string().date(), z.string().datetime({ offset: true })]);

export function validateData(schema: Schema, data: unknown): ValidationResult {
  const policy = schema.unknownFields ?? "ignore";
  if (!isPlainObject(data)) {
    return fail("", "type_mismatch", "object", describeValue(data));
  }
  const error = checkObject(schema.fields, data, "", policy);
  return error ? { ok: false, error } : { ok: true };
}

// ── Walkers ─────────────────────────────────────────────────────────

function checkObject(
  fields: SchemaField[],
  value: Record<string, unknown>,
  prefix: string,
  policy: UnknownFieldPolicy,
): ValidationError | undefined {
  for (const f of fields) {
    const path = prefix ? `${prefix}.${f.name}` : f.name;
    const present = Object.prototype.hasOwnProperty.call(value, f.name);
    const v = present ? value[f.name] : undefined;

    if (v === undefined || v === null) {
      if (f.required) return new ValidationError(path, "missing", describeType(f.type), describeValue(v));
      continue;
    }

    const error = checkValue(f.type, v, path, policy);
    if (error) return error;
  }

  if (policy === "reject") {
    const declared = new Set(fields.map((f) => f.name));
    for (const key of Object.keys(value)) {
      if (!declared.has(key)) {
        const path = prefix ? `${prefix}.${key}` : key;
        return new ValidationError(path, "unknown_field", "no field", describeValue(value[key]));
      }
    }
  }
  return undefined;
}

function checkValue(
  type: FieldType,
  value: unknown,
  path: string,
  policy: UnknownFieldPolicy,
): ValidationError | undefined {
  const mismatch = () => new ValidationError(path, "type_mismatch", describeType(type), describeValue(value));

  switch (type.kind) {
    case "text":
      return typeof value === "string" ? undefined : mismatch();
    case "number":
      return typeof value === "number" && Number.isFinite(value) ? undefined : mismatch();
    case "boolean":
      return typeof value === "boolean" ? undefined : mismatch();
    case "date":
      return IsoDate.safeParse(value).success ? undefined : mismatch();
    case "list": {
      if (!Array.isArray(value)) return mismatch();
      for (let i = 0; i < value.length; i++) {
        const item: unknown = value[i];
        const error = checkValue(type.items, item, `${path}[${i}]`, policy);
        if (error) return error;
      }
      return undefined;
    }
    case "object":
      return isPlainObject(value) ? checkObject(type.fields, value, path, policy) : mismatch();
  }
}

// ── Helpers ─────────────────────────────────────────────────────────

function fail(
  path: string,
  reason: "type_mismatch",
  expected: string,
  actual: string,
): ValidationResult {
  return { ok: false, error: new ValidationError(path, reason, expected, actual) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Short runtime-shape label for error messages. */
export function describeValue(value: unknown): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number" && !Number.isFinite(value)) return "non-finite number";
  if (typeof value === "string" && value.length <= 40) return `string "${value}"`;
  return typeof value;
}
