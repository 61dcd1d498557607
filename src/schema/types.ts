/**
 * Schema Types
 *
 * A schema is an ordered list of field declarations describing the data
 * a template accepts. Field types form a closed tagged union on `kind`;
 * validation switches over it exhaustively.
 */

// ── Field Types ─────────────────────────────────────────────────────

export type FieldType =
  | { kind: "text" }
  | { kind: "number" }
  | { kind: "boolean" }
  /** ISO-8601 date (`2024-03-15`) or date-time string. */
  | { kind: "date" }
  | { kind: "list"; items: FieldType }
  | { kind: "object"; fields: SchemaField[] };

export type FieldKind = FieldType["kind"];

export interface SchemaField {
  name: string;
  type: FieldType;
  required: boolean;
  description?: string;
}

/** Policy for keys present in the data but not declared in the schema. */
export type UnknownFieldPolicy = "ignore" | "reject";

export interface Schema {
  fields: SchemaField[];
  /** Defaults to "ignore"; applies to nested objects as well. */
  unknownFields?: UnknownFieldPolicy;
}

// ── Constructors ────────────────────────────────────────────────────

export const text = (): FieldType => ({ kind: "text" });
export const number = (): FieldType => ({ kind: "number" });
export const boolean = (): FieldType => ({ kind: "boolean" });
export const date = (): FieldType => ({ kind: "date" });
export const list = (items: FieldType): FieldType => ({ kind: "list", items });
export const object = (fields: SchemaField[]): FieldType => ({ kind: "object", fields });

export function field(
  name: string,
  type: FieldType,
  opts: { required?: boolean; description?: string } = {},
): SchemaField {
  const f: SchemaField = { name, type, required: opts.required ?? false };
  if (opts.description !== undefined) f.description = opts.description;
  return f;
}

/** Human-readable rendering of a field type, used in validation messages. */
export function describeType(type: FieldType): string {
  switch (type.kind) {
    case "text":
    case "number":
    case "boolean":
    case "date":
      return type.kind;
    case "list":
      return `list<${describeType(type.items)}>`;
    case "object":
      return "object";
  }
}
