/**
 * Schema Definition — construction and JSON decoding of template schemas.
 *
 * JSON form (as stored and as accepted by the API):
 *
 *   {
 *     "fields": [
 *       { "name": "customer", "required": true,
 *         "type": { "kind": "object", "fields": [
 *           { "name": "name", "type": { "kind": "text" }, "required": true } ] } },
 *       { "name": "lines", "type": { "kind": "list", "items": { "kind": "number" } } }
 *     ],
 *     "unknownFields": "ignore"
 *   }
 */

import { z } from "zod";
import { SchemaDefinitionError } from "../shared/errors.js";
import type { FieldType, Schema, SchemaField, UnknownFieldPolicy } from "./types.js";

// ── Zod Schemas ─────────────────────────────────────────────────────

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const FieldTypeSchema: z.ZodType<FieldType, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("text") }),
    z.object({ kind: z.literal("number") }),
    z.object({ kind: z.literal("boolean") }),
    z.object({ kind: z.literal("date") }),
    z.object({ kind: z.literal("list"), items: FieldTypeSchema }),
    z.object({ kind: z.literal("object"), fields: z.array(SchemaFieldSchema) }),
  ]),
);

export const SchemaFieldSchema: z.ZodType<SchemaField, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().regex(FIELD_NAME, "field names must be identifiers"),
    type: FieldTypeSchema,
    required: z.boolean().default(false),
    description: z.string().optional(),
  }),
);

export const SchemaJsonSchema = z.object({
  fields: z.array(SchemaFieldSchema),
  unknownFields: z.enum(["ignore", "reject"]).optional(),
});

// ── Public API ──────────────────────────────────────────────────────

/**
 * Build a schema from field declarations.
 * Throws SchemaDefinitionError if a field name repeats within one object.
 */
export function defineSchema(
  fields: SchemaField[],
  options: { unknownFields?: UnknownFieldPolicy } = {},
): Schema {
  assertUniqueNames(fields, "");
  const schema: Schema = { fields };
  if (options.unknownFields !== undefined) schema.unknownFields = options.unknownFields;
  return schema;
}

/** Decode and check the JSON form of a schema. */
export function parseSchema(json: unknown): Schema {
  const parsed = SchemaJsonSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
    throw new SchemaDefinitionError(`Invalid schema${where}: ${first.message}`);
  }
  return defineSchema(parsed.data.fields, { unknownFields: parsed.data.unknownFields });
}

// ── Internals ───────────────────────────────────────────────────────

function assertUniqueNames(fields: SchemaField[], prefix: string): void {
  const seen = new Set<string>();
  for (const f of fields) {
    const path = prefix ? `${prefix}.${f.name}` : f.name;
    if (seen.has(f.name)) {
      throw new SchemaDefinitionError(`Duplicate field name "${path}"`);
    }
    seen.add(f.name);
    assertUniqueInType(f.type, path);
  }
}

function assertUniqueInType(type: FieldType, path: string): void {
  switch (type.kind) {
    case "object":
      assertUniqueNames(type.fields, path);
      return;
    case "list":
      assertUniqueInType(type.items, `${path}[]`);
      return;
    default:
      return;
  }
}
