/**
 * Template — construction, update and data validation.
 */

import { z } from "zod";
import { parseSchema, SchemaJsonSchema } from "../schema/definition.js";
import { validateData } from "../schema/validate.js";
import type { ValidationResult } from "../schema/validate.js";
import { StorageError, ValidationError } from "../shared/errors.js";
import type { Schema } from "../schema/types.js";
import { TEMPLATE_ID_PATTERN } from "./types.js";
import type { NewTemplate, Template, TemplateId, TemplateJson, TemplatePatch } from "./types.js";

// ── Lifecycle ───────────────────────────────────────────────────────

export function isTemplateId(id: string): id is TemplateId {
  return TEMPLATE_ID_PATTERN.test(id);
}

/** New template at version 1, with createdAt = updatedAt = now and no description. */
export function createTemplate(input: NewTemplate, now: Date = new Date()): Template {
  if (!isTemplateId(input.id)) {
    throw new ValidationError("id", "type_mismatch", "template id", `"${input.id}"`);
  }
  const at = new Date(now.getTime());
  return {
    id: input.id,
    name: input.name,
    source: input.source,
    schema: input.schema,
    version: 1,
    createdAt: at,
    updatedAt: at,
  };
}

export function withDescription(template: Template, description: string): Template {
  return { ...template, description };
}

/**
 * Apply the fields present in `patch` as the next version and refresh
 * updatedAt. An empty patch still makes a new version.
 *
 * updatedAt never moves backwards, even if the supplied clock does.
 */
export function updateTemplate(
  template: Template,
  patch: TemplatePatch,
  now: Date = new Date(),
): Template {
  return {
    ...template,
    name: patch.name ?? template.name,
    source: patch.source ?? template.source,
    schema: patch.schema ?? template.schema,
    description: patch.description ?? template.description,
    version: template.version + 1,
    updatedAt: new Date(Math.max(now.getTime(), template.updatedAt.getTime())),
  };
}

export function validateTemplateData(template: Template, data: unknown): ValidationResult {
  return validateData(template.schema, data);
}

// ── JSON Codec ──────────────────────────────────────────────────────

const TemplateRecordSchema = z.object({
  id: z.string().regex(TEMPLATE_ID_PATTERN),
  name: z.string(),
  source: z.string(),
  schema: SchemaJsonSchema,
  description: z.string().optional(),
  // Records written before versioning are the first version.
  version: z.number().int().positive().default(1),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export function templateToJson(template: Template): TemplateJson {
  const json: TemplateJson = {
    id: template.id,
    name: template.name,
    source: template.source,
    schema: template.schema,
    version: template.version,
    createdAt: template.createdAt.toISOString(),
    updatedAt: template.updatedAt.toISOString(),
  };
  if (template.description !== undefined) json.description = template.description;
  return json;
}

/**
 * Decode a stored template record. A record that does not decode is a
 * corrupt store entry, reported as StorageError.
 */
export function parseTemplateRecord(raw: unknown): Template {
  const parsed = TemplateRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageError(`Corrupt template record: ${parsed.error.issues[0].message}`);
  }
  const r = parsed.data;
  const template: Template = {
    id: r.id,
    name: r.name,
    source: r.source,
    schema: decodeStoredSchema(r.id, r.schema),
    version: r.version,
    createdAt: new Date(r.createdAt),
    updatedAt: new Date(r.updatedAt),
  };
  return r.description !== undefined ? withDescription(template, r.description) : template;
}

function decodeStoredSchema(id: string, raw: unknown): Schema {
  try {
    return parseSchema(raw);
  } catch (err) {
    throw new StorageError(`Corrupt schema in template "${id}"`, { cause: err });
  }
}
