/**
 * Template Types
 *
 * A template pairs markup source with the schema of the data it accepts.
 * Values are treated as immutable: every operation in template.ts returns
 * a new Template.
 */

import type { Schema } from "../schema/types.js";

/** Opaque identifier, unique within a storage backend. */
export type TemplateId = string;

export const TEMPLATE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export interface Template {
  readonly id: TemplateId;
  readonly name: string;
  /** Handlebars markup rendered by the engine. */
  readonly source: string;
  readonly schema: Schema;
  readonly description?: string;
  /** Revision number: 1 on creation, one more with every update. */
  readonly version: number;
  readonly createdAt: Date;
  /** Never earlier than createdAt; refreshed by every update. */
  readonly updatedAt: Date;
}

export interface NewTemplate {
  id: TemplateId;
  name: string;
  source: string;
  schema: Schema;
}

/** Fields an update may change. Absent keys are left untouched. */
export interface TemplatePatch {
  name?: string;
  source?: string;
  schema?: Schema;
  description?: string;
}

/** JSON form of a template, as stored and as served by the API. */
export interface TemplateJson {
  id: string;
  name: string;
  source: string;
  schema: Schema;
  description?: string;
  version: number;
  createdAt: string;
  updatedAt: string;
}
