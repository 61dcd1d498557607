/**
 * API Payloads — zod schemas for request bodies.
 *
 * Template schemas arrive as raw JSON and go through parseSchema, which
 * also rejects duplicate field names.
 */

import { z } from "zod";
import { TEMPLATE_ID_PATTERN } from "../templates/types.js";

export const CreateTemplateBody = z.object({
  id: z.string().regex(TEMPLATE_ID_PATTERN, "Invalid template id").optional(),
  name: z.string().min(1),
  source: z.string(),
  schema: z.unknown(),
  description: z.string().optional(),
});

export const UpdateTemplateBody = z
  .object({
    name: z.string().min(1).optional(),
    source: z.string().optional(),
    schema: z.unknown().optional(),
    description: z.string().optional(),
  })
  .strict();

export const RenderBody = z.object({
  data: z.unknown(),
  /** Render a kept earlier revision instead of the current one. */
  version: z.number().int().positive().optional(),
  options: z
    .object({
      paperSize: z.string().optional(),
      compress: z.boolean().optional(),
      format: z.enum(["pdf", "docx"]).optional(),
    })
    .optional(),
});

export type CreateTemplateRequest = z.infer<typeof CreateTemplateBody>;
export type UpdateTemplateRequest = z.infer<typeof UpdateTemplateBody>;
export type RenderRequest = z.infer<typeof RenderBody>;

export interface RenderResponse {
  documentBase64: string | null;
  contentType: string | null;
  diagnostics: { message: string; start: number; end: number }[];
}
