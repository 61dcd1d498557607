/**
 * Templates — Barrel Export
 */

export type {
  NewTemplate,
  Template,
  TemplateId,
  TemplateJson,
  TemplatePatch,
} from "./types.js";
export { TEMPLATE_ID_PATTERN } from "./types.js";

export {
  createTemplate,
  isTemplateId,
  parseTemplateRecord,
  templateToJson,
  updateTemplate,
  validateTemplateData,
  withDescription,
} from "./template.js";
