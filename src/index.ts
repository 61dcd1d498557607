/**
 * Pressroom — public API.
 */

// Schema
export { boolean, date, describeType, field, list, number, object, text } from "./schema/types.js";
export type { FieldKind, FieldType, Schema, SchemaField, UnknownFieldPolicy } from "./schema/types.js";
export { defineSchema, parseSchema } from "./schema/definition.js";
export { describeValue, validateData } from "./schema/validate.js";
export type { ValidationResult } from "./schema/validate.js";

// Templates
export * from "./templates/index.js";

// Engine
export { DATA_INPUT, HandlebarsEngine } from "./engine/handlebars_engine.js";
export { layoutMarkup } from "./engine/markup.js";
export { encodePdf } from "./engine/pdf_encoder.js";
export { encodeDocx } from "./engine/docx_encoder.js";
export type {
  Block,
  CompileResult,
  CompileWorld,
  DocumentModel,
  EncodeOptions,
  EngineDiagnostic,
  OutputFormat,
  PaperSize,
  SourceSpan,
  TypesettingEngine,
} from "./engine/types.js";

// World
export * from "./world/index.js";

// Render
export { render, renderTemplate, toRenderResult } from "./render/render.js";
export type {
  RenderContext,
  RenderDiagnostic,
  RenderOutcome,
  RenderResult,
} from "./render/render.js";
export { CONTENT_TYPES, normalizeOptions } from "./render/options.js";
export type { RenderOptions } from "./render/options.js";
export { RenderService } from "./render/service.js";
export type { CreateTemplateInput, RenderServiceOptions } from "./render/service.js";

// Storage
export * from "./storage/index.js";

// API
export { createApp } from "./api/app.js";
export type { AppDependencies } from "./api/app.js";

// Shared
export * from "./shared/errors.js";
export { loadConfig } from "./shared/config.js";
export type { AppConfig } from "./shared/config.js";
export { createLogger, silentLogger } from "./shared/logger.js";
export type { Logger, LoggerConfig, LogLevel, LogMetadata } from "./shared/logger.js";
