/**
 * Render Orchestrator — template + data → artifact or positioned diagnostics.
 *
 * Steps:
 *   1. validate data against the template schema (bad input never compiles)
 *   2. build a world, or rebind data on a caller-supplied one
 *   3. compile through the engine
 *   4. encode the document, or resolve diagnostics to source offsets
 *
 * Validation failures and compile diagnostics are returned as outcomes.
 * Only pipeline failures (AdapterError, EncodeError) are thrown.
 */

import { HandlebarsEngine } from "../engine/handlebars_engine.js";
import type {
  CompileResult,
  EncodeOptions,
  EngineDiagnostic,
  TypesettingEngine,
} from "../engine/types.js";
import { validateData } from "../schema/validate.js";
import {
  AdapterError,
  EncodeError,
  RenderPipelineError,
  ValidationError,
  errorMessage,
} from "../shared/errors.js";
import { sha256String } from "../shared/hash.js";
import type { Logger } from "../shared/logger.js";
import { silentLogger } from "../shared/logger.js";
import type { Template } from "../templates/types.js";
import { TemplateWorld } from "../world/world.js";
import { CONTENT_TYPES, normalizeOptions } from "./options.js";
import type { RenderOptions } from "./options.js";

// ── Types ───────────────────────────────────────────────────────────

/** A compile problem located in the template source as UTF-8 byte offsets `[start, end)`. */
export interface RenderDiagnostic {
  message: string;
  start: number;
  end: number;
}

export type RenderOutcome =
  | { status: "succeeded"; artifact: Uint8Array; contentType: string; diagnostics: [] }
  | { status: "failed"; diagnostics: RenderDiagnostic[] }
  | { status: "bad_input"; error: ValidationError };

export interface RenderResult {
  artifact?: Uint8Array;
  diagnostics: RenderDiagnostic[];
  /** Set when the data was rejected before compiling. */
  error?: ValidationError;
}

export interface RenderContext {
  /** World from an earlier render of the same template, to reuse. */
  world?: TemplateWorld;
  /** Template files for a fresh world. Ignored when `world` is given. */
  files?: ReadonlyMap<string, Uint8Array>;
  engine?: TypesettingEngine;
  logger?: Logger;
}

const defaultEngine = new HandlebarsEngine();

// ── Render ──────────────────────────────────────────────────────────

export async function renderTemplate(
  template: Template,
  data: unknown,
  options?: RenderOptions,
  context: RenderContext = {},
): Promise<RenderOutcome> {
  const logger = context.logger ?? silentLogger;
  const engine = context.engine ?? defaultEngine;

  const validation = validateData(template.schema, data);
  if (!validation.ok) {
    logger.debug("Render data rejected", {
      templateId: template.id,
      path: validation.error.path,
      reason: validation.error.reason,
    });
    return { status: "bad_input", error: validation.error };
  }

  const encodeOptions = normalizeOptions(options, logger);
  const world = obtainWorld(template, data, context, logger);

  const started = Date.now();
  const result = compile(world, engine, template);
  logger.debug("Template compiled", {
    templateId: template.id,
    ok: result.ok,
    durationMs: Date.now() - started,
  });

  if (!result.ok) {
    return {
      status: "failed",
      diagnostics: resolveDiagnostics(world, result.diagnostics, template, logger),
    };
  }

  const artifact = await encode(engine, result, encodeOptions, logger);
  logger.debug("Artifact encoded", {
    templateId: template.id,
    format: encodeOptions.format,
    bytes: artifact.length,
  });
  return {
    status: "succeeded",
    artifact,
    contentType: CONTENT_TYPES[encodeOptions.format],
    diagnostics: [],
  };
}

/** Caller-facing shape: an artifact, or the diagnostics explaining why not. */
export function toRenderResult(outcome: RenderOutcome): RenderResult {
  switch (outcome.status) {
    case "succeeded":
      return { artifact: outcome.artifact, diagnostics: [] };
    case "failed":
      return { diagnostics: outcome.diagnostics };
    case "bad_input":
      return { diagnostics: [], error: outcome.error };
  }
}

export async function render(
  template: Template,
  data: unknown,
  options?: RenderOptions,
  context?: RenderContext,
): Promise<RenderResult> {
  return toRenderResult(await renderTemplate(template, data, options, context));
}

// ── Steps ───────────────────────────────────────────────────────────

function obtainWorld(
  template: Template,
  data: unknown,
  context: RenderContext,
  logger: Logger,
): TemplateWorld {
  const world = context.world;
  if (!world) {
    logger.debug("Building fresh world", { templateId: template.id });
    return TemplateWorld.create(template.source, data, {
      templateId: template.id,
      files: context.files,
    });
  }

  if (world.templateId !== template.id) {
    throw new AdapterError(
      `World was built for template "${world.templateId ?? "(none)"}", not "${template.id}"`,
    );
  }
  if (world.sourceHash !== sha256String(template.source)) {
    throw new AdapterError(`World for template "${template.id}" was built from a different source`);
  }
  logger.debug("Reusing world", { templateId: template.id });
  world.updateData(data);
  return world;
}

function compile(world: TemplateWorld, engine: TypesettingEngine, template: Template): CompileResult {
  try {
    return world.compileWith((w) => engine.compile(w));
  } catch (err) {
    if (err instanceof RenderPipelineError) throw err;
    throw new AdapterError(`Engine failed on template "${template.id}": ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

async function encode(
  engine: TypesettingEngine,
  result: Extract<CompileResult, { ok: true }>,
  options: EncodeOptions,
  logger: Logger,
): Promise<Uint8Array> {
  try {
    return await engine.encode(result.document, options, logger);
  } catch (err) {
    if (err instanceof EncodeError) throw err;
    throw new EncodeError(`Encoding failed: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Map engine diagnostics onto the template source. Diagnostics that do
 * not resolve are dropped; when all are dropped, the first message is
 * kept at [0, 0) so a failed render always explains itself.
 */
function resolveDiagnostics(
  world: TemplateWorld,
  diagnostics: readonly EngineDiagnostic[],
  template: Template,
  logger: Logger,
): RenderDiagnostic[] {
  const resolved: RenderDiagnostic[] = [];
  for (const diagnostic of diagnostics) {
    const range = world.resolve(diagnostic.span);
    if (range) {
      resolved.push({ message: diagnostic.message, start: range.start, end: range.end });
    } else {
      logger.warn("Dropped diagnostic without a source position", {
        templateId: template.id,
        message: diagnostic.message,
        fileId: diagnostic.span?.fileId,
      });
    }
  }
  if (resolved.length > 0) return resolved;

  const message = diagnostics[0]?.message ?? "Template failed to compile";
  return [{ message, start: 0, end: 0 }];
}
