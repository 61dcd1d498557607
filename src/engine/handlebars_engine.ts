/**
 * Handlebars Engine — compiles template markup against bound data.
 *
 * Compile has two stages:
 *   1. prepare (once per world): parse the main file, register partials
 *      from `partials/*.hbs`, check literal `{{image "…"}}` and `{{> name}}`
 *      references against the world's files, pick up `fonts/*.ttf|otf`,
 *      compile in strict mode.
 *   2. run (every compile): decode the `data` input, execute the compiled
 *      template and lay the expanded text out as a DocumentModel.
 *
 * Stage 1 is memoized per world, so a reused world only pays for stage 2.
 * Every failure the template author can cause becomes an EngineDiagnostic
 * whose span points into the file that caused it.
 */

import type { HelperOptions, RuntimeOptions } from "handlebars";
import Handlebars from "handlebars";
import { encodeDocx } from "./docx_encoder.js";
import { readImageInfo } from "./images.js";
import { imagePlaceholder, layoutMarkup } from "./markup.js";
import type { PlacedImage } from "./markup.js";
import { encodePdf } from "./pdf_encoder.js";
import type { Logger } from "../shared/logger.js";
import type {
  CompileResult,
  CompileWorld,
  DocumentFonts,
  DocumentModel,
  EncodeOptions,
  EngineDiagnostic,
  SourceSpan,
  TypesettingEngine,
} from "./types.js";

/** Input name under which the world binds the serialized data. */
export const DATA_INPUT = "data";

const PARTIAL_FILE = /^partials\/(.+)\.hbs$/;
const FONT_FILE = /^fonts\/[^/]+\.(?:ttf|otf)$/i;

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

const COMPILE_OPTIONS = { strict: true, noEscape: true };

interface Prepared {
  diagnostics: EngineDiagnostic[];
  render?: CompiledTemplate;
  /** Parsed sources keyed by file id, main file included. */
  asts: Map<string, unknown>;
  /** File id of the partial each runtime error was thrown from. */
  origins: WeakMap<object, string>;
  fonts?: DocumentFonts;
  /** Images collected by the `image` helper during the current run. */
  images: PlacedImage[];
}

export class HandlebarsEngine implements TypesettingEngine {
  private readonly prepared = new WeakMap<CompileWorld, Prepared>();

  compile(world: CompileWorld): CompileResult {
    let prepared = this.prepared.get(world);
    if (!prepared) {
      prepared = prepare(world);
      this.prepared.set(world, prepared);
    }
    if (!prepared.render) {
      return { ok: false, diagnostics: prepared.diagnostics };
    }
    return run(world, prepared, prepared.render);
  }

  async encode(document: DocumentModel, options: EncodeOptions, logger?: Logger): Promise<Uint8Array> {
    switch (options.format) {
      case "pdf":
        return encodePdf(document, options, logger);
      case "docx":
        return encodeDocx(document, options);
    }
  }
}

// ── Stage 1: prepare ────────────────────────────────────────────────

function prepare(world: CompileWorld): Prepared {
  const mainId = world.mainFileId;
  const source = world.source(mainId) ?? "";
  const prepared: Prepared = { diagnostics: [], asts: new Map(), origins: new WeakMap(), images: [] };

  let ast: unknown;
  try {
    ast = Handlebars.parse(source);
  } catch (err) {
    prepared.diagnostics.push(diagnosticFromError(err, mainId, source));
    return prepared;
  }
  prepared.asts.set(mainId, ast);

  const env = Handlebars.create();
  registerHelpers(env, world, prepared);

  for (const path of world.filePaths()) {
    const match = PARTIAL_FILE.exec(path);
    if (!match) continue;
    const text = world.textFile(path) ?? "";
    let partialAst: unknown;
    try {
      partialAst = env.parse(text);
    } catch (err) {
      prepared.diagnostics.push(diagnosticFromError(err, path, text));
      continue;
    }
    prepared.asts.set(path, partialAst);
    checkReferences(partialAst, world, path, prepared.diagnostics);
    env.registerPartial(match[1], tagErrors(env.compile(partialAst, COMPILE_OPTIONS), path, prepared.origins));
  }

  checkReferences(ast, world, mainId, prepared.diagnostics);
  if (prepared.diagnostics.length > 0) return prepared;

  prepared.fonts = collectFonts(world);
  prepared.render = env.compile(ast, COMPILE_OPTIONS);
  return prepared;
}

/**
 * Wrap a compiled partial so errors escaping it remember the partial's
 * file. Nested partials tag first; outer wrappers keep the inner tag.
 */
function tagErrors(
  partial: CompiledTemplate,
  fileId: string,
  origins: WeakMap<object, string>,
): CompiledTemplate {
  return (context: unknown, options?: RuntimeOptions) => {
    try {
      return partial(context, options);
    } catch (err) {
      if (isObject(err) && !origins.has(err)) origins.set(err, fileId);
      throw err;
    }
  };
}

/** First `fonts/` face is the body face; one with "bold" in its name sets headings. */
function collectFonts(world: CompileWorld): DocumentFonts | undefined {
  const faces = world.filePaths().filter((path) => FONT_FILE.test(path));
  const boldPath = faces.find((path) => /bold/i.test(path));
  const regularPath = faces.find((path) => path !== boldPath) ?? boldPath;
  const regular = regularPath === undefined ? undefined : world.file(regularPath);
  if (!regular) return undefined;
  const bold = boldPath !== undefined && boldPath !== regularPath ? world.file(boldPath) : undefined;
  return bold ? { regular, bold } : { regular };
}

function registerHelpers(env: typeof Handlebars, world: CompileWorld, prepared: Prepared): void {
  env.registerHelper("image", (path: unknown, options: HelperOptions) => {
    if (typeof path !== "string") {
      throw new Error(`image expects a file path, got ${typeof path}`);
    }
    const bytes = world.file(path);
    const info = bytes ? readImageInfo(bytes) : undefined;
    if (!bytes || !info) {
      throw new Error(`image "${path}" is not a PNG or JPEG template file`);
    }
    const width: unknown = options.hash.width;
    const image: PlacedImage = { kind: "image", path, bytes, ...info };
    if (typeof width === "number" && width > 0) image.displayWidth = width;
    prepared.images.push(image);
    return imagePlaceholder(prepared.images.length - 1);
  });
}

/** Literal image and partial references must name files the world has. */
function checkReferences(
  ast: unknown,
  world: CompileWorld,
  fileId: string,
  diagnostics: EngineDiagnostic[],
): void {
  walk(ast, (node) => {
    if (node.type === "MustacheStatement" && pathName(node.path) === "image") {
      const params = Array.isArray(node.params) ? node.params : [];
      const first: unknown = params[0];
      if (!isNode(first) || first.type !== "StringLiteral") return;
      const value = first.value;
      if (typeof value !== "string") return;
      const bytes = world.file(value);
      if (!bytes) {
        diagnostics.push({ message: `image file "${value}" not found`, span: spanOf(first, fileId) });
      } else if (!readImageInfo(bytes)) {
        diagnostics.push({ message: `image file "${value}" is not a PNG or JPEG`, span: spanOf(first, fileId) });
      }
      return;
    }
    if (node.type === "PartialStatement" || node.type === "PartialBlockStatement") {
      const name = pathName(node.name);
      if (name === undefined || node.type === "PartialBlockStatement") return;
      if (!world.file(`partials/${name}.hbs`)) {
        diagnostics.push({ message: `partial "${name}" not found`, span: spanOf(node, fileId) });
      }
    }
  });
}

// ── Stage 2: run ────────────────────────────────────────────────────

function run(world: CompileWorld, prepared: Prepared, render: CompiledTemplate): CompileResult {
  const raw = world.input(DATA_INPUT);
  if (raw === undefined) {
    return { ok: false, diagnostics: [{ message: `no "${DATA_INPUT}" input is bound` }] };
  }
  const context: unknown = JSON.parse(raw);

  prepared.images = [];
  let text: string;
  try {
    text = render(context);
  } catch (err) {
    const fileId = (isObject(err) ? prepared.origins.get(err) : undefined) ?? world.mainFileId;
    const diagnostic = diagnosticFromError(err, fileId, world.source(fileId) ?? "");
    diagnostic.span ??= locateByName(err, prepared.asts.get(fileId), fileId);
    return { ok: false, diagnostics: [diagnostic] };
  }

  const document = layoutMarkup(text, prepared.images);
  if (prepared.fonts) document.fonts = prepared.fonts;
  prepared.images = [];
  return { ok: true, document };
}

// ── Diagnostics ─────────────────────────────────────────────────────

const PARSE_LINE = /on line (\d+)/;
const LOCATION_SUFFIX = /\s-\s\d+:\d+$/;
const NAMED_ERROR = /^(?:"([^"]+)" not defined|Missing helper: "([^"]+)")/;

function diagnosticFromError(err: unknown, fileId: string, source: string): EngineDiagnostic {
  const message = cleanMessage(err instanceof Error ? err.message : String(err));
  const span = spanFromException(err, fileId) ?? spanFromParseMessage(err, fileId, source);
  return span ? { message, span } : { message };
}

/** Handlebars exceptions carry lineNumber/column (and end*) when they know the node. */
function spanFromException(err: unknown, fileId: string): SourceSpan | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const line = numberProp(err, "lineNumber");
  const column = numberProp(err, "column");
  if (line === undefined || column === undefined) return undefined;
  return {
    fileId,
    start: { line, column },
    end: {
      line: numberProp(err, "endLineNumber") ?? line,
      column: numberProp(err, "endColumn") ?? column,
    },
  };
}

/** Parser and lexer errors only name a line; the span covers all of it. */
function spanFromParseMessage(err: unknown, fileId: string, source: string): SourceSpan | undefined {
  if (!(err instanceof Error)) return undefined;
  const match = PARSE_LINE.exec(err.message);
  if (!match) return undefined;
  const line = Number(match[1]);
  const text = source.split("\n")[line - 1];
  if (text === undefined) return undefined;
  return { fileId, start: { line, column: 0 }, end: { line, column: text.length } };
}

/** Fallback for runtime errors without a location: the first path using the name. */
function locateByName(err: unknown, ast: unknown, fileId: string): SourceSpan | undefined {
  if (!(err instanceof Error)) return undefined;
  const match = NAMED_ERROR.exec(err.message);
  const name = match ? match[1] ?? match[2] : undefined;
  if (!name) return undefined;

  let found: SourceSpan | undefined;
  walk(ast, (node) => {
    if (found || node.type !== "PathExpression") return;
    const parts = Array.isArray(node.parts) ? node.parts : [];
    if (node.original === name || parts.includes(name)) found = spanOf(node, fileId);
  });
  return found;
}

function cleanMessage(message: string): string {
  const lines = message.split("\n").filter((l) => l.trim() !== "");
  // "Parse error on line N:" / source excerpt / caret / "Expecting …"
  const summary = lines.length >= 4 ? `${lines[0]} ${lines[lines.length - 1]}` : lines.join(" ");
  return summary.replace(LOCATION_SUFFIX, "");
}

// ── AST Helpers ─────────────────────────────────────────────────────

interface AstNode {
  type: string;
  [key: string]: unknown;
}

function isNode(value: unknown): value is AstNode {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "type") === "string";
}

function walk(value: unknown, visit: (node: AstNode) => void): void {
  if (Array.isArray(value)) {
    for (const item of value) walk(item, visit);
    return;
  }
  if (!isNode(value)) return;
  visit(value);
  for (const [key, child] of Object.entries(value)) {
    if (key !== "loc") walk(child, visit);
  }
}

function pathName(value: unknown): string | undefined {
  if (!isNode(value) || value.type !== "PathExpression") return undefined;
  const original = value.original;
  return typeof original === "string" ? original : undefined;
}

function spanOf(node: AstNode, fileId: string): SourceSpan | undefined {
  const loc = node.loc;
  if (typeof loc !== "object" || loc === null) return undefined;
  const start: unknown = Reflect.get(loc, "start");
  const end: unknown = Reflect.get(loc, "end");
  if (typeof start !== "object" || start === null || typeof end !== "object" || end === null) {
    return undefined;
  }
  const startLine = numberProp(start, "line");
  const startColumn = numberProp(start, "column");
  const endLine = numberProp(end, "line");
  const endColumn = numberProp(end, "column");
  if (startLine === undefined || startColumn === undefined || endLine === undefined || endColumn === undefined) {
    return undefined;
  }
  return {
    fileId,
    start: { line: startLine, column: startColumn },
    end: { line: endLine, column: endColumn },
  };
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function numberProp(obj: object, key: string): number | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "number" ? value : undefined;
}
