/**
 * Template World — the compilation environment handed to the engine.
 *
 * Presents the template source as the single main file, the template's
 * auxiliary files (images, partials) as read-only bytes, and the render
 * data serialized as JSON under the `data` input.
 *
 * A world may be kept and reused for later renders of the same template:
 * `updateData` swaps the bound input and keeps everything the engine
 * prepared for the source. Reuse is strictly sequential. A world whose
 * compile was interrupted is poisoned and must be discarded.
 */

import { DATA_INPUT } from "../engine/handlebars_engine.js";
import type { CompileWorld, SourceSpan } from "../engine/types.js";
import { AdapterError, errorMessage } from "../shared/errors.js";
import { sha256String } from "../shared/hash.js";
import { SourceFile } from "./source_file.js";

export const MAIN_FILE_ID = "/main.hbs";

export interface WorldOptions {
  /** Template the world is built for; checked when the world is reused. */
  templateId?: string;
  /** Template files keyed by relative path. */
  files?: ReadonlyMap<string, Uint8Array>;
}

/** UTF-8 byte offsets into the main source, end exclusive. */
export interface SourceRange {
  start: number;
  end: number;
}

type WorldState = "idle" | "compiling" | "poisoned";

export class TemplateWorld implements CompileWorld {
  readonly mainFileId = MAIN_FILE_ID;
  readonly templateId: string | undefined;
  readonly sourceHash: string;

  private readonly main: SourceFile;
  private readonly files: ReadonlyMap<string, Uint8Array>;
  private readonly texts = new Map<string, string>();
  private readonly inputs = new Map<string, string>();
  private state: WorldState = "idle";

  private constructor(source: string, serializedData: string, options: WorldOptions) {
    this.main = new SourceFile(MAIN_FILE_ID, source);
    this.sourceHash = sha256String(source);
    this.templateId = options.templateId;
    this.files = new Map(options.files ?? []);
    this.inputs.set(DATA_INPUT, serializedData);
  }

  /** Throws AdapterError when `data` cannot be serialized. */
  static create(source: string, data: unknown, options: WorldOptions = {}): TemplateWorld {
    return new TemplateWorld(source, serializeData(data), options);
  }

  /**
   * Replace the bound data. On failure the previous data stays bound.
   */
  updateData(data: unknown): void {
    this.assertUsable("update data of");
    this.inputs.set(DATA_INPUT, serializeData(data));
  }

  // ── CompileWorld ────────────────────────────────────────────────

  source(fileId: string): string | undefined {
    return fileId === MAIN_FILE_ID ? this.main.text : this.textFile(fileId);
  }

  input(name: string): string | undefined {
    return this.inputs.get(name);
  }

  file(path: string): Uint8Array | undefined {
    return this.files.get(path);
  }

  textFile(path: string): string | undefined {
    const cached = this.texts.get(path);
    if (cached !== undefined) return cached;
    const bytes = this.files.get(path);
    if (!bytes) return undefined;
    const text = new TextDecoder().decode(bytes);
    this.texts.set(path, text);
    return text;
  }

  filePaths(): string[] {
    return [...this.files.keys()].sort();
  }

  // ── Diagnostics ─────────────────────────────────────────────────

  /**
   * Map an engine span to byte offsets into the main source. Spans in
   * other files or outside the source resolve to undefined.
   */
  resolve(span: SourceSpan | undefined): SourceRange | undefined {
    if (!span || span.fileId !== MAIN_FILE_ID) return undefined;
    const start = this.main.offsetOf(span.start);
    const end = this.main.offsetOf(span.end);
    if (start === undefined || end === undefined || end < start) return undefined;
    return { start, end };
  }

  // ── Sequential-use Guard ────────────────────────────────────────

  get reusable(): boolean {
    return this.state === "idle";
  }

  get poisoned(): boolean {
    return this.state === "poisoned";
  }

  /**
   * Run `fn` as this world's compile. Overlapping compiles are rejected;
   * a compile that throws poisons the world.
   */
  compileWith<T>(fn: (world: TemplateWorld) => T): T {
    this.assertUsable("compile");
    this.state = "compiling";
    let result: T;
    try {
      result = fn(this);
    } catch (err) {
      this.state = "poisoned";
      throw err;
    }
    this.state = "idle";
    return result;
  }

  private assertUsable(action: string): void {
    if (this.state === "compiling") {
      throw new AdapterError(`Cannot ${action} a world that is already compiling`);
    }
    if (this.state === "poisoned") {
      throw new AdapterError(`Cannot ${action} a world left inconsistent by an interrupted compile`);
    }
  }
}

function serializeData(data: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(data);
  } catch (err) {
    throw new AdapterError(`Render data cannot be serialized: ${errorMessage(err)}`, { cause: err });
  }
  if (json === undefined) {
    throw new AdapterError("Render data cannot be serialized: value has no JSON form");
  }
  return json;
}
