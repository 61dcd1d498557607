/**
 * Engine Types — the contract between the render core and a typesetting
 * engine.
 *
 * The core never interprets a SourceSpan itself; spans are resolved to
 * source offsets through the world that was compiled.
 */

import type { Logger } from "../shared/logger.js";

// ── Source Locations ────────────────────────────────────────────────

export interface SourcePosition {
  /** 1-based. */
  line: number;
  /** 0-based, in string indices. */
  column: number;
}

export interface SourceSpan {
  fileId: string;
  start: SourcePosition;
  end: SourcePosition;
}

export interface EngineDiagnostic {
  message: string;
  span?: SourceSpan;
}

// ── Document Model ──────────────────────────────────────────────────

export type ImageFormat = "png" | "jpeg";

export type Block =
  | { kind: "heading"; level: 1 | 2 | 3; text: string }
  | { kind: "paragraph"; text: string }
  | { kind: "bullet"; text: string }
  | { kind: "pageBreak" }
  | {
      kind: "image";
      path: string;
      bytes: Uint8Array;
      format: ImageFormat;
      /** Intrinsic pixel size. */
      width: number;
      height: number;
      /** Requested display width in points. */
      displayWidth?: number;
    };

/** TrueType/OpenType faces supplied by the template under `fonts/`. */
export interface DocumentFonts {
  regular: Uint8Array;
  bold?: Uint8Array;
}

export interface DocumentModel {
  blocks: Block[];
  fonts?: DocumentFonts;
}

// ── Engine ──────────────────────────────────────────────────────────

/** What an engine may read from a compilation world. */
export interface CompileWorld {
  readonly mainFileId: string;
  source(fileId: string): string | undefined;
  input(name: string): string | undefined;
  file(path: string): Uint8Array | undefined;
  textFile(path: string): string | undefined;
  filePaths(): string[];
}

export type CompileResult =
  | { ok: true; document: DocumentModel }
  | { ok: false; diagnostics: EngineDiagnostic[] };

export type OutputFormat = "pdf" | "docx";

export type PaperSize = "a3" | "a4" | "a5" | "letter" | "legal" | "tabloid";

/** Encoder options after normalization; every field is settled. */
export interface EncodeOptions {
  format: OutputFormat;
  paperSize: PaperSize;
  compress: boolean;
}

export interface TypesettingEngine {
  /** Diagnostics are returned, not thrown. A throw means the engine itself failed. */
  compile(world: CompileWorld): CompileResult;
  /** Rejects with EncodeError. Text the output cannot carry is replaced and logged. */
  encode(document: DocumentModel, options: EncodeOptions, logger?: Logger): Promise<Uint8Array>;
}
