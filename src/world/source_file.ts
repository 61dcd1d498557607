import type { SourcePosition } from "../engine/types.js";

/**
 * A text file exposed to the engine, with a line index for turning
 * (line, column) positions back into UTF-8 byte offsets.
 *
 * Columns arrive as string indices within the line; offsets leave as
 * bytes into the encoded source.
 */
export class SourceFile {
  readonly id: string;
  readonly text: string;
  /** Byte length of the UTF-8 encoded text. */
  readonly byteLength: number;
  private readonly lineStarts: number[];
  private readonly lineByteStarts: number[];

  constructor(id: string, text: string) {
    this.id = id;
    this.text = text;
    this.lineStarts = [0];
    this.lineByteStarts = [0];
    let bytes = 0;
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      bytes += utf8Width(code, text.charCodeAt(i + 1));
      if (code >= 0xd800 && code <= 0xdbff && isLowSurrogate(text.charCodeAt(i + 1))) i++;
      if (code === 10) {
        this.lineStarts.push(i + 1);
        this.lineByteStarts.push(bytes);
      }
    }
    this.byteLength = bytes;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Byte offset of a 1-based line / 0-based column, or undefined when out of range. */
  offsetOf(position: SourcePosition): number | undefined {
    const { line, column } = position;
    if (!Number.isInteger(line) || !Number.isInteger(column)) return undefined;
    if (line < 1 || line > this.lineStarts.length || column < 0) return undefined;
    const start = this.lineStarts[line - 1];
    const lineEnd = line < this.lineStarts.length ? this.lineStarts[line] - 1 : this.text.length;
    if (start + column > lineEnd) return undefined;

    let bytes = this.lineByteStarts[line - 1];
    for (let i = start; i < start + column; i++) {
      const code = this.text.charCodeAt(i);
      bytes += utf8Width(code, this.text.charCodeAt(i + 1));
      if (code >= 0xd800 && code <= 0xdbff && isLowSurrogate(this.text.charCodeAt(i + 1))) {
        // A column never splits a surrogate pair.
        if (i + 1 === start + column) return undefined;
        i++;
      }
    }
    return bytes;
  }
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** UTF-8 width of the code point starting with `code`; lone surrogates encode as U+FFFD. */
function utf8Width(code: number, next: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code >= 0xd800 && code <= 0xdbff && isLowSurrogate(next)) return 4;
  return 3;
}
