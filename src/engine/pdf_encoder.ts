/**
 * PDF Encoder — lays a DocumentModel out on pages with pdf-lib.
 *
 * Text is set in the template's own `fonts/` faces when it ships them
 * (embedded and subset through fontkit), otherwise in standard Helvetica.
 * Characters the chosen face has no glyph for are drawn as "?" and
 * reported once per document as a warning.
 *
 * Output is deterministic for a given document and options: the info
 * dictionary (producer, creation/modification dates) is never written.
 */

import fontkitModule from "@pdf-lib/fontkit";
import pdfLib from "pdf-lib";
import type { PDFDocument, PDFFont, PDFPage } from "pdf-lib";
import { EncodeError, errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { silentLogger } from "../shared/logger.js";
import { PAGE_MARGIN, PAPER_SIZES } from "./paper.js";
import type { Block, DocumentFonts, DocumentModel, EncodeOptions } from "./types.js";

const { PDFDocument: PDFDocumentClass, StandardFonts, rgb } = pdfLib;

type Fontkit = Parameters<PDFDocument["registerFontkit"]>[0];

// The UMD build is the fontkit object itself; its typings describe an
// ES default export. Accept whichever shape the loader hands over.
const fontkitCandidates: unknown[] = [fontkitModule, Reflect.get(Object(fontkitModule), "default")];
const fontkit = fontkitCandidates.find(isFontkit);

function isFontkit(value: unknown): value is Fontkit {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "create") === "function";
}

const REPLACEMENT = "?";

const BODY_SIZE = 11;
const HEADING_SIZES: Record<1 | 2 | 3, number> = { 1: 20, 2: 16, 3: 13 };
const LINE_HEIGHT = 1.35;
const BLOCK_GAP = 6;
const BULLET_INDENT = 14;

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
}

export async function encodePdf(
  document: DocumentModel,
  options: EncodeOptions,
  logger: Logger = silentLogger,
): Promise<Uint8Array> {
  try {
    const pdf = await PDFDocumentClass.create({ updateMetadata: false });
    const fonts = await embedFonts(pdf, document.fonts);
    const writer = new PageWriter(pdf, PAPER_SIZES[options.paperSize], fonts);
    for (const block of document.blocks) {
      await writer.write(block);
    }
    if (writer.replaced.size > 0) {
      logger.warn("Replaced characters the font cannot draw", {
        characters: [...writer.replaced].join(""),
        font: fonts.regular.name,
      });
    }
    return await pdf.save({ useObjectStreams: options.compress });
  } catch (err) {
    throw new EncodeError(`PDF encoding failed: ${errorMessage(err)}`, { cause: err });
  }
}

async function embedFonts(pdf: PDFDocument, faces: DocumentFonts | undefined): Promise<Fonts> {
  if (!faces) {
    return {
      regular: await pdf.embedFont(StandardFonts.Helvetica),
      bold: await pdf.embedFont(StandardFonts.HelveticaBold),
    };
  }
  if (!fontkit) throw new EncodeError("Template fonts need fontkit, which did not load");
  pdf.registerFontkit(fontkit);
  const regular = await pdf.embedFont(faces.regular, { subset: true });
  const bold = faces.bold ? await pdf.embedFont(faces.bold, { subset: true }) : regular;
  return { regular, bold };
}

// ── Layout ──────────────────────────────────────────────────────────

class PageWriter {
  /** Characters drawn as the replacement because the face lacks them. */
  readonly replaced = new Set<string>();
  private readonly charsets = new Map<PDFFont, Set<number>>();
  private page: PDFPage | undefined;
  private y = 0;
  private readonly contentWidth: number;
  private readonly contentHeight: number;

  constructor(
    private readonly pdf: PDFDocument,
    private readonly size: [number, number],
    private readonly fonts: Fonts,
  ) {
    this.contentWidth = size[0] - 2 * PAGE_MARGIN;
    this.contentHeight = size[1] - 2 * PAGE_MARGIN;
  }

  async write(block: Block): Promise<void> {
    switch (block.kind) {
      case "heading": {
        const size = HEADING_SIZES[block.level];
        this.text(block.text, this.fonts.bold, size, 0);
        this.y -= size * 0.5;
        return;
      }
      case "paragraph":
        this.text(block.text, this.fonts.regular, BODY_SIZE, 0);
        this.y -= BLOCK_GAP;
        return;
      case "bullet": {
        const top = this.text(block.text, this.fonts.regular, BODY_SIZE, BULLET_INDENT);
        top.page.drawText(this.drawable("•", this.fonts.regular), {
          x: PAGE_MARGIN,
          y: top.baseline,
          size: BODY_SIZE,
          font: this.fonts.regular,
          color: rgb(0, 0, 0),
        });
        this.y -= BLOCK_GAP / 2;
        return;
      }
      case "pageBreak":
        this.page = undefined;
        return;
      case "image":
        await this.image(block);
        return;
    }
  }

  /** Draw wrapped text; returns where the first line was placed. */
  private text(
    text: string,
    font: PDFFont,
    size: number,
    indent: number,
  ): { page: PDFPage; baseline: number } {
    const lineHeight = size * LINE_HEIGHT;
    const lines = wrap(this.drawable(text, font), font, size, this.contentWidth - indent);
    let first: { page: PDFPage; baseline: number } | undefined;

    for (const line of lines) {
      const page = this.reserve(lineHeight);
      const baseline = this.y - size;
      page.drawText(line, { x: PAGE_MARGIN + indent, y: baseline, size, font, color: rgb(0, 0, 0) });
      first ??= { page, baseline };
      this.y -= lineHeight;
    }
    if (first) return first;

    // Empty text still occupies one line.
    const page = this.reserve(lineHeight);
    const baseline = this.y - size;
    this.y -= lineHeight;
    return { page, baseline };
  }

  private async image(block: Extract<Block, { kind: "image" }>): Promise<void> {
    const embedded =
      block.format === "png" ? await this.pdf.embedPng(block.bytes) : await this.pdf.embedJpg(block.bytes);

    let width = Math.min(block.displayWidth ?? block.width, this.contentWidth);
    let height = (width * block.height) / block.width;
    if (height > this.contentHeight) {
      width = (width * this.contentHeight) / height;
      height = this.contentHeight;
    }

    const page = this.reserve(height);
    page.drawImage(embedded, { x: PAGE_MARGIN, y: this.y - height, width, height });
    this.y -= height + BLOCK_GAP;
  }

  /** `text` with every character `font` has no glyph for replaced. */
  private drawable(text: string, font: PDFFont): string {
    let charset = this.charsets.get(font);
    if (!charset) {
      charset = new Set(font.getCharacterSet());
      this.charsets.set(font, charset);
    }
    let out = "";
    for (const ch of text) {
      const code = ch.codePointAt(0);
      if (code !== undefined && charset.has(code)) {
        out += ch;
      } else {
        this.replaced.add(ch);
        out += REPLACEMENT;
      }
    }
    return out;
  }

  /** Current page with at least `height` points left, opening a new one if needed. */
  private reserve(height: number): PDFPage {
    if (!this.page || this.y - height < PAGE_MARGIN) {
      this.page = this.pdf.addPage(this.size);
      this.y = this.size[1] - PAGE_MARGIN;
    }
    return this.page;
  }
}

// ── Line Wrapping ───────────────────────────────────────────────────

export function wrap(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const words = text.split(" ").filter((w) => w.length > 0);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);

    // A single word wider than the line is split by characters.
    current = "";
    for (const ch of word) {
      if (current && font.widthOfTextAtSize(current + ch, size) > maxWidth) {
        lines.push(current);
        current = "";
      }
      current += ch;
    }
  }
  if (current) lines.push(current);
  return lines;
}
