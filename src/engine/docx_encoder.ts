import {
  Document,
  HeadingLevel,
  ImageRun,
  Packer,
  PageBreak,
  Paragraph,
  TextRun,
} from "docx";
import { EncodeError, errorMessage } from "../shared/errors.js";
import { PAGE_MARGIN, PAPER_SIZES } from "./paper.js";
import type { Block, DocumentModel, EncodeOptions } from "./types.js";

const FONT = "Arial";
/** docx measures text in half-points and pages in twentieths of a point. */
const HALF_POINTS = 2;
const TWIPS = 20;
const PX_PER_PT = 96 / 72;

const HEADINGS = {
  1: { level: HeadingLevel.HEADING_1, size: 20 },
  2: { level: HeadingLevel.HEADING_2, size: 16 },
  3: { level: HeadingLevel.HEADING_3, size: 13 },
} as const;

/**
 * Encode a DocumentModel as DOCX. `compress` has no effect: the package
 * is always a deflated zip.
 */
export async function encodeDocx(document: DocumentModel, options: EncodeOptions): Promise<Uint8Array> {
  try {
    const [width, height] = PAPER_SIZES[options.paperSize];
    const contentWidth = width - 2 * PAGE_MARGIN;
    const margin = PAGE_MARGIN * TWIPS;

    const doc = new Document({
      sections: [
        {
          properties: {
            page: {
              size: { width: width * TWIPS, height: height * TWIPS },
              margin: { top: margin, right: margin, bottom: margin, left: margin },
            },
          },
          children: document.blocks.map((block) => toParagraph(block, contentWidth)),
        },
      ],
    });

    return await Packer.toBuffer(doc);
  } catch (err) {
    throw new EncodeError(`DOCX encoding failed: ${errorMessage(err)}`, { cause: err });
  }
}

function toParagraph(block: Block, contentWidth: number): Paragraph {
  switch (block.kind) {
    case "heading": {
      const h = HEADINGS[block.level];
      return new Paragraph({
        heading: h.level,
        children: [new TextRun({ text: block.text, bold: true, size: h.size * HALF_POINTS, font: FONT })],
      });
    }
    case "paragraph":
      return new Paragraph({
        children: [new TextRun({ text: block.text, size: 11 * HALF_POINTS, font: FONT })],
      });
    case "bullet":
      return new Paragraph({
        bullet: { level: 0 },
        children: [new TextRun({ text: block.text, size: 11 * HALF_POINTS, font: FONT })],
      });
    case "pageBreak":
      return new Paragraph({ children: [new PageBreak()] });
    case "image": {
      const widthPt = Math.min(block.displayWidth ?? block.width, contentWidth);
      const heightPt = (widthPt * block.height) / block.width;
      return new Paragraph({
        children: [
          new ImageRun({
            data: Buffer.from(block.bytes),
            transformation: {
              width: Math.round(widthPt * PX_PER_PT),
              height: Math.round(heightPt * PX_PER_PT),
            },
          }),
        ],
      });
    }
  }
}
