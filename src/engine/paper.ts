import pdfLib from "pdf-lib";
import type { PaperSize } from "./types.js";

const { PageSizes } = pdfLib;

/** Page dimensions in PDF points (1/72 in), portrait. */
export const PAPER_SIZES: Record<PaperSize, [number, number]> = {
  a3: PageSizes.A3,
  a4: PageSizes.A4,
  a5: PageSizes.A5,
  letter: PageSizes.Letter,
  legal: PageSizes.Legal,
  tabloid: PageSizes.Tabloid,
};

export const DEFAULT_PAPER_SIZE: PaperSize = "a4";

/** Page margin on every side, in points. */
export const PAGE_MARGIN = 56;

export function isPaperSize(value: string): value is PaperSize {
  return Object.prototype.hasOwnProperty.call(PAPER_SIZES, value);
}
