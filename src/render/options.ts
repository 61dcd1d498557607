import { DEFAULT_PAPER_SIZE, isPaperSize } from "../engine/paper.js";
import type { EncodeOptions, OutputFormat } from "../engine/types.js";
import type { Logger } from "../shared/logger.js";

export interface RenderOptions {
  /** a3, a4, a5, letter, legal or tabloid (case-insensitive). Default a4. */
  paperSize?: string;
  /** PDF object streams. Default true; DOCX output ignores it. */
  compress?: boolean;
  format?: OutputFormat;
}

export const DEFAULT_FORMAT: OutputFormat = "pdf";

export const CONTENT_TYPES: Record<OutputFormat, string> = {
  pdf: "application/pdf",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
};

/**
 * Settle every encoder option. Values the encoder cannot honor fall back
 * to their defaults with a warning; they never fail the render.
 */
export function normalizeOptions(options: RenderOptions = {}, logger?: Logger): EncodeOptions {
  let format: OutputFormat = DEFAULT_FORMAT;
  if (options.format === "pdf" || options.format === "docx") {
    format = options.format;
  } else if (options.format !== undefined) {
    logger?.warn("Unsupported output format, using default", {
      requested: options.format,
      fallback: DEFAULT_FORMAT,
    });
  }

  let paperSize = DEFAULT_PAPER_SIZE;
  if (options.paperSize !== undefined) {
    const requested = options.paperSize.trim().toLowerCase();
    if (isPaperSize(requested)) {
      paperSize = requested;
    } else {
      logger?.warn("Unsupported paper size, using default", {
        requested: options.paperSize,
        fallback: DEFAULT_PAPER_SIZE,
      });
    }
  }

  const compress = options.compress ?? true;
  if (format === "docx" && options.compress === false) {
    logger?.debug("compress has no effect on DOCX output");
  }

  return { format, paperSize, compress };
}
