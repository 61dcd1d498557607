import { describe, it, expect } from "vitest";
import { normalizeOptions } from "../../src/render/options.js";
import type { RenderOptions } from "../../src/render/options.js";
import { recordingLogger } from "../helpers.js";

describe("normalizeOptions", () => {
  it("defaults to compressed A4 PDF", () => {
    expect(normalizeOptions()).toEqual({ format: "pdf", paperSize: "a4", compress: true });
  });

  it("accepts paper sizes case-insensitively", () => {
    expect(normalizeOptions({ paperSize: " Letter " }).paperSize).toBe("letter");
    expect(normalizeOptions({ paperSize: "A3" }).paperSize).toBe("a3");
  });

  it("falls back to A4 with a warning for unknown paper sizes", () => {
    const logger = recordingLogger();
    expect(normalizeOptions({ paperSize: "b5" }, logger).paperSize).toBe("a4");
    expect(logger.entries).toEqual([
      {
        level: "warn",
        message: "Unsupported paper size, using default",
        metadata: { requested: "b5", fallback: "a4" },
      },
    ]);
  });

  it("falls back to PDF for unknown formats", () => {
    const logger = recordingLogger();
    const options: RenderOptions = JSON.parse('{"format":"odt"}');
    expect(normalizeOptions(options, logger).format).toBe("pdf");
    expect(logger.entries[0]).toMatchObject({ level: "warn", message: "Unsupported output format, using default" });
  });

  it("passes compress=false through", () => {
    expect(normalizeOptions({ compress: false })).toEqual({ format: "pdf", paperSize: "a4", compress: false });
  });

  it("notes that compress does not apply to DOCX", () => {
    const logger = recordingLogger();
    expect(normalizeOptions({ format: "docx", compress: false }, logger)).toEqual({
      format: "docx",
      paperSize: "a4",
      compress: false,
    });
    expect(logger.entries).toEqual([{ level: "debug", message: "compress has no effect on DOCX output", metadata: undefined }]);
  });
});
