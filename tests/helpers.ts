/**
 * Shared test fixtures.
 */

import { readFileSync } from "fs";
import { defineSchema } from "../src/schema/definition.js";
import { field, text } from "../src/schema/types.js";
import { createTemplate } from "../src/templates/template.js";
import type { Logger, LogMetadata } from "../src/shared/logger.js";
import type { Template } from "../src/templates/types.js";

/** 4×2 RGB PNG. */
export const PNG_4X2 = new Uint8Array(
  Buffer.from(
    "iVBORw0KGgoAAAANSUhEUgAAAAQAAAACCAIAAADwyuo0AAAAEElEQVR4nGM4IScHRwzIHABvCgghBqXSdgAAAABJRU5ErkJggg==",
    "base64",
  ),
);

/** Lato Regular (OFL): has Ł, ß and ü; lacks ✓ and Greek. */
export const LATO_REGULAR = new Uint8Array(readFileSync(new URL("./fixtures/fonts/Lato-Regular.ttf", import.meta.url)));

/** JPEG header (SOI, APP0, SOF0) for a 64×32 image. Not decodable past the header. */
export const JPEG_64X32_HEADER = new Uint8Array([
  0xff, 0xd8,
  0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01, 0x01, 0x00, 0x00, 0x01, 0x00, 0x01, 0x00, 0x00,
  0xff, 0xc0, 0x00, 0x11, 0x08, 0x00, 0x20, 0x00, 0x40, 0x03, 0x01, 0x22, 0x00, 0x02, 0x11, 0x01, 0x03, 0x11, 0x01,
]);

export const T0 = new Date("2024-05-01T10:00:00.000Z");

export function greetingTemplate(overrides: Partial<Pick<Template, "id" | "source">> = {}): Template {
  return createTemplate(
    {
      id: overrides.id ?? "greeting",
      name: "Greeting",
      source: overrides.source ?? "Hello {{name}}",
      schema: defineSchema([field("name", text(), { required: true })]),
    },
    T0,
  );
}

export function startsWith(bytes: Uint8Array, prefix: string): boolean {
  return Buffer.from(bytes.subarray(0, prefix.length)).toString("latin1") === prefix;
}

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  metadata?: LogMetadata;
}

/** Logger that records every call, for asserting on warnings. */
export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (message, metadata) => entries.push({ level: "debug", message, metadata }),
    info: (message, metadata) => entries.push({ level: "info", message, metadata }),
    warn: (message, metadata) => entries.push({ level: "warn", message, metadata }),
    error: (message, metadata) =>
      entries.push({ level: "error", message: typeof message === "string" ? message : message.message, metadata }),
  };
}
