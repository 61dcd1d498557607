/**
 * Handlebars Engine — Unit Tests
 *
 * Tests:
 *   - Successful compiles into a DocumentModel (partials, images)
 *   - Diagnostics for parse errors, block mismatches, unknown names,
 *     missing images and partials, with spans inside the right file
 *   - Per-world preparation is reused across data updates
 */

import { describe, it, expect } from "vitest";
import { HandlebarsEngine } from "../../src/engine/handlebars_engine.js";
import type { CompileResult, EngineDiagnostic } from "../../src/engine/types.js";
import { MAIN_FILE_ID, TemplateWorld } from "../../src/world/world.js";
import { PNG_4X2 } from "../helpers.js";

function filesOf(entries: Record<string, string | Uint8Array>): Map<string, Uint8Array> {
  return new Map(
    Object.entries(entries).map(([path, content]) => [
      path,
      typeof content === "string" ? new TextEncoder().encode(content) : content,
    ]),
  );
}

function diagnosticsOf(result: CompileResult): EngineDiagnostic[] {
  if (result.ok) throw new Error("expected compile to fail");
  return result.diagnostics;
}

/** Source text covered by a diagnostic, through the world's own resolution. */
function sliceOf(world: TemplateWorld, diagnostic: EngineDiagnostic): string {
  const range = world.resolve(diagnostic.span);
  if (!range) throw new Error(`diagnostic "${diagnostic.message}" did not resolve`);
  const source = Buffer.from(world.source(MAIN_FILE_ID) ?? "");
  expect(range.start).toBeGreaterThanOrEqual(0);
  expect(range.start).toBeLessThanOrEqual(range.end);
  expect(range.end).toBeLessThanOrEqual(source.length);
  return source.subarray(range.start, range.end).toString();
}

describe("HandlebarsEngine", () => {
  const engine = new HandlebarsEngine();

  describe("successful compiles", () => {
    it("expands data and lays out the result", () => {
      const world = TemplateWorld.create("# Report\nHello {{name}}", { name: "Ada" });
      expect(engine.compile(world)).toEqual({
        ok: true,
        document: {
          blocks: [
            { kind: "heading", level: 1, text: "Report" },
            { kind: "paragraph", text: "Hello Ada" },
          ],
        },
      });
    });

    it("does not HTML-escape values", () => {
      const world = TemplateWorld.create("{{company}}", { company: "Smith & <Sons>" });
      const result = engine.compile(world);
      expect(result.ok && result.document.blocks).toEqual([{ kind: "paragraph", text: "Smith & <Sons>" }]);
    });

    it("iterates lists with each", () => {
      const world = TemplateWorld.create("{{#each items}}\n- {{this}}\n{{/each}}", { items: ["a", "b"] });
      const result = engine.compile(world);
      expect(result.ok && result.document.blocks).toEqual([
        { kind: "bullet", text: "a" },
        { kind: "bullet", text: "b" },
      ]);
    });

    it("renders partials from partials/*.hbs", () => {
      const world = TemplateWorld.create("{{> footer}}", { name: "Ada" }, {
        files: filesOf({ "partials/footer.hbs": "Thanks, {{name}}" }),
      });
      const result = engine.compile(world);
      expect(result.ok && result.document.blocks).toEqual([{ kind: "paragraph", text: "Thanks, Ada" }]);
    });

    it("places images referenced by the image helper", () => {
      const world = TemplateWorld.create('Logo:\n{{image "logo.png" width=120}}', {}, {
        files: filesOf({ "logo.png": PNG_4X2 }),
      });
      const result = engine.compile(world);
      if (!result.ok) throw new Error(result.diagnostics[0].message);
      expect(result.document.blocks).toHaveLength(2);
      expect(result.document.blocks[1]).toMatchObject({
        kind: "image",
        path: "logo.png",
        format: "png",
        width: 4,
        height: 2,
        displayWidth: 120,
      });
    });

    it("re-runs against updated data on the same world", () => {
      const world = TemplateWorld.create("Hello {{name}}", { name: "Ada" });
      engine.compile(world);
      world.updateData({ name: "Grace" });
      const result = engine.compile(world);
      expect(result.ok && result.document.blocks).toEqual([{ kind: "paragraph", text: "Hello Grace" }]);
    });
  });

  describe("diagnostics", () => {
    it("reports a parse error on the line it occurs", () => {
      const source = "Title\nHello {{name}";
      const world = TemplateWorld.create(source, { name: "Ada" });
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toMatch(/error on line 2/);
      expect(diagnostic.span?.fileId).toBe(MAIN_FILE_ID);
      expect(world.resolve(diagnostic.span)).toEqual({ start: 6, end: source.length });
    });

    it("points a block mismatch at the opening helper", () => {
      const world = TemplateWorld.create("Intro\n{{#if ok}}yes{{/each}}", { ok: true });
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toBe("if doesn't match each");
      expect(sliceOf(world, diagnostic)).toBe("if");
    });

    it("locates a reference to a name missing from the data", () => {
      const world = TemplateWorld.create("Hello {{name}}, aka {{nickname}}", { name: "Ada" });
      const diagnostics = diagnosticsOf(engine.compile(world));
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].message).toContain('"nickname" not defined');
      expect(sliceOf(world, diagnostics[0])).toContain("nickname");
    });

    it("locates an unknown name after multi-byte text", () => {
      const world = TemplateWorld.create("Grüße {{nme}}", { name: "Ada" });
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toMatch(/^"nme" not defined/);
      expect(world.resolve(diagnostic.span)?.start).toBe(10);
      expect(sliceOf(world, diagnostic)).toContain("nme");
    });

    it("reports a missing image file at its reference", () => {
      const world = TemplateWorld.create('{{image "logo.png"}}', {});
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toBe('image file "logo.png" not found');
      expect(sliceOf(world, diagnostic)).toContain("logo.png");
    });

    it("reports image files that are not PNG or JPEG", () => {
      const world = TemplateWorld.create('{{image "logo.gif"}}', {}, {
        files: filesOf({ "logo.gif": "GIF89a" }),
      });
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toBe('image file "logo.gif" is not a PNG or JPEG');
    });

    it("reports a missing partial", () => {
      const world = TemplateWorld.create("Body\n{{> footer}}", {});
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toBe('partial "footer" not found');
      expect(sliceOf(world, diagnostic)).toContain("footer");
    });

    it("attributes partial parse errors to the partial file", () => {
      const world = TemplateWorld.create("{{> footer}}", {}, {
        files: filesOf({ "partials/footer.hbs": "{{#if x}}" }),
      });
      const diagnostics = diagnosticsOf(engine.compile(world));
      expect(diagnostics[0].span?.fileId).toBe("partials/footer.hbs");
      expect(world.resolve(diagnostics[0].span)).toBeUndefined();
    });

    it("attributes runtime errors inside a partial to the partial file", () => {
      const world = TemplateWorld.create("abcdefghij {{> footer}}\n{{name}}", { name: "Ada" }, {
        files: filesOf({ "partials/footer.hbs": "x {{missing}}" }),
      });
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toMatch(/^"missing" not defined/);
      expect(diagnostic.span?.fileId).toBe("partials/footer.hbs");
      expect(diagnostic.span?.start.line).toBe(1);
      expect(world.resolve(diagnostic.span)).toBeUndefined();
    });

    it("keeps the innermost partial when partials nest", () => {
      const world = TemplateWorld.create("{{> outer}}", {}, {
        files: filesOf({ "partials/outer.hbs": "Outer {{> inner}}", "partials/inner.hbs": "{{gone}}" }),
      });
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.span?.fileId).toBe("partials/inner.hbs");
    });

    it("checks references made from partials", () => {
      const world = TemplateWorld.create("{{> footer}}", {}, {
        files: filesOf({ "partials/footer.hbs": '{{image "seal.png"}}' }),
      });
      const [diagnostic] = diagnosticsOf(engine.compile(world));
      expect(diagnostic.message).toBe('image file "seal.png" not found');
      expect(diagnostic.span?.fileId).toBe("partials/footer.hbs");
    });

    it("reports every reference problem in one pass", () => {
      const world = TemplateWorld.create('{{image "a.png"}}\n{{> missing}}', {});
      const messages = diagnosticsOf(engine.compile(world)).map((d) => d.message);
      expect(messages).toEqual(['image file "a.png" not found', 'partial "missing" not found']);
    });
  });
});
