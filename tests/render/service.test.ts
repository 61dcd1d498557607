import { describe, it, expect, beforeEach } from "vitest";
import { RenderService } from "../../src/render/service.js";
import type { CompileResult, CompileWorld, EncodeOptions, TypesettingEngine } from "../../src/engine/types.js";
import { defineSchema } from "../../src/schema/definition.js";
import { field, text } from "../../src/schema/types.js";
import { ConflictError, NotFoundError } from "../../src/shared/errors.js";
import { InMemoryTemplateStorage } from "../../src/storage/memory_storage.js";
import { WorldPool } from "../../src/world/pool.js";

/** Records which worlds it compiles and which files they carried. */
class SpyEngine implements TypesettingEngine {
  readonly worlds: CompileWorld[] = [];

  compile(world: CompileWorld): CompileResult {
    this.worlds.push(world);
    return { ok: true, document: { blocks: [{ kind: "paragraph", text: world.filePaths().join(",") }] } };
  }

  async encode(_document: unknown, _options: EncodeOptions): Promise<Uint8Array> {
    return new Uint8Array([0]);
  }
}

const schema = defineSchema([field("name", text(), { required: true })]);

describe("RenderService", () => {
  let storage: InMemoryTemplateStorage;
  let engine: SpyEngine;
  let pool: WorldPool;
  let service: RenderService;

  beforeEach(async () => {
    storage = new InMemoryTemplateStorage();
    engine = new SpyEngine();
    pool = new WorldPool();
    service = new RenderService({ storage, engine, pool });
    await service.createTemplate({ id: "greeting", name: "Greeting", source: "Hello {{name}}", schema });
  });

  describe("templates", () => {
    it("stores created templates", async () => {
      const stored = await storage.getTemplate("greeting");
      expect(stored.name).toBe("Greeting");
      expect(stored.createdAt).toEqual(stored.updatedAt);
    });

    it("assigns a UUID when no id is given", async () => {
      const created = await service.createTemplate({ name: "Anon", source: "", schema, description: "No id" });
      expect(created.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(created.description).toBe("No id");
      expect((await storage.getTemplate(created.id)).description).toBe("No id");
    });

    it("refuses to overwrite an existing template", async () => {
      await expect(
        service.createTemplate({ id: "greeting", name: "Again", source: "", schema }),
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it("updates and deletes by id", async () => {
      const updated = await service.updateTemplate("greeting", { name: "Hi" });
      expect(updated.name).toBe("Hi");
      expect((await storage.getTemplate("greeting")).name).toBe("Hi");
      await service.deleteTemplate("greeting");
      await expect(storage.getTemplate("greeting")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("keeps earlier versions after an update", async () => {
      await service.updateTemplate("greeting", { source: "Hi {{name}}" });
      expect((await service.listVersions("greeting")).map((t) => [t.version, t.source])).toEqual([
        [1, "Hello {{name}}"],
        [2, "Hi {{name}}"],
      ]);
      expect((await service.getTemplate("greeting", 1)).source).toBe("Hello {{name}}");
      expect((await service.getTemplate("greeting")).version).toBe(2);
    });

    it("rejects version numbers that cannot exist", async () => {
      await expect(service.getTemplate("greeting", 0)).rejects.toThrow('Version 0 of template "greeting" not found');
      await expect(service.getTemplate("greeting", 1.5)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("reports unknown templates as NotFoundError", async () => {
      await expect(service.updateTemplate("nope", {})).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.render("nope", {})).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("render", () => {
    it("reuses the world of an earlier render", async () => {
      await service.render("greeting", { name: "Ada" });
      expect(pool.idleCount("greeting")).toBe(1);
      await service.render("greeting", { name: "Grace" });
      expect(engine.worlds).toHaveLength(2);
      expect(engine.worlds[1]).toBe(engine.worlds[0]);
      expect(engine.worlds[1].input("data")).toBe('{"name":"Grace"}');
    });

    it("returns worlds after a rejected render", async () => {
      const outcome = await service.render("greeting", {});
      expect(outcome.status).toBe("bad_input");
      expect(engine.worlds).toHaveLength(0);
      expect(pool.idleCount("greeting")).toBe(1);
    });

    it("builds a new world after the source changes", async () => {
      await service.render("greeting", { name: "Ada" });
      await service.updateTemplate("greeting", { source: "Hi {{name}}" });
      expect(pool.idleCount("greeting")).toBe(0);
      await service.render("greeting", { name: "Ada" });
      expect(engine.worlds[1]).not.toBe(engine.worlds[0]);
      expect(engine.worlds[1].source(engine.worlds[1].mainFileId)).toBe("Hi {{name}}");
    });

    it("sees template files saved after an earlier render", async () => {
      await service.render("greeting", { name: "Ada" });
      await service.saveFile("greeting", "logo.png", new Uint8Array([1]));
      await service.render("greeting", { name: "Ada" });
      expect(engine.worlds[1].filePaths()).toEqual(["logo.png"]);

      await service.deleteFile("greeting", "logo.png");
      await service.render("greeting", { name: "Ada" });
      expect(engine.worlds[2].filePaths()).toEqual([]);
    });

    it("renders an earlier version in a fresh world outside the pool", async () => {
      await service.render("greeting", { name: "Ada" });
      await service.updateTemplate("greeting", { source: "Hi {{name}}" });
      await service.render("greeting", { name: "Ada" });
      expect(pool.idleCount("greeting")).toBe(1);

      const outcome = await service.render("greeting", { name: "Ada" }, undefined, 1);
      expect(outcome.status).toBe("succeeded");
      const world = engine.worlds[2];
      expect(world.source(world.mainFileId)).toBe("Hello {{name}}");
      expect(world).not.toBe(engine.worlds[1]);
      expect(pool.idleCount("greeting")).toBe(1);
    });

    it("reports an unknown version as NotFoundError", async () => {
      await expect(service.render("greeting", { name: "Ada" }, undefined, 9)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("does not pool worlds leased before an invalidation", async () => {
      const rendering = service.render("greeting", { name: "Ada" });
      await service.saveFile("greeting", "logo.png", new Uint8Array([1]));
      await rendering;
      expect(pool.idleCount("greeting")).toBe(0);
    });
  });
});
