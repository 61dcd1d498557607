import { describe, it, expect } from "vitest";
import { updateTemplate } from "../../src/templates/template.js";
import type { Template } from "../../src/templates/types.js";
import { WorldPool } from "../../src/world/pool.js";
import { TemplateWorld } from "../../src/world/world.js";
import { greetingTemplate, recordingLogger } from "../helpers.js";

function worldFor(template: Template): TemplateWorld {
  return TemplateWorld.create(template.source, {}, { templateId: template.id });
}

function poison(world: TemplateWorld): void {
  try {
    world.compileWith(() => {
      throw new Error("interrupted");
    });
  } catch {
    // expected
  }
}

describe("WorldPool", () => {
  const template = greetingTemplate();

  it("hands a checked-in world back out exactly once", () => {
    const pool = new WorldPool();
    const world = worldFor(template);
    pool.checkin(world, pool.generation(template.id));
    expect(pool.idleCount(template.id)).toBe(1);
    expect(pool.checkout(template)).toBe(world);
    expect(pool.checkout(template)).toBeUndefined();
  });

  it("returns undefined for templates it has never seen", () => {
    expect(new WorldPool().checkout(template)).toBeUndefined();
  });

  it("discards worlds built from an older source", () => {
    const logger = recordingLogger();
    const pool = new WorldPool({ logger });
    pool.checkin(worldFor(template), 0);
    const edited = updateTemplate(template, { source: "Hi {{name}}" });
    expect(pool.checkout(edited)).toBeUndefined();
    expect(pool.idleCount(template.id)).toBe(0);
    expect(logger.entries).toContainEqual({
      level: "debug",
      message: "Discarded stale worlds",
      metadata: { templateId: "greeting", count: 1 },
    });
  });

  it("does not take back poisoned worlds", () => {
    const pool = new WorldPool();
    const world = worldFor(template);
    poison(world);
    pool.checkin(world, 0);
    expect(pool.idleCount(template.id)).toBe(0);
  });

  it("does not take back worlds without a template id", () => {
    const pool = new WorldPool();
    pool.checkin(TemplateWorld.create(template.source, {}), 0);
    expect(pool.checkout(template)).toBeUndefined();
  });

  it("keeps at most maxIdlePerTemplate worlds", () => {
    const pool = new WorldPool({ maxIdlePerTemplate: 2 });
    for (let i = 0; i < 4; i++) pool.checkin(worldFor(template), 0);
    expect(pool.idleCount(template.id)).toBe(2);
  });

  it("ignores a second checkin of the same world", () => {
    const pool = new WorldPool();
    const world = worldFor(template);
    pool.checkin(world, 0);
    pool.checkin(world, 0);
    expect(pool.idleCount(template.id)).toBe(1);
  });

  it("keeps nothing when maxIdlePerTemplate is 0", () => {
    const pool = new WorldPool({ maxIdlePerTemplate: 0 });
    pool.checkin(worldFor(template), 0);
    expect(pool.idleCount(template.id)).toBe(0);
  });

  it("drops idle worlds on invalidate", () => {
    const pool = new WorldPool();
    pool.checkin(worldFor(template), 0);
    pool.invalidate(template.id);
    expect(pool.idleCount(template.id)).toBe(0);
    expect(pool.generation(template.id)).toBe(1);
  });

  it("refuses worlds leased before an invalidate", () => {
    const pool = new WorldPool();
    const generation = pool.generation(template.id);
    const world = worldFor(template);
    pool.invalidate(template.id);
    pool.checkin(world, generation);
    expect(pool.idleCount(template.id)).toBe(0);

    pool.checkin(worldFor(template), pool.generation(template.id));
    expect(pool.idleCount(template.id)).toBe(1);
  });

  it("keeps templates apart", () => {
    const pool = new WorldPool();
    const other = greetingTemplate({ id: "other" });
    pool.checkin(worldFor(other), 0);
    expect(pool.checkout(template)).toBeUndefined();
    expect(pool.checkout(other)?.templateId).toBe("other");
  });
});
