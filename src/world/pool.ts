/**
 * World Pool — idle worlds kept for reuse, keyed by template id.
 *
 * A world is leased with `checkout` and handed back with `checkin`. While
 * leased it is out of the pool, so no two callers can hold the same world.
 * Worlds built from an older source revision are discarded on checkout.
 *
 * `invalidate` bumps the template's generation. A world leased (or built)
 * under an earlier generation is not taken back, since its files may be
 * out of date even when its source is not.
 */

import type { Template, TemplateId } from "../templates/types.js";
import { sha256String } from "../shared/hash.js";
import type { Logger } from "../shared/logger.js";
import { silentLogger } from "../shared/logger.js";
import type { TemplateWorld } from "./world.js";

export interface WorldPoolOptions {
  /** Idle worlds kept per template; 0 disables reuse. */
  maxIdlePerTemplate?: number;
  logger?: Logger;
}

export class WorldPool {
  private readonly idle = new Map<TemplateId, TemplateWorld[]>();
  private readonly generations = new Map<TemplateId, number>();
  private readonly maxIdle: number;
  private readonly logger: Logger;

  constructor(options: WorldPoolOptions = {}) {
    this.maxIdle = options.maxIdlePerTemplate ?? 2;
    this.logger = options.logger ?? silentLogger;
  }

  /** Take an idle world built from the template's current source, if any. */
  checkout(template: Template): TemplateWorld | undefined {
    const worlds = this.idle.get(template.id);
    if (!worlds) return undefined;
    const hash = sha256String(template.source);

    let found: TemplateWorld | undefined;
    const kept: TemplateWorld[] = [];
    for (const world of worlds) {
      if (world.sourceHash !== hash || !world.reusable) continue;
      if (!found) found = world;
      else kept.push(world);
    }
    const discarded = worlds.length - kept.length - (found ? 1 : 0);
    if (discarded > 0) {
      this.logger.debug("Discarded stale worlds", { templateId: template.id, count: discarded });
    }

    if (kept.length > 0) this.idle.set(template.id, kept);
    else this.idle.delete(template.id);
    return found;
  }

  /** Read before leasing or building a world; pass it back to checkin. */
  generation(templateId: TemplateId): number {
    return this.generations.get(templateId) ?? 0;
  }

  /**
   * Return a leased world. Poisoned worlds, worlds from an earlier
   * generation and worlds over the cap are dropped.
   */
  checkin(world: TemplateWorld, generation: number): void {
    const id = world.templateId;
    if (id === undefined || !world.reusable || this.maxIdle === 0) return;
    if (generation !== this.generation(id)) return;
    const worlds = this.idle.get(id) ?? [];
    if (worlds.includes(world) || worlds.length >= this.maxIdle) return;
    worlds.push(world);
    this.idle.set(id, worlds);
  }

  /** Drop every idle world of a template. */
  invalidate(templateId: TemplateId): void {
    this.idle.delete(templateId);
    this.generations.set(templateId, this.generation(templateId) + 1);
  }

  idleCount(templateId: TemplateId): number {
    return this.idle.get(templateId)?.length ?? 0;
  }
}
