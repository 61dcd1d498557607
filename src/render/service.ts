/**
 * Render Service — template CRUD and rendering by id, on top of a
 * TemplateStorage, with worlds leased from a WorldPool.
 *
 * Every change the service makes to a template or its files invalidates
 * that template's idle worlds. Renders of an explicit earlier version
 * always build a fresh world; pooled worlds hold the current revision.
 */

import { v4 as uuidv4 } from "uuid";
import type { TypesettingEngine } from "../engine/types.js";
import type { Schema } from "../schema/types.js";
import { ConflictError, NotFoundError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { silentLogger } from "../shared/logger.js";
import type { TemplateStorage } from "../storage/types.js";
import { versionLabel } from "../storage/types.js";
import { createTemplate, updateTemplate, withDescription } from "../templates/template.js";
import type { Template, TemplateId, TemplatePatch } from "../templates/types.js";
import { loadTemplateFiles } from "../world/assets.js";
import { WorldPool } from "../world/pool.js";
import { TemplateWorld } from "../world/world.js";
import type { RenderOptions } from "./options.js";
import { renderTemplate } from "./render.js";
import type { RenderOutcome } from "./render.js";

export interface CreateTemplateInput {
  id?: TemplateId;
  name: string;
  source: string;
  schema: Schema;
  description?: string;
}

export interface RenderServiceOptions {
  storage: TemplateStorage;
  pool?: WorldPool;
  engine?: TypesettingEngine;
  logger?: Logger;
}

export class RenderService {
  readonly storage: TemplateStorage;
  readonly pool: WorldPool;
  private readonly engine: TypesettingEngine | undefined;
  private readonly logger: Logger;

  constructor(options: RenderServiceOptions) {
    this.storage = options.storage;
    this.logger = options.logger ?? silentLogger;
    this.pool = options.pool ?? new WorldPool({ logger: this.logger });
    this.engine = options.engine;
  }

  // ── Templates ───────────────────────────────────────────────────

  /** The current revision, or the kept revision `version`. */
  async getTemplate(id: TemplateId, version?: number): Promise<Template> {
    if (version !== undefined && !(Number.isInteger(version) && version >= 1)) {
      throw new NotFoundError(versionLabel(id, version));
    }
    return this.storage.getTemplate(id, version);
  }

  /** Kept revisions, oldest first. */
  async listVersions(id: TemplateId): Promise<Template[]> {
    return this.storage.listTemplateVersions(id);
  }

  async createTemplate(input: CreateTemplateInput): Promise<Template> {
    const id = input.id ?? uuidv4();
    if (await this.exists(id)) {
      throw new ConflictError(`Template "${id}" already exists`);
    }
    let template = createTemplate({ id, name: input.name, source: input.source, schema: input.schema });
    if (input.description !== undefined) template = withDescription(template, input.description);
    await this.storage.saveTemplate(template);
    this.logger.info("Template created", { templateId: id });
    return template;
  }

  async updateTemplate(id: TemplateId, patch: TemplatePatch): Promise<Template> {
    const updated = updateTemplate(await this.storage.getTemplate(id), patch);
    await this.storage.saveTemplate(updated);
    this.pool.invalidate(id);
    this.logger.info("Template updated", {
      templateId: id,
      version: updated.version,
      fields: Object.keys(patch),
    });
    return updated;
  }

  async deleteTemplate(id: TemplateId): Promise<void> {
    await this.storage.deleteTemplate(id);
    this.pool.invalidate(id);
    this.logger.info("Template deleted", { templateId: id });
  }

  // ── Files ───────────────────────────────────────────────────────

  async saveFile(id: TemplateId, path: string, bytes: Uint8Array): Promise<void> {
    await this.storage.saveTemplateFile(id, path, bytes);
    this.pool.invalidate(id);
    this.logger.info("Template file saved", { templateId: id, path, bytes: bytes.length });
  }

  async deleteFile(id: TemplateId, path: string): Promise<void> {
    await this.storage.deleteTemplateFile(id, path);
    this.pool.invalidate(id);
    this.logger.info("Template file deleted", { templateId: id, path });
  }

  // ── Render ──────────────────────────────────────────────────────

  async render(
    id: TemplateId,
    data: unknown,
    options?: RenderOptions,
    version?: number,
  ): Promise<RenderOutcome> {
    if (version !== undefined) return this.renderVersion(id, version, data, options);

    const generation = this.pool.generation(id);
    const template = await this.storage.getTemplate(id);
    const leased = this.pool.checkout(template);
    // Fresh worlds start with empty data; renderTemplate binds the real data after validating it.
    const world =
      leased ??
      TemplateWorld.create(template.source, {}, {
        templateId: template.id,
        files: await loadTemplateFiles(this.storage, template.id),
      });

    try {
      return await renderTemplate(template, data, options, {
        world,
        engine: this.engine,
        logger: this.logger,
      });
    } finally {
      this.pool.checkin(world, generation);
    }
  }

  private async renderVersion(
    id: TemplateId,
    version: number,
    data: unknown,
    options?: RenderOptions,
  ): Promise<RenderOutcome> {
    const template = await this.getTemplate(id, version);
    this.logger.debug("Rendering kept version", { templateId: id, version });
    return renderTemplate(template, data, options, {
      files: await loadTemplateFiles(this.storage, id),
      engine: this.engine,
      logger: this.logger,
    });
  }

  private async exists(id: TemplateId): Promise<boolean> {
    try {
      await this.storage.getTemplate(id);
      return true;
    } catch (err) {
      if (err instanceof NotFoundError) return false;
      throw err;
    }
  }
}
