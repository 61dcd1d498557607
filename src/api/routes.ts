/**
 * Template API Routes
 *
 * Express Router for template CRUD, template files and rendering. All
 * work goes through RenderService; this layer only decodes requests and
 * shapes responses.
 */

import express, { Router } from "express";
import { parseSchema } from "../schema/definition.js";
import type { Logger } from "../shared/logger.js";
import type { RenderService } from "../render/service.js";
import { NotFoundError } from "../shared/errors.js";
import { versionLabel } from "../storage/types.js";
import { templateToJson } from "../templates/template.js";
import type { TemplatePatch } from "../templates/types.js";
import { sendError } from "./errors.js";
import { CreateTemplateBody, RenderBody, UpdateTemplateBody } from "./payloads.js";
import type { RenderResponse } from "./payloads.js";

const FILE_ROUTE = /^\/templates\/([^/]+)\/files\/(.+)$/;
const VERSION_PARAM = /^[1-9]\d*$/;
const MAX_FILE_BYTES = "25mb";
const MAX_JSON_BYTES = "5mb";

export function templateRouter(service: RenderService, logger: Logger): Router {
  const router = Router();
  const storage = service.storage;

  // ── GET /templates/:id/files/<path> ─────────────────────────────
  router.get(FILE_ROUTE, async (req, res) => {
    try {
      const bytes = await storage.getTemplateFile(req.params[0], req.params[1]);
      res.type("application/octet-stream").send(Buffer.from(bytes));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── PUT /templates/:id/files/<path> ─────────────────────────────
  router.put(FILE_ROUTE, express.raw({ type: () => true, limit: MAX_FILE_BYTES }), async (req, res) => {
    try {
      const body: unknown = req.body;
      const bytes = Buffer.isBuffer(body) ? new Uint8Array(body) : new Uint8Array(0);
      await service.saveFile(req.params[0], req.params[1], bytes);
      res.status(204).end();
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── DELETE /templates/:id/files/<path> ──────────────────────────
  router.delete(FILE_ROUTE, async (req, res) => {
    try {
      await service.deleteFile(req.params[0], req.params[1]);
      res.status(204).end();
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // File bodies are raw bytes; everything below takes JSON.
  router.use(express.json({ limit: MAX_JSON_BYTES }));

  // ── GET /templates ──────────────────────────────────────────────
  router.get("/templates", async (_req, res) => {
    try {
      const templates = await storage.listTemplates();
      res.json(templates.map(templateToJson));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── POST /templates ─────────────────────────────────────────────
  router.post("/templates", async (req, res) => {
    try {
      const body = CreateTemplateBody.parse(req.body);
      const template = await service.createTemplate({
        id: body.id,
        name: body.name,
        source: body.source,
        schema: parseSchema(body.schema),
        description: body.description,
      });
      res.status(201).json(templateToJson(template));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── GET /templates/:id ──────────────────────────────────────────
  router.get("/templates/:id", async (req, res) => {
    try {
      res.json(templateToJson(await storage.getTemplate(req.params.id)));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── PUT /templates/:id ──────────────────────────────────────────
  router.put("/templates/:id", async (req, res) => {
    try {
      const body = UpdateTemplateBody.parse(req.body);
      const patch: TemplatePatch = {
        name: body.name,
        source: body.source,
        schema: body.schema === undefined ? undefined : parseSchema(body.schema),
        description: body.description,
      };
      const template = await service.updateTemplate(req.params.id, patch);
      res.json(templateToJson(template));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── DELETE /templates/:id ───────────────────────────────────────
  router.delete("/templates/:id", async (req, res) => {
    try {
      await service.deleteTemplate(req.params.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── POST /templates/:id/render ──────────────────────────────────
  router.post("/templates/:id/render", async (req, res) => {
    try {
      const body = RenderBody.parse(req.body);
      const outcome = await service.render(req.params.id, body.data, body.options, body.version);

      if (outcome.status === "bad_input") {
        sendError(res, outcome.error, logger);
        return;
      }
      const response: RenderResponse =
        outcome.status === "succeeded"
          ? {
              documentBase64: Buffer.from(outcome.artifact).toString("base64"),
              contentType: outcome.contentType,
              diagnostics: [],
            }
          : { documentBase64: null, contentType: null, diagnostics: outcome.diagnostics };
      res.json(response);
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── GET /templates/:id/versions ─────────────────────────────────
  router.get("/templates/:id/versions", async (req, res) => {
    try {
      const versions = await service.listVersions(req.params.id);
      res.json(versions.map(templateToJson));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── GET /templates/:id/versions/:version ────────────────────────
  router.get("/templates/:id/versions/:version", async (req, res) => {
    try {
      const { id, version } = req.params;
      if (!VERSION_PARAM.test(version)) throw new NotFoundError(versionLabel(id, version));
      res.json(templateToJson(await service.getTemplate(id, Number(version))));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  // ── GET /templates/:id/files ────────────────────────────────────
  router.get("/templates/:id/files", async (req, res) => {
    try {
      res.json(await storage.listTemplateFiles(req.params.id));
    } catch (err) {
      sendError(res, err, logger);
    }
  });

  return router;
}
