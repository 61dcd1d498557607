import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import {
  ConflictError,
  NotFoundError,
  SchemaDefinitionError,
  ValidationError,
  errorMessage,
} from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { InvalidFilePathError } from "../storage/types.js";

/** Map a thrown value onto an HTTP error response. */
export function sendError(res: Response, err: unknown, logger: Logger): void {
  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message, path: err.path, reason: err.reason });
    return;
  }
  if (err instanceof ZodError) {
    const issues = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    res.status(400).json({ error: `Invalid request body: ${issues}` });
    return;
  }
  if (err instanceof SchemaDefinitionError || err instanceof InvalidFilePathError) {
    res.status(400).json({ error: err.message });
    return;
  }
  if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
    return;
  }
  if (err instanceof ConflictError) {
    res.status(409).json({ error: err.message });
    return;
  }
  logger.error(err instanceof Error ? err : errorMessage(err));
  res.status(500).json({ error: errorMessage(err) });
}

/** Errors raised by body parsers before a route runs (malformed JSON, oversized body). */
export function parserErrorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = typeof err === "object" && err !== null ? Reflect.get(err, "status") : undefined;
    if (typeof status === "number" && status >= 400 && status < 500) {
      res.status(status).json({ error: errorMessage(err) });
      return;
    }
    sendError(res, err, logger);
  };
}
