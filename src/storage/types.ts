/**
 * Storage Port — persistence of templates and their auxiliary files.
 *
 * The render core never touches a file system or database directly; every
 * backend implements this interface. Missing entries are NotFoundError,
 * backend failures StorageError, both propagated unchanged to callers.
 */

import { StorageError } from "../shared/errors.js";
import type { Template, TemplateId } from "../templates/types.js";

export interface TemplateStorage {
  /** The current revision, or the kept revision numbered `version`. */
  getTemplate(id: TemplateId, version?: number): Promise<Template>;
  /**
   * Create or replace by id. The revision is also kept under its version
   * number, so earlier versions stay readable after an update.
   */
  saveTemplate(template: Template): Promise<void>;
  /** Removes the template, every kept revision and all of its files. */
  deleteTemplate(id: TemplateId): Promise<void>;
  /** Current revisions, sorted by id. */
  listTemplates(): Promise<Template[]>;
  /** Kept revisions, oldest first. */
  listTemplateVersions(id: TemplateId): Promise<Template[]>;

  /** Sorted relative paths. */
  listTemplateFiles(id: TemplateId): Promise<string[]>;
  getTemplateFile(id: TemplateId, path: string): Promise<Uint8Array>;
  /** NotFoundError when the template does not exist. */
  saveTemplateFile(id: TemplateId, path: string, bytes: Uint8Array): Promise<void>;
  deleteTemplateFile(id: TemplateId, path: string): Promise<void>;

  close?(): Promise<void>;
}

export class InvalidFilePathError extends StorageError {
  constructor(readonly path: string) {
    super(`Invalid template file path "${path}"`);
  }
}

/**
 * Check a template file path: relative, `/`-separated, no empty, `.` or
 * `..` segments. Returns the path unchanged.
 */
export function checkFilePath(path: string): string {
  if (path === "" || path.startsWith("/") || path.includes("\\") || path.includes("\0")) {
    throw new InvalidFilePathError(path);
  }
  for (const segment of path.split("/")) {
    if (segment === "" || segment === "." || segment === "..") {
      throw new InvalidFilePathError(path);
    }
  }
  return path;
}

export function templateLabel(id: TemplateId): string {
  return `Template "${id}"`;
}

export function versionLabel(id: TemplateId, version: number | string): string {
  return `Version ${version} of template "${id}"`;
}

/** Revisions keyed by version number, in version order. */
export function byVersion(a: Template, b: Template): number {
  return a.version - b.version;
}

export function fileLabel(id: TemplateId, path: string): string {
  return `File "${path}" of template "${id}"`;
}
