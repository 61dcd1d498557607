/**
 * File Storage — templates on the local file system.
 *
 * Layout:
 *   <root>/templates/<id>/template.json        current revision
 *   <root>/templates/<id>/versions/<n>.json    every saved revision
 *   <root>/templates/<id>/files/<path>
 *
 * Directories written before versioning have no versions/; their current
 * record stands in for its own version.
 */

import { mkdir, readdir, readFile, rm, unlink, writeFile } from "fs/promises";
import path from "path";
import { NotFoundError, StorageError, errorMessage } from "../shared/errors.js";
import { isTemplateId, parseTemplateRecord, templateToJson } from "../templates/template.js";
import type { Template, TemplateId } from "../templates/types.js";
import { byVersion, checkFilePath, fileLabel, templateLabel, versionLabel } from "./types.js";
import type { TemplateStorage } from "./types.js";

const RECORD_FILE = "template.json";
const FILES_DIR = "files";
const VERSIONS_DIR = "versions";
const VERSION_FILE = /^([1-9]\d*)\.json$/;

export class FileTemplateStorage implements TemplateStorage {
  private readonly templatesDir: string;

  constructor(root: string) {
    this.templatesDir = path.resolve(root, "templates");
  }

  async getTemplate(id: TemplateId, version?: number): Promise<Template> {
    if (version === undefined) return this.readRecord(this.recordPath(id), id, templateLabel(id));
    if (!Number.isInteger(version) || version < 1) throw new NotFoundError(versionLabel(id, version));
    try {
      return await this.readRecord(this.versionPath(id, version), id, versionLabel(id, version));
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      const current = await this.getTemplate(id);
      if (current.version === version) return current;
      throw err;
    }
  }

  async saveTemplate(template: Template): Promise<void> {
    const dir = this.templateDir(template.id);
    const text = JSON.stringify(templateToJson(template), null, 2);
    try {
      await mkdir(path.join(dir, VERSIONS_DIR), { recursive: true });
      await writeFile(this.versionPath(template.id, template.version), text);
      await writeFile(this.recordPath(template.id), text);
    } catch (err) {
      throw storageFailure(err, templateLabel(template.id), "write");
    }
  }

  async deleteTemplate(id: TemplateId): Promise<void> {
    await this.getTemplate(id);
    const dir = this.templateDir(id);
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (err) {
      throw storageFailure(err, templateLabel(id), "delete");
    }
  }

  async listTemplates(): Promise<Template[]> {
    let ids: string[];
    try {
      const entries = await readdir(this.templatesDir, { withFileTypes: true });
      ids = entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (err) {
      if (isMissing(err)) return [];
      throw storageFailure(err, "Template directory", "list");
    }
    const templates: Template[] = [];
    for (const id of ids.sort()) {
      templates.push(await this.getTemplate(id));
    }
    return templates;
  }

  async listTemplateVersions(id: TemplateId): Promise<Template[]> {
    const current = await this.getTemplate(id);
    let names: string[];
    try {
      names = await readdir(path.join(this.templateDir(id), VERSIONS_DIR));
    } catch (err) {
      if (isMissing(err)) return [current];
      throw storageFailure(err, templateLabel(id), "list versions");
    }
    const revisions: Template[] = [];
    for (const name of names) {
      const match = VERSION_FILE.exec(name);
      if (match) revisions.push(await this.getTemplate(id, Number(match[1])));
    }
    if (!revisions.some((r) => r.version === current.version)) revisions.push(current);
    return revisions.sort(byVersion);
  }

  async listTemplateFiles(id: TemplateId): Promise<string[]> {
    await this.getTemplate(id);
    const dir = this.filesDir(id);
    const paths: string[] = [];
    try {
      await collectFiles(dir, "", paths);
    } catch (err) {
      if (isMissing(err)) return [];
      throw storageFailure(err, templateLabel(id), "list files");
    }
    return paths.sort();
  }

  async getTemplateFile(id: TemplateId, filePath: string): Promise<Uint8Array> {
    await this.getTemplate(id);
    const target = this.filePath(id, filePath);
    try {
      const buffer = await readFile(target);
      return new Uint8Array(buffer);
    } catch (err) {
      throw storageFailure(err, fileLabel(id, filePath), "read");
    }
  }

  async saveTemplateFile(id: TemplateId, filePath: string, bytes: Uint8Array): Promise<void> {
    await this.getTemplate(id);
    const target = this.filePath(id, filePath);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, bytes);
    } catch (err) {
      throw storageFailure(err, fileLabel(id, filePath), "write");
    }
  }

  async deleteTemplateFile(id: TemplateId, filePath: string): Promise<void> {
    await this.getTemplate(id);
    const target = this.filePath(id, filePath);
    try {
      await unlink(target);
    } catch (err) {
      throw storageFailure(err, fileLabel(id, filePath), "delete");
    }
  }

  // ── Paths ───────────────────────────────────────────────────────

  private templateDir(id: TemplateId): string {
    if (!isTemplateId(id)) throw new NotFoundError(templateLabel(id));
    return path.join(this.templatesDir, id);
  }

  private recordPath(id: TemplateId): string {
    return path.join(this.templateDir(id), RECORD_FILE);
  }

  private versionPath(id: TemplateId, version: number): string {
    return path.join(this.templateDir(id), VERSIONS_DIR, `${version}.json`);
  }

  private async readRecord(file: string, id: TemplateId, what: string): Promise<Template> {
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (err) {
      throw storageFailure(err, what, "read");
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(`Corrupt template record for "${id}": ${errorMessage(err)}`, { cause: err });
    }
    return parseTemplateRecord(json);
  }

  private filesDir(id: TemplateId): string {
    return path.join(this.templateDir(id), FILES_DIR);
  }

  private filePath(id: TemplateId, filePath: string): string {
    return path.join(this.filesDir(id), ...checkFilePath(filePath).split("/"));
  }
}

async function collectFiles(dir: string, prefix: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      await collectFiles(path.join(dir, entry.name), rel, out);
    } else if (entry.isFile()) {
      out.push(rel);
    }
  }
}

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && Reflect.get(err, "code") === "ENOENT";
}

function storageFailure(err: unknown, what: string, action: string): Error {
  if (isMissing(err)) return new NotFoundError(what);
  return new StorageError(`${what}: cannot ${action}: ${errorMessage(err)}`, { cause: err });
}
