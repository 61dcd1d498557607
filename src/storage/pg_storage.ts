/**
 * PostgreSQL Storage — current revisions in `templates`, every saved
 * revision in `template_versions`, files in `template_files` (see
 * src/db/schema.ts, created by src/db/migrate.ts).
 *
 * Rows from before versioning have no `template_versions` entry; the
 * `templates` row stands in for its own version.
 */

import { and, asc, eq } from "drizzle-orm";
import type { Database } from "../db/connection.js";
import * as schema from "../db/schema.js";
import { NotFoundError, PressroomError, StorageError, errorMessage } from "../shared/errors.js";
import { parseTemplateRecord, templateToJson } from "../templates/template.js";
import type { Template, TemplateId } from "../templates/types.js";
import { byVersion, checkFilePath, fileLabel, templateLabel, versionLabel } from "./types.js";
import type { TemplateStorage } from "./types.js";

type TemplateRow = Omit<typeof schema.templateVersions.$inferSelect, "templateId"> & { id: string };

export class PgTemplateStorage implements TemplateStorage {
  constructor(
    private readonly db: Database,
    private readonly onClose?: () => Promise<void>,
  ) {}

  async getTemplate(id: TemplateId, version?: number): Promise<Template> {
    const rows = await query("read template", () =>
      this.db.select().from(schema.templates).where(eq(schema.templates.id, id)),
    );
    if (rows.length === 0) throw new NotFoundError(templateLabel(id));
    const current = fromRow(rows[0]);
    if (version === undefined || version === current.version) return current;

    const revisions = await query("read template version", () =>
      this.db
        .select()
        .from(schema.templateVersions)
        .where(and(eq(schema.templateVersions.templateId, id), eq(schema.templateVersions.version, version))),
    );
    if (revisions.length === 0) throw new NotFoundError(versionLabel(id, version));
    return fromRow({ ...revisions[0], id });
  }

  async saveTemplate(template: Template): Promise<void> {
    const json = templateToJson(template);
    const values = {
      name: json.name,
      source: json.source,
      schema: json.schema,
      description: json.description ?? null,
      version: template.version,
      createdAt: template.createdAt,
      updatedAt: template.updatedAt,
    };
    await query("save template", () =>
      this.db.transaction(async (tx) => {
        await tx
          .insert(schema.templates)
          .values({ id: template.id, ...values })
          .onConflictDoUpdate({ target: schema.templates.id, set: values });
        await tx
          .insert(schema.templateVersions)
          .values({ templateId: template.id, ...values })
          .onConflictDoUpdate({
            target: [schema.templateVersions.templateId, schema.templateVersions.version],
            set: values,
          });
      }),
    );
  }

  async deleteTemplate(id: TemplateId): Promise<void> {
    const deleted = await query("delete template", () =>
      this.db
        .delete(schema.templates)
        .where(eq(schema.templates.id, id))
        .returning({ id: schema.templates.id }),
    );
    if (deleted.length === 0) throw new NotFoundError(templateLabel(id));
  }

  async listTemplates(): Promise<Template[]> {
    const rows = await query("list templates", () =>
      this.db.select().from(schema.templates).orderBy(asc(schema.templates.id)),
    );
    return rows.map(fromRow);
  }

  async listTemplateVersions(id: TemplateId): Promise<Template[]> {
    const current = await this.getTemplate(id);
    const rows = await query("list template versions", () =>
      this.db
        .select()
        .from(schema.templateVersions)
        .where(eq(schema.templateVersions.templateId, id))
        .orderBy(asc(schema.templateVersions.version)),
    );
    const revisions = rows.map((row) => fromRow({ ...row, id }));
    if (!revisions.some((r) => r.version === current.version)) revisions.push(current);
    return revisions.sort(byVersion);
  }

  async listTemplateFiles(id: TemplateId): Promise<string[]> {
    await this.getTemplate(id);
    const rows = await query("list template files", () =>
      this.db
        .select({ path: schema.templateFiles.path })
        .from(schema.templateFiles)
        .where(eq(schema.templateFiles.templateId, id)),
    );
    return rows.map((r) => r.path).sort();
  }

  async getTemplateFile(id: TemplateId, path: string): Promise<Uint8Array> {
    checkFilePath(path);
    await this.getTemplate(id);
    const rows = await query("read template file", () =>
      this.db
        .select({ content: schema.templateFiles.content })
        .from(schema.templateFiles)
        .where(and(eq(schema.templateFiles.templateId, id), eq(schema.templateFiles.path, path))),
    );
    if (rows.length === 0) throw new NotFoundError(fileLabel(id, path));
    return rows[0].content;
  }

  async saveTemplateFile(id: TemplateId, path: string, bytes: Uint8Array): Promise<void> {
    checkFilePath(path);
    await this.getTemplate(id);
    await query("save template file", () =>
      this.db
        .insert(schema.templateFiles)
        .values({ templateId: id, path, content: bytes })
        .onConflictDoUpdate({
          target: [schema.templateFiles.templateId, schema.templateFiles.path],
          set: { content: bytes },
        }),
    );
  }

  async deleteTemplateFile(id: TemplateId, path: string): Promise<void> {
    checkFilePath(path);
    await this.getTemplate(id);
    const deleted = await query("delete template file", () =>
      this.db
        .delete(schema.templateFiles)
        .where(and(eq(schema.templateFiles.templateId, id), eq(schema.templateFiles.path, path)))
        .returning({ path: schema.templateFiles.path }),
    );
    if (deleted.length === 0) throw new NotFoundError(fileLabel(id, path));
  }

  async close(): Promise<void> {
    await this.onClose?.();
  }
}

function fromRow(row: TemplateRow): Template {
  return parseTemplateRecord({
    id: row.id,
    name: row.name,
    source: row.source,
    schema: row.schema,
    description: row.description ?? undefined,
    version: row.version,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  });
}

async function query<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof PressroomError) throw err;
    throw new StorageError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
  }
}
