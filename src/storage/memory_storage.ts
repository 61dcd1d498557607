import { NotFoundError } from "../shared/errors.js";
import type { Template, TemplateId } from "../templates/types.js";
import { byVersion, checkFilePath, fileLabel, templateLabel, versionLabel } from "./types.js";
import type { TemplateStorage } from "./types.js";

interface Entry {
  template: Template;
  versions: Map<number, Template>;
  files: Map<string, Uint8Array>;
}

/** Process-local storage. Used by tests and `PRESSROOM_STORAGE=memory`. */
export class InMemoryTemplateStorage implements TemplateStorage {
  private readonly entries = new Map<TemplateId, Entry>();

  async getTemplate(id: TemplateId, version?: number): Promise<Template> {
    const entry = this.entry(id);
    if (version === undefined) return entry.template;
    const revision = entry.versions.get(version);
    if (!revision) throw new NotFoundError(versionLabel(id, version));
    return revision;
  }

  async saveTemplate(template: Template): Promise<void> {
    const existing = this.entries.get(template.id);
    const versions = existing?.versions ?? new Map<number, Template>();
    versions.set(template.version, template);
    this.entries.set(template.id, { template, versions, files: existing?.files ?? new Map() });
  }

  async deleteTemplate(id: TemplateId): Promise<void> {
    this.entry(id);
    this.entries.delete(id);
  }

  async listTemplates(): Promise<Template[]> {
    return [...this.entries.keys()].sort().map((id) => this.entry(id).template);
  }

  async listTemplateVersions(id: TemplateId): Promise<Template[]> {
    return [...this.entry(id).versions.values()].sort(byVersion);
  }

  async listTemplateFiles(id: TemplateId): Promise<string[]> {
    return [...this.entry(id).files.keys()].sort();
  }

  async getTemplateFile(id: TemplateId, path: string): Promise<Uint8Array> {
    const bytes = this.entry(id).files.get(checkFilePath(path));
    if (!bytes) throw new NotFoundError(fileLabel(id, path));
    return bytes.slice();
  }

  async saveTemplateFile(id: TemplateId, path: string, bytes: Uint8Array): Promise<void> {
    this.entry(id).files.set(checkFilePath(path), bytes.slice());
  }

  async deleteTemplateFile(id: TemplateId, path: string): Promise<void> {
    const files = this.entry(id).files;
    if (!files.delete(checkFilePath(path))) throw new NotFoundError(fileLabel(id, path));
  }

  private entry(id: TemplateId): Entry {
    const entry = this.entries.get(id);
    if (!entry) throw new NotFoundError(templateLabel(id));
    return entry;
  }
}
