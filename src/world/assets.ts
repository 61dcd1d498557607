import type { TemplateStorage } from "../storage/types.js";
import type { TemplateId } from "../templates/types.js";

/**
 * Fetch every file of a template through the Storage Port, keyed by
 * relative path, ready to hand to TemplateWorld.create.
 */
export async function loadTemplateFiles(
  storage: TemplateStorage,
  templateId: TemplateId,
): Promise<Map<string, Uint8Array>> {
  const files = new Map<string, Uint8Array>();
  for (const path of await storage.listTemplateFiles(templateId)) {
    files.set(path, await storage.getTemplateFile(templateId, path));
  }
  return files;
}
