import { connect } from "../db/connection.js";
import type { AppConfig } from "../shared/config.js";
import { FileTemplateStorage } from "./file_storage.js";
import { InMemoryTemplateStorage } from "./memory_storage.js";
import { PgTemplateStorage } from "./pg_storage.js";
import type { TemplateStorage } from "./types.js";

export { FileTemplateStorage } from "./file_storage.js";
export { InMemoryTemplateStorage } from "./memory_storage.js";
export { PgTemplateStorage } from "./pg_storage.js";
export { InvalidFilePathError, checkFilePath } from "./types.js";
export type { TemplateStorage } from "./types.js";

/** Backend selected by PRESSROOM_STORAGE. */
export function createStorage(config: AppConfig["storage"]): TemplateStorage {
  switch (config.driver) {
    case "memory":
      return new InMemoryTemplateStorage();
    case "fs":
      return new FileTemplateStorage(config.path);
    case "postgres": {
      if (!config.databaseUrl) {
        throw new Error("DATABASE_URL is required for postgres storage");
      }
      const { pool, db } = connect(config.databaseUrl);
      return new PgTemplateStorage(db, () => pool.end());
    }
  }
}
