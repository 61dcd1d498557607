export { loadTemplateFiles } from "./assets.js";
export { WorldPool } from "./pool.js";
export type { WorldPoolOptions } from "./pool.js";
export { SourceFile } from "./source_file.js";
export { MAIN_FILE_ID, TemplateWorld } from "./world.js";
export type { SourceRange, WorldOptions } from "./world.js";
