import { customType, integer, jsonb, pgTable, primaryKey, text, timestamp, varchar } from "drizzle-orm/pg-core";

const bytea = customType<{ data: Uint8Array; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
  toDriver(value) {
    return Buffer.from(value);
  },
  fromDriver(value) {
    return new Uint8Array(value);
  },
});

// ── Templates ──────────────────────────────────────────────────────
export const templates = pgTable("templates", {
  id: varchar("id", { length: 128 }).primaryKey(),
  name: text("name").notNull(),
  source: text("source").notNull(),
  schema: jsonb("schema").notNull(),
  description: text("description"),
  version: integer("version").notNull().default(1),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
});

// ── Template Versions ──────────────────────────────────────────────
export const templateVersions = pgTable(
  "template_versions",
  {
    templateId: varchar("template_id", { length: 128 })
      .notNull()
      .references(() => templates.id, { onDelete: "cascade" }),
    version: integer("version").notNull(),
    name: text("name").notNull(),
    source: text("source").notNull(),
    schema: jsonb("schema").notNull(),
    description: text("description"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.templateId, t.version] }),
  }),
);

// ── Template Files ─────────────────────────────────────────────────
export const templateFiles = pgTable(
  "template_files",
  {
    templateId: varchar("template_id", { length: 128 })
      .notNull()
      .references(() => templates.id, { onDelete: "cascade" }),
    path: text("path").notNull(),
    content: bytea("content").notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.templateId, t.path] }),
  }),
);
