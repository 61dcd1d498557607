/**
 * Process configuration, read once from the environment.
 *
 * The server entry point loads `.env` through dotenv before calling
 * `loadConfig()`; library callers pass their own env object.
 */

import { z } from "zod";

const booleanish = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    PRESSROOM_STORAGE: z.enum(["fs", "memory", "postgres"]).default("fs"),
    PRESSROOM_STORAGE_PATH: z.string().min(1).default("./data"),
    DATABASE_URL: z.string().url().optional(),
    PRESSROOM_LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    PRESSROOM_LOG_PRETTY: booleanish.default("false"),
    PRESSROOM_WORLD_CACHE: z.coerce.number().int().min(0).default(2),
  })
  .superRefine((env, ctx) => {
    if (env.PRESSROOM_STORAGE === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when PRESSROOM_STORAGE=postgres",
      });
    }
  });

export type StorageDriver = "fs" | "memory" | "postgres";

export interface AppConfig {
  port: number;
  storage: {
    driver: StorageDriver;
    path: string;
    databaseUrl?: string;
  };
  log: {
    level: z.infer<typeof EnvSchema>["PRESSROOM_LOG_LEVEL"];
    pretty: boolean;
  };
  /** Idle worlds kept per template; 0 disables world reuse. */
  worldCacheSize: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "env"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    storage: {
      driver: e.PRESSROOM_STORAGE,
      path: e.PRESSROOM_STORAGE_PATH,
      databaseUrl: e.DATABASE_URL,
    },
    log: {
      level: e.PRESSROOM_LOG_LEVEL,
      pretty: e.PRESSROOM_LOG_PRETTY,
    },
    worldCacheSize: e.PRESSROOM_WORLD_CACHE,
  };
}
