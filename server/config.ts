import "dotenv/config";
import path from "path";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DATABASE_URL: z.string().trim().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  SEED_SAMPLE_DATA: booleanFlag.optional(),
});

export type AppEnv = z.infer<typeof envSchema>["NODE_ENV"];

export interface AppConfig {
  env: AppEnv;
  /** Filesystem path of the SQLite database, or ":memory:" */
  databasePath: string;
  port: number;
  host: string;
  seedSampleData: boolean;
  logRequests: boolean;
  /** Echo every SQL statement drizzle runs */
  logQueries: boolean;
}

/**
 * Accepts a bare path, ":memory:", or a sqlite:/// URL
 * (three slashes: relative path, four: absolute path).
 */
export function resolveDatabasePath(url: string, cwd = process.cwd()): string {
  if (url === ":memory:" || url === "sqlite://" || url === "sqlite:///:memory:") {
    return ":memory:";
  }
  const location = url.startsWith("sqlite:///") ? url.slice("sqlite:///".length) : url;
  if (location.startsWith("/")) return location;
  return path.join(cwd, location);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const env = parsed.data;
  const isTest = env.NODE_ENV === "test";
  const databaseUrl = env.DATABASE_URL ?? (isTest ? ":memory:" : "precedents.db");

  return {
    env: env.NODE_ENV,
    databasePath: resolveDatabasePath(databaseUrl),
    port: env.PORT,
    host: env.HOST,
    seedSampleData: env.SEED_SAMPLE_DATA ?? !isTest,
    logRequests: !isTest,
    logQueries: env.NODE_ENV === "development",
  };
}
