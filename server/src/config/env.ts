// server/src/config/env.ts
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  UPLOAD_DIR: z.string().min(1).default("uploads"),
  TESTS_DIR: z.string().min(1).default("tests"),
  MANIFEST_FILE: z.string().min(1).default("tests/test_manifest.json"),
  TEMPLATE_FILE: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  PGSSL: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  CORS_ORIGIN: z.string().default(""),
});

export type AppConfig = {
  port: number;
  uploadDir: string;
  testsDir: string;
  manifestFile: string;
  templateFile?: string;
  databaseUrl?: string;
  pgSsl: boolean;
  corsOrigins: string[];
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    uploadDir: e.UPLOAD_DIR,
    testsDir: e.TESTS_DIR,
    manifestFile: e.MANIFEST_FILE,
    templateFile: e.TEMPLATE_FILE,
    databaseUrl: e.DATABASE_URL,
    pgSsl: e.PGSSL,
    // comma-separated list; empty means "allow all"
    corsOrigins: e.CORS_ORIGIN.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
  });
}
