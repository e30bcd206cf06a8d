import { config as loadDotenv } from "dotenv";
import { z } from "zod";

// ── Env schema ───────────────────────────────────────────────

const envSchema = z.object({
  PROMPTLINK_ARTIFACTS_DIR: z.string().min(1).default("artifacts"),
  PROMPTLINK_LOGS_DIR: z.string().min(1).default("logs"),
  PROMPTLINK_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  PROMPTLINK_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000),
  PROMPTLINK_MAX_WORKERS: z.coerce.number().int().positive().default(4),
  MODEL: z.string().min(1).default("gpt-4o-mini"),
  PROMPTLINK_MODELS: z.string().optional(),
});

export interface PromptlinkConfig {
  artifactsDir: string;
  logsDir: string;
  maxAttempts: number;
  backoffMs: number;
  maxWorkers: number;
  model: string;
  models: string[];
}

// ── Loaders ──────────────────────────────────────────────────

/**
 * Build the runtime config from environment variables.
 * Throws a ZodError naming the offending variable when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PromptlinkConfig {
  const parsed = envSchema.parse(env);
  const models = (parsed.PROMPTLINK_MODELS ?? "")
    .split(",")
    .map(m => m.trim())
    .filter(m => m.length > 0);

  return {
    artifactsDir: parsed.PROMPTLINK_ARTIFACTS_DIR,
    logsDir: parsed.PROMPTLINK_LOGS_DIR,
    maxAttempts: parsed.PROMPTLINK_MAX_ATTEMPTS,
    backoffMs: parsed.PROMPTLINK_BACKOFF_MS,
    maxWorkers: parsed.PROMPTLINK_MAX_WORKERS,
    model: parsed.MODEL,
    models: models.length > 0 ? models : [parsed.MODEL],
  };
}

/** Like `loadConfig`, after merging a `.env` file into `process.env`. */
export function loadConfigFromDotenv(path?: string): PromptlinkConfig {
  const result = loadDotenv(path ? { path } : undefined);
  if (result.error && path) throw result.error;
  return loadConfig(process.env);
}
