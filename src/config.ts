import { z } from "zod/v4";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

// Blank environment variables count as unset
function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const EnvSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(65535).default(8000)),
  HOST: z.preprocess(blankAsUnset, z.string().trim().default("0.0.0.0")),
  DATABASE_URL: z.preprocess(blankAsUnset, z.string().trim().optional()),
  DATABASE_NAME: z.preprocess(blankAsUnset, z.string().trim().optional()),
  FORGE_LOG_LEVEL: z.preprocess(blankAsUnset, z.enum(LOG_LEVELS).default("info")),
  FORGE_LIFECYCLE_STEP_MS: z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(2000)),
});

export interface Config {
  port: number;
  host: string;
  databaseUrl: string | undefined;
  databaseName: string | undefined;
  logLevel: LogLevel;
  /** Delay before each simulated tuning-job status transition. */
  lifecycleStepMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`invalid environment:\n${z.prettifyError(result.error)}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    databaseUrl: parsed.DATABASE_URL,
    databaseName: parsed.DATABASE_NAME,
    logLevel: parsed.FORGE_LOG_LEVEL,
    lifecycleStepMs: parsed.FORGE_LIFECYCLE_STEP_MS,
  };
}
