import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

export const logLevelSchema = z
  .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
  .default("info");

export type LogLevel = z.infer<typeof logLevelSchema>;

export const envSchema = z.object({
  LOG_LEVEL: logLevelSchema,
  /** Default seed for synthetic workloads. An empty value counts as unset. */
  PAGESIM_SEED: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().nonnegative().optional()
  ),
});

export type Env = z.infer<typeof envSchema>;

export interface LoadEnvOptions {
  /** Variables to validate instead of `process.env`. Skips the .env file. */
  env?: Record<string, string | undefined>;
  /** Path of the .env file to load into `process.env`. */
  envPath?: string;
}

/** Load the .env file into `process.env`. Existing variables win. */
export function loadDotenv(envPath?: string): void {
  dotenvConfig({ path: envPath });
}

/**
 * Load and validate environment variables.
 * Throws a ZodError when a variable is present but malformed.
 */
export function loadEnv(options: LoadEnvOptions = {}): Env {
  if (options.env) {
    return envSchema.parse(options.env);
  }
  loadDotenv(options.envPath);
  return envSchema.parse(process.env);
}

export interface LogLevelResolution {
  level: LogLevel;
  /** The raw value when it was not a known level, otherwise null. */
  rejected: string | null;
}

/** Resolve LOG_LEVEL on its own, falling back to "info" when it is unknown. */
export function resolveLogLevel(value: string | undefined): LogLevelResolution {
  const parsed = logLevelSchema.safeParse(value);
  if (parsed.success) {
    return { level: parsed.data, rejected: null };
  }
  return { level: "info", rejected: value ?? null };
}
