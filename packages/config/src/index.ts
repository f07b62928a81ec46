import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/** Treat `FOO=` the same as an unset variable */
const emptyAsUndefined = (val: unknown) => (val === "" ? undefined : val);

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),

  // ===========================================================================
  // Database (PostgreSQL / TimescaleDB)
  // When DATABASE_URL is unset, postgres.js reads the libpq variables
  // (PGHOST, PGPORT, PGDATABASE, PGUSER, PGPASSWORD).
  // ===========================================================================
  DATABASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  PGHOST: z.preprocess(emptyAsUndefined, z.string().optional()),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(1),
  DATABASE_CONNECT_TIMEOUT_S: z.coerce.number().int().min(1).default(10),

  // ===========================================================================
  // Load test run
  // ===========================================================================
  /** Dashboard base URL, already carrying a query string (e.g. `...?orgId=1`) */
  LOADTEST_DASHBOARD_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  /** Run id handed out by the swarm launcher to every node of a distributed run */
  LOADTEST_RUN_ID: z.preprocess(emptyAsUndefined, z.string().optional()),
  /** Target request rate, stored verbatim on the testrun row */
  LOADTEST_RPS: z.string().default("0"),

  // ===========================================================================
  // Reporter
  // ===========================================================================
  REPORTER_FLUSH_INTERVAL_MS: z.coerce.number().int().min(1).default(500),
  REPORTER_METRICS_ENABLED: stringBoolean.default(false),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
