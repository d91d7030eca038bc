/**
 * Server configuration from environment variables (.env is loaded if present)
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";

const ConfigSchema = z.object({
  EQUATIONS_SESSION_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  EQUATIONS_CLEANUP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
  EQUATIONS_MAX_SESSIONS: z.coerce.number().int().positive().default(100),
  EQUATIONS_SINGULAR_TOLERANCE: z.coerce.number().positive().default(1e-12),
  EQUATIONS_CONDITION_LIMIT: z.coerce.number().positive().default(1e12),
});

export interface ServerConfig {
  sessions: {
    ttl_ms: number;
    /** 0 disables the cleanup timer */
    cleanup_interval_ms: number;
    max_sessions: number;
  };
  solver: {
    singularTolerance: number;
    conditionLimit: number;
  };
}

/** Validate an environment; throws naming the first bad variable */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = issue?.path.join(".") ?? "environment";
    throw new Error(`Invalid configuration ${name}: ${issue?.message ?? "unknown error"}`);
  }

  const values = result.data;
  return {
    sessions: {
      ttl_ms: values.EQUATIONS_SESSION_TTL_MS,
      cleanup_interval_ms: values.EQUATIONS_CLEANUP_INTERVAL_MS,
      max_sessions: values.EQUATIONS_MAX_SESSIONS,
    },
    solver: {
      singularTolerance: values.EQUATIONS_SINGULAR_TOLERANCE,
      conditionLimit: values.EQUATIONS_CONDITION_LIMIT,
    },
  };
}

let cached: ServerConfig | null = null;

/** Process-wide config, loading .env on first use */
export function getConfig(): ServerConfig {
  if (!cached) {
    loadDotenv({ quiet: true });
    cached = loadConfig();
  }
  return cached;
}
