import { z } from "zod";

// =============================================================================
// Process Environment
// =============================================================================

/**
 * Infrastructure schema - logging and the optional session time zone seed.
 */
export const infrastructureSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_FORMAT: z.enum(["json", "text"]).default("text"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .optional(),
  COLFRAME_SESSION_TIMEZONE: z.string().min(1).optional(),
});

export type InfrastructureEnv = z.infer<typeof infrastructureSchema>;

/**
 * Validates process environment variables.
 *
 * @example
 * ```typescript
 * const env = validateEnv(process.env);
 * const logger = createLogger({ nodeEnv: env.NODE_ENV, logFormat: env.LOG_FORMAT });
 * ```
 */
export function validateEnv(env: Record<string, unknown>): InfrastructureEnv {
  return infrastructureSchema.parse(env);
}
