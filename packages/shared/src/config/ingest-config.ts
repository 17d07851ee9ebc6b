import { z } from "zod";

import { AppError, ErrorCode } from "../errors";
import type { InfrastructureEnv } from "./env.schema";

/**
 * Runtime configuration capability. Mirrors a remote session's
 * `get_configs(keys...)`: one value per key, `null` when unset.
 */
export interface ConfigSource {
  getConfigs(...keys: string[]): Array<string | null>;
}

export const CONFIG_KEYS = {
  inferDictAsStruct: "colframe.sql.inferNestedDictAsStruct.enabled",
  inferArrayFromFirstElement:
    "colframe.sql.legacy.inferArrayTypeFromFirstElement.enabled",
  timestampType: "colframe.sql.timestampType",
  sessionTimeZone: "colframe.sql.session.timeZone",
  safeCast: "colframe.sql.execution.arrow.safeCast.enabled",
} as const;

export const DEFAULT_CONFIG: Readonly<Record<string, string>> = {
  [CONFIG_KEYS.inferDictAsStruct]: "false",
  [CONFIG_KEYS.inferArrayFromFirstElement]: "false",
  [CONFIG_KEYS.timestampType]: "TIMESTAMP_LTZ",
  [CONFIG_KEYS.sessionTimeZone]: "UTC",
  [CONFIG_KEYS.safeCast]: "false",
};

// String-valued flags: only the literal "true" switches a flag on.
const flag = z
  .string()
  .nullable()
  .transform((v: string | null) => v === "true");

/**
 * Options consumed by schema inference.
 */
export const inferenceConfigSchema = z.object({
  inferDictAsStruct: flag,
  inferArrayFromFirstElement: flag,
  preferTimestampNtz: z
    .string()
    .nullable()
    .transform((v: string | null) => v?.toUpperCase() === "TIMESTAMP_NTZ"),
});

/**
 * Options consumed by the frame batch serializer.
 */
export const serializerConfigSchema = z.object({
  timezone: z
    .string()
    .nullable()
    .transform((v: string | null) => v ?? DEFAULT_CONFIG[CONFIG_KEYS.sessionTimeZone] ?? "UTC")
    .pipe(z.string().min(1, "session time zone must not be empty")),
  safeCast: flag,
});

export type InferenceConfig = z.infer<typeof inferenceConfigSchema>;
export type SerializerConfig = z.infer<typeof serializerConfigSchema>;

function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  raw: Record<string, string | null>,
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new AppError(
      ErrorCode.CONFIG_ERROR,
      result.error,
      { operation: "readConfig" },
      {
        violations: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      },
    );
  }
  return result.data;
}

export function readInferenceConfig(source: ConfigSource): InferenceConfig {
  const [inferDictAsStruct, inferArrayFromFirstElement, timestampType] =
    source.getConfigs(
      CONFIG_KEYS.inferDictAsStruct,
      CONFIG_KEYS.inferArrayFromFirstElement,
      CONFIG_KEYS.timestampType,
    );
  return parseConfig(inferenceConfigSchema, {
    inferDictAsStruct: inferDictAsStruct ?? null,
    inferArrayFromFirstElement: inferArrayFromFirstElement ?? null,
    preferTimestampNtz: timestampType ?? null,
  });
}

export function readSerializerConfig(source: ConfigSource): SerializerConfig {
  const [timezone, safeCast] = source.getConfigs(
    CONFIG_KEYS.sessionTimeZone,
    CONFIG_KEYS.safeCast,
  );
  return parseConfig(serializerConfigSchema, {
    timezone: timezone ?? null,
    safeCast: safeCast ?? null,
  });
}

/**
 * In-process config source over a fixed set of entries layered on the
 * defaults. Unknown keys resolve to `null`.
 */
export function createStaticConfigSource(
  entries: Readonly<Record<string, string>> = {},
): ConfigSource {
  const values = new Map<string, string>(
    Object.entries({ ...DEFAULT_CONFIG, ...entries }),
  );
  return {
    getConfigs: (...keys: string[]) => keys.map((key) => values.get(key) ?? null),
  };
}

export function createEnvConfigSource(env: InfrastructureEnv): ConfigSource {
  if (!env.COLFRAME_SESSION_TIMEZONE) {
    return createStaticConfigSource();
  }
  return createStaticConfigSource({
    [CONFIG_KEYS.sessionTimeZone]: env.COLFRAME_SESSION_TIMEZONE,
  });
}
