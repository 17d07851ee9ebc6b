import { describe, expect, it } from "vitest";

import { AppError, ErrorCode } from "../../errors";
import { validateEnv } from "../env.schema";
import {
  CONFIG_KEYS,
  type ConfigSource,
  createEnvConfigSource,
  createStaticConfigSource,
  readInferenceConfig,
  readSerializerConfig,
} from "../ingest-config";

function sourceOf(values: Record<string, string | null>): ConfigSource {
  return {
    getConfigs: (...keys: string[]) => keys.map((key) => values[key] ?? null),
  };
}

describe("ingest config", () => {
  describe("readInferenceConfig", () => {
    it("defaults every flag off", () => {
      expect(readInferenceConfig(createStaticConfigSource())).toEqual({
        inferDictAsStruct: false,
        inferArrayFromFirstElement: false,
        preferTimestampNtz: false,
      });
    });

    it("only treats the literal 'true' as on", () => {
      const config = readInferenceConfig(
        sourceOf({
          [CONFIG_KEYS.inferDictAsStruct]: "true",
          [CONFIG_KEYS.inferArrayFromFirstElement]: "TRUE",
          [CONFIG_KEYS.timestampType]: "TIMESTAMP_NTZ",
        }),
      );

      expect(config).toEqual({
        inferDictAsStruct: true,
        inferArrayFromFirstElement: false,
        preferTimestampNtz: true,
      });
    });

    it("treats unset keys as off", () => {
      expect(readInferenceConfig(sourceOf({})).preferTimestampNtz).toBe(false);
    });
  });

  describe("readSerializerConfig", () => {
    it("falls back to UTC when the time zone is unset", () => {
      expect(readSerializerConfig(sourceOf({}))).toEqual({
        timezone: "UTC",
        safeCast: false,
      });
    });

    it("reads the configured values", () => {
      const config = readSerializerConfig(
        createStaticConfigSource({
          [CONFIG_KEYS.sessionTimeZone]: "Europe/Lisbon",
          [CONFIG_KEYS.safeCast]: "true",
        }),
      );
      expect(config).toEqual({ timezone: "Europe/Lisbon", safeCast: true });
    });

    it("raises CONFIG_ERROR for an empty time zone", () => {
      const source = sourceOf({ [CONFIG_KEYS.sessionTimeZone]: "" });

      let caught: unknown;
      try {
        readSerializerConfig(source);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      if (!(caught instanceof AppError)) {
        throw new Error("Expected AppError");
      }
      expect(caught.code).toBe(ErrorCode.CONFIG_ERROR);
      expect(caught.extensions?.violations).toEqual([
        "timezone: session time zone must not be empty",
      ]);
    });
  });

  describe("createStaticConfigSource", () => {
    it("returns null for unknown keys", () => {
      const source = createStaticConfigSource({ "custom.key": "1" });
      expect(source.getConfigs("custom.key", "missing.key")).toEqual(["1", null]);
    });
  });

  describe("createEnvConfigSource", () => {
    it("seeds the session time zone from the environment", () => {
      const env = validateEnv({ COLFRAME_SESSION_TIMEZONE: "Asia/Tokyo" });
      const source = createEnvConfigSource(env);
      expect(source.getConfigs(CONFIG_KEYS.sessionTimeZone)).toEqual([
        "Asia/Tokyo",
      ]);
    });

    it("keeps the default when the variable is absent", () => {
      const source = createEnvConfigSource(validateEnv({}));
      expect(source.getConfigs(CONFIG_KEYS.sessionTimeZone)).toEqual(["UTC"]);
    });
  });
});

describe("validateEnv", () => {
  it("applies defaults", () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: "development",
      LOG_FORMAT: "text",
    });
  });

  it("rejects an unknown log format", () => {
    expect(() => validateEnv({ LOG_FORMAT: "xml" })).toThrow();
  });
});
