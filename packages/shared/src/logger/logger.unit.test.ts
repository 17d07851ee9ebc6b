import { describe, expect, it } from "vitest";

import {
  createLoggerOptions,
  createSilentLogger,
  REDACTED_FIELD_PATHS,
} from "./logger";

describe("createLoggerOptions", () => {
  it("uses pino-pretty outside production with text format", () => {
    const options = createLoggerOptions({
      nodeEnv: "development",
      logFormat: "text",
    });

    expect(options.transport).toEqual({
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard" },
    });
    expect(options.level).toBe("debug");
  });

  it("emits JSON in production at info level", () => {
    const options = createLoggerOptions({ nodeEnv: "production" });

    expect(options.transport).toBeUndefined();
    expect(options.level).toBe("info");
  });

  it("emits JSON when LOG_FORMAT=json", () => {
    const options = createLoggerOptions({
      nodeEnv: "development",
      logFormat: "json",
    });
    expect(options.transport).toBeUndefined();
  });

  it("honours an explicit level", () => {
    expect(
      createLoggerOptions({ nodeEnv: "production", logLevel: "warn" }).level,
    ).toBe("warn");
  });

  it("redacts every sensitive field path", () => {
    const options = createLoggerOptions({ nodeEnv: "test" });

    expect(options.redact).toEqual({
      paths: expect.arrayContaining([...REDACTED_FIELD_PATHS]),
      censor: "[REDACTED]",
    });
  });

  it("names the logger", () => {
    expect(createLoggerOptions({}).name).toBe("colframe");
    expect(createLoggerOptions({ name: "ingest" }).name).toBe("ingest");
  });
});

describe("createSilentLogger", () => {
  it("is disabled", () => {
    const logger = createSilentLogger();
    expect(logger.isLevelEnabled("fatal")).toBe(false);
  });
});
