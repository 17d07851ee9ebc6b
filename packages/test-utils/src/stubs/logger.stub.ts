/**
 * Pino logger that keeps every emitted record in memory
 */

import pino, { type Logger } from "pino";

export interface CapturedLogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export interface CapturingLogger {
  logger: Logger;
  records: CapturedLogRecord[];
  /** Messages logged at `level` (pino's numeric levels, e.g. 40 for warn) */
  messagesAt: (level: number) => string[];
}

function isLogRecord(value: unknown): value is CapturedLogRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

export function createCapturingLogger(level: pino.Level = "debug"): CapturingLogger {
  const records: CapturedLogRecord[] = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isLogRecord(parsed)) {
          records.push(parsed);
        }
      },
    },
  );

  return {
    logger,
    records,
    messagesAt: (wanted) =>
      records.filter((r) => r.level === wanted).map((r) => r.msg),
  };
}
