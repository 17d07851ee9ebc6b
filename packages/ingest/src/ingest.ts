import {
  AppError,
  type ConfigSource,
  createSilentLogger,
  ErrorCode,
  getErrorTitle,
  isTerminal,
  type Logger,
  readInferenceConfig,
  readSerializerConfig,
  toAppError,
} from "@colframe/shared";
import { Table } from "apache-arrow";

import type { AdapterResult, DeclaredSchema } from "./adapters/adapter-result";
import { isFrameLike } from "./adapters/frame";
import { adaptFrame } from "./adapters/frame-adapter";
import { isNDArrayLike, isNumericTypedArray, NDArray, type NDArrayLike } from "./adapters/ndarray";
import { adaptNDArray } from "./adapters/ndarray-adapter";
import { adaptSequence } from "./adapters/sequence-adapter";
import { emptyColumnarTable } from "./columnar";
import { parseDdl as defaultParseDdl } from "./ddl-parser";
import { invalidInputType } from "./errors";
import { LocalRelation } from "./local-relation";
import { type ReconciledTable, reconcileSchema } from "./schema-reconciler";
import { asSchema, simpleString } from "./type-model";
import type { DataType } from "./types";

/**
 * Capabilities the pipeline needs from its host session.
 */
export interface IngestionContext {
  config: ConfigSource;
  /** Parses a DDL schema string; defaults to the built-in parser. */
  parseDdl?: (ddl: string) => DataType;
  logger?: Logger;
}

/** A type, a DDL string, or a list of column names. */
export type SchemaInput = DataType | string | readonly string[];

export enum InputShape {
  FRAME = "frame",
  NDARRAY = "ndarray",
  SEQUENCE = "sequence",
}

function isNameList(schema: SchemaInput): schema is readonly string[] {
  return Array.isArray(schema);
}

function resolveSchema(
  schema: SchemaInput | undefined,
  parse: (ddl: string) => DataType,
): DeclaredSchema {
  if (schema === undefined) {
    return {};
  }
  if (typeof schema === "string") {
    return { schema: parse(schema) };
  }
  if (isNameList(schema)) {
    return { names: schema };
  }
  return { schema };
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Classifies the input. Frames and arrays are recognized by their shape;
 * any other non-string iterable is a sequence of records.
 *
 * @throws AppError INVALID_INPUT_TYPE
 */
export function detectInputShape(data: unknown): InputShape {
  if (data instanceof LocalRelation || data instanceof Table) {
    throw invalidInputType(data, "detectInputShape");
  }
  if (isFrameLike(data)) {
    return InputShape.FRAME;
  }
  if (isNDArrayLike(data) || isNumericTypedArray(data)) {
    return InputShape.NDARRAY;
  }
  if (isIterable(data)) {
    return InputShape.SEQUENCE;
  }
  throw invalidInputType(data, "detectInputShape");
}

function asNDArray(data: unknown): NDArrayLike {
  if (isNDArrayLike(data)) {
    return data;
  }
  if (isNumericTypedArray(data)) {
    return new NDArray(data);
  }
  throw invalidInputType(data, "adaptNDArray");
}

/** Row count when known without consuming the input. */
function knownLength(data: unknown, shape: InputShape): number | undefined {
  switch (shape) {
    case InputShape.FRAME:
      return isFrameLike(data) ? data.rowCount : undefined;
    case InputShape.NDARRAY: {
      const array = asNDArray(data);
      // Rank is checked by the adapter before emptiness.
      return array.shape.length === 1 || array.shape.length === 2
        ? array.shape[0]
        : undefined;
    }
    case InputShape.SEQUENCE:
      if (Array.isArray(data)) {
        return data.length;
      }
      return data instanceof Set || data instanceof Map ? data.size : undefined;
  }
}

function adapt(
  data: unknown,
  shape: InputShape,
  declared: DeclaredSchema,
  config: ConfigSource,
): AdapterResult {
  switch (shape) {
    case InputShape.FRAME:
      if (!isFrameLike(data)) {
        throw invalidInputType(data, "adaptFrame");
      }
      return adaptFrame(data, declared, {
        inference: readInferenceConfig(config),
        serializer: readSerializerConfig(config),
      });
    case InputShape.NDARRAY:
      return adaptNDArray(asNDArray(data), declared);
    case InputShape.SEQUENCE:
      if (!isIterable(data)) {
        throw invalidInputType(data, "adaptSequence");
      }
      return adaptSequence(data, declared, readInferenceConfig(config));
  }
}

/**
 * Turns local data into a columnar table and its schema.
 *
 * `data` may be a frame, a 1-D or 2-D numeric array, or an iterable of
 * records. `schema` may be a type, a DDL string, or a list of column names.
 * The returned table always has as many columns as the schema has fields.
 *
 * @throws AppError with one of the ingestion error codes; anything else
 *   raised along the way surfaces as UNKNOWN
 */
export function ingest(
  data: unknown,
  schema: SchemaInput | undefined,
  context: IngestionContext,
): ReconciledTable {
  const logger = context.logger ?? createSilentLogger();

  try {
    const shape = detectInputShape(data);
    const declared = resolveSchema(schema, context.parseDdl ?? defaultParseDdl);
    logger.debug(
      {
        shape,
        schema: declared.schema && simpleString(declared.schema),
        columnNames: declared.names,
      },
      "ingesting local data",
    );

    const length = knownLength(data, shape);
    if (length === 0) {
      if (!declared.schema) {
        throw new AppError(ErrorCode.EMPTY_INPUT, undefined, {
          operation: "ingest",
          inputShape: shape,
        });
      }
      const empty = asSchema(declared.schema);
      const { timezone } = readSerializerConfig(context.config);
      return { table: emptyColumnarTable(empty, timezone), schema: empty };
    }

    const adapted = adapt(data, shape, declared, context.config);
    const result = reconcileSchema(adapted, adapted);
    logger.debug(
      { shape, rows: result.table.numRows, columns: result.table.numCols },
      "ingested local data",
    );
    return result;
  } catch (error) {
    const appError = toAppError(error);
    logger.warn(
      {
        code: appError.code,
        title: getErrorTitle(appError.code),
        terminal: isTerminal(appError),
        extensions: appError.extensions,
      },
      "ingestion failed",
    );
    throw appError;
  }
}

/**
 * {@link ingest}, packaged as a {@link LocalRelation}.
 */
export function createLocalRelation(
  data: unknown,
  schema: SchemaInput | undefined,
  context: IngestionContext,
): LocalRelation {
  const { table, schema: resolved } = ingest(data, schema, context);
  return new LocalRelation(table, resolved);
}
