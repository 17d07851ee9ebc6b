export type { AdapterResult, DeclaredSchema } from "./adapters/adapter-result";
export {
  detectStorageType,
  type FrameLike,
  isFrameLike,
  LocalFrame,
  type StorageType,
} from "./adapters/frame";
export { adaptFrame, type FrameAdapterOptions, storageToType } from "./adapters/frame-adapter";
export { type SerializedColumn, serializeFrame } from "./adapters/frame-serializer";
export {
  elementType,
  isNDArrayLike,
  isNumericTypedArray,
  NDArray,
  type NDArrayLike,
  type NumericTypedArray,
} from "./adapters/ndarray";
export { adaptNDArray } from "./adapters/ndarray-adapter";
export { adaptSequence } from "./adapters/sequence-adapter";
export {
  buildColumnarTable,
  type ColumnarTable,
  columnNames,
  DEFAULT_TIMEZONE,
  emptyColumnarTable,
  type EncodedColumn,
  renameColumns,
  toArrowType,
} from "./columnar";
export { parseDdl } from "./ddl-parser";
export {
  createLocalRelation,
  detectInputShape,
  ingest,
  type IngestionContext,
  InputShape,
  type SchemaInput,
} from "./ingest";
export { LocalRelation } from "./local-relation";
export {
  classifyRecord,
  normalizeRecord,
  type RecordShape,
} from "./record-shape";
export {
  DEFAULT_INFERENCE_OPTIONS,
  type InferenceOptions,
  inferRecordSchema,
  INFERRED_DECIMAL,
  inferSchemaFromRecords,
  inferSchemaFromShapes,
  inferType,
  positionalNames,
} from "./schema-inferrer";
export {
  type ReconciledTable,
  type ReconcileExpectation,
  reconcileSchema,
} from "./schema-reconciler";
export {
  asSchema,
  deduplicateFieldNames,
  findUnresolvedField,
  hasNullType,
  type JsonValue,
  mergeSchemas,
  mergeTypes,
  simpleString,
  toDdl,
  toJson,
  typeEquals,
  typeToDdl,
} from "./type-model";
export * from "./types";
export { convertRecords, convertValue } from "./value-converter";
export { DecimalValue, TimeDelta, type TimeDeltaParts } from "./values";
