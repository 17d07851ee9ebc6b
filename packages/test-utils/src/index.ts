export { assertDefined, captureAppError } from "./assert";
export {
  createPersonRecord,
  createPersonRecords,
  type MockPersonRecord,
  toPersonColumns,
  toPersonTuples,
} from "./factories/record.factory";
export { getNextRecordId, resetFactories, resetRecordCounter } from "./setup/reset";
export {
  type ConfigSourceStub,
  createConfigSourceStub,
} from "./stubs/config-source.stub";
export {
  type CapturedLogRecord,
  type CapturingLogger,
  createCapturingLogger,
} from "./stubs/logger.stub";
export { withOverrides } from "./stubs/with-overrides";
