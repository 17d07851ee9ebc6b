export {
  AppError,
  type AppErrorExtensions,
  ErrorCode,
  type ErrorContext,
  ErrorMessages,
  getErrorTitle,
  isTerminal,
  toAppError,
} from "./errors";
export {
  type InfrastructureEnv,
  infrastructureSchema,
  validateEnv,
} from "./config/env.schema";
export {
  CONFIG_KEYS,
  type ConfigSource,
  createEnvConfigSource,
  createStaticConfigSource,
  DEFAULT_CONFIG,
  type InferenceConfig,
  inferenceConfigSchema,
  readInferenceConfig,
  readSerializerConfig,
  type SerializerConfig,
  serializerConfigSchema,
} from "./config/ingest-config";
export {
  createLogger,
  createLoggerOptions,
  createSilentLogger,
  type Logger,
  type LoggerSettings,
  REDACTED_FIELD_PATHS,
} from "./logger/logger";
