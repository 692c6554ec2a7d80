export {
  configureLogger,
  createLogger,
  createRuntimeLogger,
  getLogger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  resolveLogLevel,
  type RuntimeLogger,
  wrapLogger,
} from "./logger";
