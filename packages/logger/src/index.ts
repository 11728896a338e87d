export { createLogger } from './logger.js';
export { createFileSink, createMemorySink, type MemorySink } from './sinks.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
