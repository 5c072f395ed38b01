export {
  JsonLineLogger,
  PrettyLineLogger,
  noopLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
