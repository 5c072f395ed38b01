export {
  JsonLineLogger,
  PrettyLineLogger,
  noopLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  formatDiagnostic,
  formatDurationMs,
  writeLine,
  type WritableTarget,
} from './reporting/index.js';

export {
  createDiagnosticSpan,
  createNullDiagnosticsPort,
  DiagnosticCategories,
  DiagnosticsCollector,
  type DiagnosticCategory,
  type DiagnosticEvent,
  type DiagnosticLevel,
  type DiagnosticRelatedInformation,
  type DiagnosticSpan,
  type DiagnosticSpanPosition,
  type DiagnosticsPort,
} from './instrumentation/diagnostics.js';

export {
  DEFAULT_CONFIG_FILES,
  findConfig,
  loadConfigModule,
  type FindConfigOptions,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
} from './config/index.js';
