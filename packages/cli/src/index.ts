export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliGlobalOptions,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo } from './io/process-cli-io.js';
export { CliUsageError, formatCliError } from './utils/format-cli-error.js';
export type { CliIo } from './io/cli-io.js';
export {
  createSchemaCommandModule,
  schemaCommandModule,
} from './tools/schema/schema-command-module.js';
export { createSchemaCliKernel, runSchemaCli } from './tools/schema/run-schema-cli.js';
export {
  DEFAULT_SCHEMA_PATTERNS,
  parseSchemaWorkspaceConfig,
  resolveSchemaWorkspace,
  schemaWorkspaceConfigSchema,
  type SchemaModuleLocation,
  type SchemaWorkspace,
  type SchemaWorkspaceConfig,
} from './tools/schema/configuration.js';
export { discoverSchemaModule, documentFileName } from './tools/schema/discovery.js';
export type { PrepareSchemaEnvironmentDependencies } from './tools/schema/environment.js';
