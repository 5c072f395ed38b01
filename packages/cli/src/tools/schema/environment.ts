import process from 'node:process';

import type { SchemaModuleSource } from '@protoyard/compiler';
import { JsonLineLogger, noopLogger, PrettyLineLogger, type StructuredLogger } from '@protoyard/core';

import type { CliIo } from '../../io/cli-io.js';
import type { CliGlobalOptions, CliLogFormat } from '../../kernel/types.js';
import { isInteractiveStream } from '../../utils/streams.js';
import { resolveSchemaWorkspace, type SchemaWorkspace } from './configuration.js';
import { discoverSchemaModule, type SchemaDocumentDiscoveryOptions } from './discovery.js';
import type { SchemaCommandOptions } from './options.js';

export interface PreparedSchemaEnvironment {
  readonly workspace: SchemaWorkspace;
  readonly logger: StructuredLogger;
  readonly project: SchemaModuleSource;
  readonly dependencies: readonly SchemaModuleSource[];
}

export interface PrepareSchemaEnvironmentDependencies {
  readonly cwd?: string;
  readonly discovery?: Omit<SchemaDocumentDiscoveryOptions, 'cwd'>;
}

/**
 * Selects the logger for a command: JSON lines on stdout with `--json-logs`, readable lines on
 * an interactive stderr, otherwise nothing.
 */
export const createSchemaLogger = (logFormat: CliLogFormat, io: CliIo): StructuredLogger => {
  if (logFormat === 'json') {
    return new JsonLineLogger({ write: (line: string) => io.writeOut(line) });
  }
  if (isInteractiveStream(io.stderr)) {
    return new PrettyLineLogger({ write: (line: string) => io.writeErr(line) });
  }
  return noopLogger;
};

/**
 * Resolves the workspace and reads the documents of every module it names.
 */
export const prepareSchemaEnvironment = async (
  options: SchemaCommandOptions,
  globalOptions: CliGlobalOptions,
  io: CliIo,
  dependencies: PrepareSchemaEnvironmentDependencies = {},
): Promise<PreparedSchemaEnvironment> => {
  const cwd = dependencies.cwd ?? process.cwd();
  const logger = createSchemaLogger(globalOptions.logFormat, io);
  const workspace = await resolveSchemaWorkspace({
    cwd,
    ...(options.config === undefined ? {} : { configPath: options.config }),
    ...(options.directory === undefined ? {} : { directory: options.directory }),
  });

  const discovery: SchemaDocumentDiscoveryOptions = { ...dependencies.discovery, cwd };
  const project = await discoverSchemaModule(workspace.project, discovery);
  const dependencyModules: SchemaModuleSource[] = [];
  for (const location of workspace.dependencies) {
    dependencyModules.push(await discoverSchemaModule(location, discovery));
  }

  logger.log({
    level: 'debug',
    name: 'cli',
    event: 'cli.workspace',
    data: {
      configPath: workspace.configPath ?? null,
      modules: [project, ...dependencyModules].map((module) => ({
        name: module.name,
        documents: module.documents.length,
      })),
    },
  });

  return { workspace, logger, project, dependencies: dependencyModules };
};
