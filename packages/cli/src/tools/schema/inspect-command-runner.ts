import process from 'node:process';

import { compileSchema } from '@protoyard/compiler';
import { formatDiagnostic } from '@protoyard/core';
import type { Command } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import type { CliGlobalOptions } from '../../kernel/types.js';
import { prepareSchemaEnvironment, type PrepareSchemaEnvironmentDependencies } from './environment.js';
import { resolveSchemaCommandOptions } from './options.js';
import { createInspectReport, formatJsonReport } from './reporters.js';

export interface ExecuteInspectCommandOptions {
  readonly command: Command;
  readonly io: CliIo;
  readonly globalOptions: CliGlobalOptions;
  readonly dependencies?: PrepareSchemaEnvironmentDependencies;
}

export const executeInspectCommand = async ({
  command,
  io,
  globalOptions,
  dependencies,
}: ExecuteInspectCommandOptions): Promise<void> => {
  const options = resolveSchemaCommandOptions(command);
  const environment = await prepareSchemaEnvironment(options, globalOptions, io, dependencies);

  const result = compileSchema({
    project: environment.project,
    dependencies: environment.dependencies,
    logger: environment.logger,
  });

  io.writeOut(formatJsonReport(createInspectReport(result)));

  if (result.hasErrors) {
    for (const event of result.diagnostics.filter((diagnostic) => diagnostic.level === 'error')) {
      io.writeErr(`${formatDiagnostic(event)}\n`);
    }
    process.exitCode = 1;
  }
};
