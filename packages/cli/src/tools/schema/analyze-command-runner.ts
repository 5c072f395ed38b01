import process from 'node:process';

import { compileSchema } from '@protoyard/compiler';
import type { Command } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import type { CliGlobalOptions } from '../../kernel/types.js';
import { prepareSchemaEnvironment, type PrepareSchemaEnvironmentDependencies } from './environment.js';
import { resolveSchemaCommandOptions } from './options.js';
import { createAnalyzeReport, formatJsonReport, writeHumanReport } from './reporters.js';

export interface ExecuteAnalyzeCommandOptions {
  readonly command: Command;
  readonly io: CliIo;
  readonly globalOptions: CliGlobalOptions;
  readonly dependencies?: PrepareSchemaEnvironmentDependencies;
}

export const executeAnalyzeCommand = async ({
  command,
  io,
  globalOptions,
  dependencies,
}: ExecuteAnalyzeCommandOptions): Promise<void> => {
  const options = resolveSchemaCommandOptions(command);
  const environment = await prepareSchemaEnvironment(options, globalOptions, io, dependencies);

  const result = compileSchema({
    project: environment.project,
    dependencies: environment.dependencies,
    logger: environment.logger,
  });

  if (options.json) {
    io.writeOut(formatJsonReport(createAnalyzeReport(result)));
  } else {
    writeHumanReport(result, { write: (line: string) => io.writeOut(line) });
  }

  if (result.hasErrors) {
    process.exitCode = 1;
  }
};
