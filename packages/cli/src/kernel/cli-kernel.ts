import process from 'node:process';

import { CommanderError } from 'commander';

import { createCommanderProgram } from '../framework/commander/program.js';
import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliGlobalOptions,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
} from './types.js';

/** Exit code a command action left on `process.exitCode`, ignoring success. */
const pendingExitCode = (): number | undefined => {
  const exitCode = process.exitCode;
  return typeof exitCode === 'number' && exitCode !== 0 ? exitCode : undefined;
};

const commanderExitCode = (error: CommanderError): number | undefined => {
  const parsed = Number.parseInt(String(error.exitCode), 10);
  return Number.isNaN(parsed) ? undefined : parsed;
};

/**
 * Creates the command line kernel. Command modules register their commands on the shared
 * program; actions report failure by setting `process.exitCode`, which `run` turns into its
 * return value and then restores.
 */
export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createCommanderProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    io,
  });

  let globalOptions: CliGlobalOptions = createDefaultGlobalOptions();
  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => globalOptions,
  };

  program.hook('preAction', () => {
    globalOptions = readGlobalOptions(program);
  });

  const kernel: CliKernel = {
    register(module: CliCommandModule): CliKernel {
      module.register(program, context);
      return kernel;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      if (argv.length === 0) {
        throw new Error('Argument vector must include at least the node executable.');
      }
      const previousExitCode = process.exitCode;

      try {
        await program.parseAsync([...argv], { from: 'node' });
        globalOptions = readGlobalOptions(program);
        return pendingExitCode() ?? 0;
      } catch (error) {
        if (error instanceof CommanderError) {
          return pendingExitCode() ?? commanderExitCode(error) ?? 1;
        }

        const message = formatCliError(error);
        io.writeErr(message.endsWith('\n') ? message : `${message}\n`);
        return pendingExitCode() ?? 1;
      } finally {
        process.exitCode = previousExitCode;
      }
    },
  };

  return kernel;
};
