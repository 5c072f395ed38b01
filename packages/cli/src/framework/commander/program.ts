import { Command } from 'commander';

import type { CliIo } from '../../io/cli-io.js';
import { registerGlobalOptions } from './global-options.js';

export interface CommanderProgramOptions {
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io: CliIo;
}

/**
 * Builds the root commander program with output routed through the CLI io and process exits
 * replaced by thrown `CommanderError`s.
 */
export const createCommanderProgram = (options: CommanderProgramOptions): Command => {
  const program = new Command(options.name);
  const { io } = options;

  program
    .description(options.description ?? '')
    .version(options.version)
    .configureHelp({ sortOptions: true })
    .configureOutput({
      writeOut: (text: string) => io.writeOut(text),
      writeErr: (text: string) => io.writeErr(text),
      outputError: (text: string) => io.writeErr(text),
    })
    .showHelpAfterError('(add --help for usage information)');

  registerGlobalOptions(program);
  program.exitOverride();

  return program;
};
