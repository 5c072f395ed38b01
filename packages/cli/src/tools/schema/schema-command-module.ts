import type { Command } from 'commander';

import type { CliCommandModule } from '../../kernel/types.js';
import { executeAnalyzeCommand } from './analyze-command-runner.js';
import type { PrepareSchemaEnvironmentDependencies } from './environment.js';
import { executeInspectCommand } from './inspect-command-runner.js';
import { registerSchemaCommandOptions } from './options.js';

/**
 * Registers `analyze` and `inspect`. `dependencies` overrides the working directory and file
 * access of both commands.
 */
export const createSchemaCommandModule = (
  dependencies?: PrepareSchemaEnvironmentDependencies,
): CliCommandModule => ({
  id: 'schema.workflows',
  register(program, context) {
    const analyzeCommand = registerSchemaCommandOptions(
      program
        .command('analyze')
        .summary('Validate model documents and report diagnostics.')
        .description('Compile the model documents of a project and its dependency modules.'),
    ).option('--json', 'Emit a JSON report instead of human-readable output.', false);

    analyzeCommand.action(async (_directory: unknown, _options: unknown, command: Command) => {
      await executeAnalyzeCommand({
        command,
        io: context.io,
        globalOptions: context.getGlobalOptions(),
        ...(dependencies ? { dependencies } : {}),
      });
    });

    const inspectCommand = registerSchemaCommandOptions(
      program
        .command('inspect')
        .summary('Print the compiled definitions as JSON.')
        .description('Compile the model documents and print the model definitions and table definitions.'),
    );

    inspectCommand.action(async (_directory: unknown, _options: unknown, command: Command) => {
      await executeInspectCommand({
        command,
        io: context.io,
        globalOptions: context.getGlobalOptions(),
        ...(dependencies ? { dependencies } : {}),
      });
    });
  },
});

export const schemaCommandModule: CliCommandModule = createSchemaCommandModule();
