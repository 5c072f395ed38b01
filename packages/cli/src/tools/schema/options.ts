import type { Command } from 'commander';

export interface SchemaCommandOptions {
  readonly directory?: string;
  readonly config?: string;
  readonly json: boolean;
}

export const registerSchemaCommandOptions = (command: Command): Command =>
  command
    .argument('[directory]', 'Directory holding the model documents of the project module')
    .option('-c, --config <path>', 'Path to a protoyard configuration file');

const readString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

/** Reads the options shared by the schema commands. */
export const resolveSchemaCommandOptions = (command: Command): SchemaCommandOptions => {
  const options = command.optsWithGlobals<Record<string, unknown>>();
  const directory = readString(command.processedArgs[0]);
  const config = readString(options['config']);

  return {
    json: options['json'] === true,
    ...(directory === undefined ? {} : { directory }),
    ...(config === undefined ? {} : { config }),
  } satisfies SchemaCommandOptions;
};
