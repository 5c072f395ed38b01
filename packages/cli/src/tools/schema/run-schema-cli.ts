import process from 'node:process';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import type { CliKernel } from '../../kernel/types.js';
import type { CliIo } from '../../io/cli-io.js';
import type { PrepareSchemaEnvironmentDependencies } from './environment.js';
import { createSchemaCommandModule } from './schema-command-module.js';

export interface CreateSchemaCliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
  readonly dependencies?: PrepareSchemaEnvironmentDependencies | undefined;
}

export const createSchemaCliKernel = ({
  dependencies,
  ...options
}: CreateSchemaCliKernelOptions): CliKernel => {
  const kernel = createCliKernel(options);
  kernel.register(createSchemaCommandModule(dependencies));
  return kernel;
};

export interface RunSchemaCliOptions extends CreateSchemaCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const runSchemaCli = async ({ argv = process.argv, ...options }: RunSchemaCliOptions): Promise<number> =>
  createSchemaCliKernel(options).run(argv);
