import { describe, expect, it } from 'vitest';

import { createCliKernel } from './index.js';
import type { CliGlobalOptions } from './kernel/types.js';
import { createMemoryCliIo } from './testing/memory-cli-io.js';

describe('CLI kernel', () => {
  const baseOptions = {
    programName: 'protoyard',
    version: '0.0.0-test',
  } as const;

  it('executes registered command actions', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });

    kernel.register({
      id: 'hello-command',
      register(command, context) {
        command
          .command('hello')
          .description('Prints a greeting.')
          .action(() => {
            context.io.writeOut('hello from the kernel\n');
          });
      },
    });

    const exitCode = await kernel.run(['node', 'protoyard', 'hello']);

    expect(exitCode).toBe(0);
    expect(io.stdoutBuffer).toBe('hello from the kernel\n');
  });

  it('makes global options available to command modules', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });
    let observedOptions: CliGlobalOptions | undefined;

    kernel.register({
      id: 'inspect-globals',
      register(command, context) {
        command.command('inspect-globals').action(() => {
          observedOptions = context.getGlobalOptions();
        });
      },
    });

    await kernel.run(['node', 'protoyard', '--json-logs', 'inspect-globals']);

    expect(observedOptions).toEqual({ logFormat: 'json' });
  });

  it('returns the exit code an action leaves on the process and restores it', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });
    const previous = process.exitCode;

    kernel.register({
      id: 'fail',
      register(command) {
        command.command('fail').action(() => {
          process.exitCode = 3;
        });
      },
    });

    expect(await kernel.run(['node', 'protoyard', 'fail'])).toBe(3);
    expect(process.exitCode).toBe(previous);
  });

  it('reports unexpected errors to stderr and propagates a failure code', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });

    kernel.register({
      id: 'explode',
      register(command) {
        command.command('explode').action(() => {
          const error = new Error('boom');
          error.stack = 'Error: boom';
          throw error;
        });
      },
    });

    const exitCode = await kernel.run(['node', 'protoyard', 'explode']);

    expect(exitCode).toBe(1);
    expect(io.stderrBuffer).toBe('Error: boom\n');
  });

  it('turns unknown commands into a commander exit code', async () => {
    const io = createMemoryCliIo();
    const kernel = createCliKernel({ ...baseOptions, io });
    kernel.register({
      id: 'noop',
      register(command) {
        command.command('noop').action(() => undefined);
      },
    });

    expect(await kernel.run(['node', 'protoyard', 'missing'])).toBe(1);
    expect(io.stderrBuffer).toContain("error: unknown command 'missing'");
  });
});
