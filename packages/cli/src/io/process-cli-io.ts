import process from 'node:process';

import type { CliIo } from './cli-io.js';

export interface ProcessCliIoOptions {
  readonly process?: NodeJS.Process;
}

/**
 * Adapts a node process to `CliIo`. Exiting with 0 keeps a failure code an action already left
 * on `exitCode`.
 */
export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target = options.process ?? process;

  const resolveExitCode = (code: number): number => {
    const pending = target.exitCode;
    if (code !== 0 || pending === undefined || Number(pending) === 0) {
      return code;
    }
    return Number(pending);
  };

  return {
    stdin: target.stdin,
    stdout: target.stdout,
    stderr: target.stderr,
    writeOut: (chunk) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk) => {
      target.stderr.write(chunk);
    },
    exit: (code): never => target.exit(resolveExitCode(code)),
  };
};
