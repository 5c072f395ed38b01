import { PassThrough } from 'node:stream';

import type { CliIo } from '../io/cli-io.js';

/** `CliIo` double recording everything written and every exit request. */
export interface MemoryCliIo extends CliIo {
  readonly stdoutBuffer: string;
  readonly stderrBuffer: string;
  readonly exitCodes: readonly number[];
}

export const createMemoryCliIo = (): MemoryCliIo => {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const exitCodes: number[] = [];

  return {
    stdin: new PassThrough(),
    stdout,
    stderr,
    writeOut: (chunk) => {
      stdoutChunks.push(chunk);
      stdout.write(chunk);
    },
    writeErr: (chunk) => {
      stderrChunks.push(chunk);
      stderr.write(chunk);
    },
    exit: (code): never => {
      exitCodes.push(code);
      throw new Error(`process exit called with code ${code}`);
    },
    get stdoutBuffer(): string {
      return stdoutChunks.join('');
    },
    get stderrBuffer(): string {
      return stderrChunks.join('');
    },
    get exitCodes(): readonly number[] {
      return exitCodes;
    },
  };
};
