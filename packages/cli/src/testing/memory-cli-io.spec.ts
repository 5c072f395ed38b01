import { describe, expect, it } from 'vitest';

import { createMemoryCliIo } from './memory-cli-io.js';

describe('createMemoryCliIo', () => {
  it('joins written chunks per stream', () => {
    const io = createMemoryCliIo();

    io.writeOut('Analyzed 2 models');
    io.writeOut(' in 1 module\n');
    io.writeErr('[debug] compiler.stage\n');

    expect(io.stdoutBuffer).toBe('Analyzed 2 models in 1 module\n');
    expect(io.stderrBuffer).toBe('[debug] compiler.stage\n');
  });

  it('records exit requests instead of exiting', () => {
    const io = createMemoryCliIo();

    expect(() => io.exit(1)).toThrow('process exit called with code 1');
    expect(io.exitCodes).toEqual([1]);
  });
});
