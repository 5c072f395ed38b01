import { inspect } from 'node:util';

/** A failure caused by the invocation itself, such as an invalid configuration file. */
export class CliUsageError extends Error {
  override readonly name = 'CliUsageError';
}

/**
 * Renders an error thrown out of a command action. Usage errors print their message alone;
 * anything else prints its stack.
 */
export const formatCliError = (error: unknown): string => {
  if (error instanceof CliUsageError) {
    return error.message;
  }

  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 2, breakLength: Number.POSITIVE_INFINITY });
};
