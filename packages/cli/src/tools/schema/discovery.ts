import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { SchemaDocumentInput, SchemaModuleSource } from '@protoyard/compiler';
import fg from 'fast-glob';

import type { SchemaModuleLocation } from './configuration.js';

const DOCUMENT_SUFFIXES = Object.freeze(['.spy.yaml', '.yaml']);

export interface SchemaDocumentDiscoveryOptions {
  /** Directory `sourceFileName`s are made relative to. */
  readonly cwd: string;
  readonly readFile?: (filePath: string, encoding: BufferEncoding) => Promise<string>;
  readonly glob?: (patterns: readonly string[], options: fg.Options) => Promise<string[]>;
}

const toPosix = (filePath: string): string => filePath.split(path.sep).join(path.posix.sep);

/**
 * Strips the model document suffix from a file name.
 *
 * @param baseName - File name without directories.
 * @returns `user_info` for `user_info.spy.yaml`.
 */
export function documentFileName(baseName: string): string {
  const suffix = DOCUMENT_SUFFIXES.find((candidate) => baseName.endsWith(candidate));
  return suffix === undefined ? baseName : baseName.slice(0, -suffix.length);
}

async function defaultGlob(patterns: readonly string[], options: fg.Options): Promise<string[]> {
  return fg([...patterns], options);
}

/**
 * Reads every model document of a module.
 *
 * @param location - Module directory and glob patterns.
 * @param options - Working directory and overridable file access.
 * @returns The module's documents in path order.
 */
export async function discoverSchemaModule(
  location: SchemaModuleLocation,
  options: SchemaDocumentDiscoveryOptions,
): Promise<SchemaModuleSource> {
  const glob = options.glob ?? defaultGlob;
  const read = options.readFile ?? readFile;

  const matches = await glob(location.patterns, {
    absolute: true,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
    cwd: location.directory,
  });
  const sorted = [...matches].sort((left, right) => toPosix(left).localeCompare(toPosix(right)));

  const documents: SchemaDocumentInput[] = [];
  for (const filePath of sorted) {
    const relative = toPosix(path.relative(location.directory, filePath));
    const segments = relative.split(path.posix.sep).filter((segment) => segment.length > 0);
    const baseName = segments.at(-1) ?? relative;
    documents.push({
      yaml: await read(filePath, 'utf8'),
      sourceFileName: toPosix(path.relative(options.cwd, filePath)),
      fileName: documentFileName(baseName),
      subDirectoryParts: segments.slice(0, -1),
    });
  }

  return {
    name: location.name,
    ...(location.alias === undefined ? {} : { alias: location.alias }),
    documents,
  };
}
