import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { cosmiconfig, defaultLoaders, type CosmiconfigResult, type Loader } from 'cosmiconfig';

type NonNullableCosmiconfigResult = Exclude<CosmiconfigResult, null>;

export const DEFAULT_CONFIG_FILES = Object.freeze([
  'protoyard.config.json',
  'protoyard.config.mjs',
  'protoyard.config.js',
  'protoyard.config.cjs',
] as const);

export interface FindConfigOptions {
  readonly cwd?: string;
  readonly configPath?: string;
  readonly candidates?: readonly string[];
}

export interface LoadedConfigModule {
  readonly path: string;
  readonly directory: string;
  readonly config: unknown;
}

const MODULE_NAME = 'protoyard';

const moduleLoader: Loader = async (filepath: string, _content: string) => {
  const importedModule: unknown = await import(pathToFileURL(filepath).href);
  if (!isRecord(importedModule)) {
    return importedModule;
  }
  if ('default' in importedModule) {
    return importedModule['default'];
  }
  if ('config' in importedModule) {
    return importedModule['config'];
  }
  return importedModule;
};

function createExplorer(searchPlaces: readonly string[], stopDir: string) {
  return cosmiconfig(MODULE_NAME, {
    cache: false,
    searchPlaces: [...searchPlaces],
    stopDir,
    loaders: {
      '.json': defaultLoaders['.json'],
      '.js': moduleLoader,
      '.mjs': moduleLoader,
      '.cjs': moduleLoader,
    },
    transform: async (result: CosmiconfigResult) => (result ? transformResult(result) : result),
  });
}

/**
 * Locates and loads a configuration file. An explicit `configPath` must exist; otherwise the
 * working directory is searched for the default candidates and `undefined` is returned when none
 * is present.
 *
 * @param options - Overrides for the working directory, explicit path, or search candidates.
 * @returns The loaded configuration, or `undefined` when no file was found by searching.
 * @throws {Error} When an explicit configuration path does not exist.
 */
export async function findConfig(
  options: FindConfigOptions = {},
): Promise<LoadedConfigModule | undefined> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  if (options.configPath) {
    return loadConfigModule({ path: options.configPath, cwd });
  }

  const searchPlaces = options.candidates ? [...options.candidates] : [...DEFAULT_CONFIG_FILES];
  const result = await createExplorer(searchPlaces, cwd).search(cwd);
  if (!result || result.isEmpty) {
    return undefined;
  }

  return toLoadedConfig(result);
}

export interface LoadConfigModuleOptions {
  readonly path: string;
  readonly cwd?: string;
}

/**
 * Loads a configuration module, resolving any function or promise exports.
 *
 * @param options - Module loading options including the relative or absolute path.
 * @returns Loaded configuration metadata and the resolved configuration value.
 */
export async function loadConfigModule(
  options: LoadConfigModuleOptions,
): Promise<LoadedConfigModule> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const resolvedPath = path.resolve(cwd, options.path);
  const explorer = createExplorer(DEFAULT_CONFIG_FILES, path.dirname(resolvedPath));

  try {
    const result = await explorer.load(resolvedPath);
    if (!result || result.isEmpty) {
      throw new Error(`Configuration file not found at ${resolvedPath}`);
    }
    return toLoadedConfig(result);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new Error(`Configuration file not found at ${resolvedPath}`);
    }
    throw error;
  }
}

function toLoadedConfig(result: NonNullableCosmiconfigResult): LoadedConfigModule {
  return {
    path: result.filepath,
    directory: path.dirname(result.filepath),
    config: result.config,
  };
}

async function transformResult(
  result: NonNullableCosmiconfigResult,
): Promise<NonNullableCosmiconfigResult> {
  const resolvedConfig = await resolveExportedValue(result.config);
  return { ...result, config: resolvedConfig };
}

async function resolveExportedValue(candidate: unknown): Promise<unknown> {
  let value: unknown = candidate;

  for (;;) {
    if (typeof value === 'function') {
      const exported: unknown = Reflect.apply(value, undefined, []);
      value = exported;
      continue;
    }

    if (value instanceof Promise) {
      value = await value;
      continue;
    }

    return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isMissingFileError(error: unknown): error is NodeJS.ErrnoException {
  return isRecord(error) && error['code'] === 'ENOENT';
}
