import path from 'node:path';

import { findConfig } from '@protoyard/core';
import { z } from 'zod';

import { CliUsageError } from '../../utils/format-cli-error.js';

export const DEFAULT_SCHEMA_PATTERNS = Object.freeze(['**/*.spy.yaml']);

const nonEmptyString = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'String must not be empty.' });

const moduleLocationSchema = z
  .object({
    name: nonEmptyString,
    alias: nonEmptyString.optional(),
    directory: nonEmptyString,
    patterns: z.array(nonEmptyString).min(1).optional(),
  })
  .strict();

export const schemaWorkspaceConfigSchema = z
  .object({
    project: moduleLocationSchema,
    dependencies: z.array(moduleLocationSchema).optional(),
  })
  .strict();

export type SchemaWorkspaceConfig = z.infer<typeof schemaWorkspaceConfigSchema>;

/** A module whose documents live under an absolute `directory`. */
export interface SchemaModuleLocation {
  readonly name: string;
  readonly alias?: string;
  readonly directory: string;
  readonly patterns: readonly string[];
}

export interface SchemaWorkspace {
  readonly project: SchemaModuleLocation;
  readonly dependencies: readonly SchemaModuleLocation[];
  readonly configPath?: string;
}

export interface ResolveSchemaWorkspaceOptions {
  readonly cwd: string;
  readonly configPath?: string;
  readonly directory?: string;
}

const toLocation = (
  module: z.infer<typeof moduleLocationSchema>,
  configDirectory: string,
): SchemaModuleLocation => ({
  name: module.name,
  ...(module.alias === undefined ? {} : { alias: module.alias }),
  directory: path.resolve(configDirectory, module.directory),
  patterns: module.patterns ?? DEFAULT_SCHEMA_PATTERNS,
});

const describeIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

/**
 * Validates a loaded configuration value and resolves module directories against the directory
 * of the configuration file.
 *
 * @param value - Value exported by the configuration file.
 * @param configPath - Absolute path of the configuration file.
 * @returns The workspace described by the configuration.
 * @throws {CliUsageError} When the value does not match the configuration schema.
 */
export function parseSchemaWorkspaceConfig(value: unknown, configPath: string): SchemaWorkspace {
  const parsed = schemaWorkspaceConfigSchema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `  - ${describeIssue(issue)}`).join('\n');
    throw new CliUsageError(`Invalid protoyard configuration in ${configPath}:\n${details}`);
  }

  const configDirectory = path.dirname(configPath);
  return {
    project: toLocation(parsed.data.project, configDirectory),
    dependencies: (parsed.data.dependencies ?? []).map((module) => toLocation(module, configDirectory)),
    configPath,
  };
}

const directoryWorkspace = (directory: string): SchemaWorkspace => ({
  project: {
    name: path.basename(directory),
    directory,
    patterns: DEFAULT_SCHEMA_PATTERNS,
  },
  dependencies: [],
});

/**
 * Works out which modules to compile. An explicit configuration path wins, then an explicit
 * directory, then a configuration file found in the working directory, then the working
 * directory itself as a single project module.
 */
export async function resolveSchemaWorkspace(options: ResolveSchemaWorkspaceOptions): Promise<SchemaWorkspace> {
  if (options.configPath === undefined && options.directory !== undefined) {
    return directoryWorkspace(path.resolve(options.cwd, options.directory));
  }

  const loaded = await findConfig({
    cwd: options.cwd,
    ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
  });
  if (!loaded) {
    return directoryWorkspace(path.resolve(options.cwd));
  }
  return parseSchemaWorkspaceConfig(loaded.config, loaded.path);
}
