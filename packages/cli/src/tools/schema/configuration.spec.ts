import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseSchemaWorkspaceConfig, resolveSchemaWorkspace } from './configuration.js';

describe('parseSchemaWorkspaceConfig', () => {
  it('resolves module directories against the configuration file', () => {
    const workspace = parseSchemaWorkspaceConfig(
      {
        project: { name: 'app', directory: 'models' },
        dependencies: [{ name: 'auth', alias: 'a', directory: '../shared/auth', patterns: ['*.yaml'] }],
      },
      '/work/project/protoyard.config.json',
    );

    expect(workspace).toEqual({
      project: { name: 'app', directory: '/work/project/models', patterns: ['**/*.spy.yaml'] },
      dependencies: [{ name: 'auth', alias: 'a', directory: '/work/shared/auth', patterns: ['*.yaml'] }],
      configPath: '/work/project/protoyard.config.json',
    });
  });

  it('lists every schema problem in the error message', () => {
    expect(() =>
      parseSchemaWorkspaceConfig({ project: { name: 'app' } }, '/work/protoyard.config.json'),
    ).toThrow('Invalid protoyard configuration in /work/protoyard.config.json:\n  - project.directory: Required');
  });

  it('rejects empty module names', () => {
    expect(() =>
      parseSchemaWorkspaceConfig({ project: { name: ' ', directory: 'models' } }, '/work/protoyard.config.json'),
    ).toThrow('project.name: String must not be empty.');
  });
});

describe('resolveSchemaWorkspace', () => {
  let workspaceDirectory: string;

  beforeEach(async () => {
    workspaceDirectory = await mkdtemp(path.join(tmpdir(), 'protoyard-config-'));
  });

  afterEach(async () => {
    await rm(workspaceDirectory, { recursive: true, force: true });
  });

  it('treats an explicit directory as the only module', async () => {
    await writeFile(
      path.join(workspaceDirectory, 'protoyard.config.json'),
      JSON.stringify({ project: { name: 'app', directory: 'models' } }),
      'utf8',
    );

    const workspace = await resolveSchemaWorkspace({ cwd: workspaceDirectory, directory: 'schemas' });

    expect(workspace).toEqual({
      project: {
        name: 'schemas',
        directory: path.join(workspaceDirectory, 'schemas'),
        patterns: ['**/*.spy.yaml'],
      },
      dependencies: [],
    });
  });

  it('loads a configuration file found in the working directory', async () => {
    const configPath = path.join(workspaceDirectory, 'protoyard.config.json');
    await writeFile(configPath, JSON.stringify({ project: { name: 'app', directory: 'models' } }), 'utf8');

    const workspace = await resolveSchemaWorkspace({ cwd: workspaceDirectory });

    expect(workspace.configPath).toBe(configPath);
    expect(workspace.project.directory).toBe(path.join(workspaceDirectory, 'models'));
  });

  it('falls back to the working directory without a configuration file', async () => {
    const workspace = await resolveSchemaWorkspace({ cwd: workspaceDirectory });

    expect(workspace.project).toEqual({
      name: path.basename(workspaceDirectory),
      directory: workspaceDirectory,
      patterns: ['**/*.spy.yaml'],
    });
    expect(workspace.configPath).toBeUndefined();
  });

  it('fails when an explicit configuration path is missing', async () => {
    await expect(
      resolveSchemaWorkspace({ cwd: workspaceDirectory, configPath: 'missing.config.json' }),
    ).rejects.toThrow(`Configuration file not found at ${path.join(workspaceDirectory, 'missing.config.json')}`);
  });
});
