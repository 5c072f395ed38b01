#!/usr/bin/env node
import { existsSync } from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { createCliKernel, createProcessCliIo, schemaCommandModule } from './index.js';

const require = createRequire(import.meta.url);
const MANIFEST_NAMES: readonly string[] = ['@protoyard/cli', 'protoyard'];

interface PackageManifest {
  readonly name?: string;
  readonly version?: string;
  readonly description?: string;
}

const readManifestField = (manifest: object, key: keyof PackageManifest): string | undefined => {
  const value: unknown = Reflect.get(manifest, key);
  return typeof value === 'string' ? value : undefined;
};

const loadPackageManifest = (): PackageManifest => {
  let directory = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const manifestPath = path.join(directory, 'package.json');
    if (existsSync(manifestPath)) {
      const manifest: unknown = require(manifestPath);
      const name = typeof manifest === 'object' && manifest !== null ? readManifestField(manifest, 'name') : undefined;
      if (typeof manifest === 'object' && manifest !== null && name !== undefined && MANIFEST_NAMES.includes(name)) {
        const version = readManifestField(manifest, 'version');
        const description = readManifestField(manifest, 'description');
        return {
          name,
          ...(version === undefined ? {} : { version }),
          ...(description === undefined ? {} : { description }),
        };
      }
    }

    const parentDirectory = path.dirname(directory);
    if (parentDirectory === directory) {
      return {};
    }
    directory = parentDirectory;
  }
};

const packageManifest = loadPackageManifest();
const io = createProcessCliIo({ process });

const kernel = createCliKernel({
  programName: 'protoyard',
  version: packageManifest.version ?? '0.0.0',
  description: packageManifest.description ?? '',
  io,
});

kernel.register(schemaCommandModule);

const exitCode = await kernel.run();

if (process.argv.length <= 2) {
  io.writeOut(
    'protoyard compiles model documents. Run `protoyard analyze --help` or `protoyard inspect --help` to get started.\n',
  );
}

io.exit(exitCode);
