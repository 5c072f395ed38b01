import type { SchemaDocumentInput } from '../document/schema-document.js';

/**
 * Builds a document input for `lib/src/models/<fileName>.spy.yaml` from its lines.
 */
export function schemaDocument(
  fileName: string,
  lines: readonly string[],
  subDirectoryParts: readonly string[] = [],
): SchemaDocumentInput {
  const directory = ['lib', 'src', 'models', ...subDirectoryParts].join('/');
  return {
    yaml: lines.join('\n'),
    sourceFileName: `${directory}/${fileName}.spy.yaml`,
    fileName,
    subDirectoryParts,
  };
}
