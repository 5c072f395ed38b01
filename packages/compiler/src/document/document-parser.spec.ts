import { DiagnosticsCollector } from '@protoyard/core';
import { describe, expect, it } from 'vitest';

import { parseSchemaDocument } from './document-parser.js';
import { findEntry, type SchemaDocumentInput } from './schema-document.js';

const input = (yaml: string): SchemaDocumentInput => ({
  yaml,
  sourceFileName: 'lib/src/models/example.spy.yaml',
  fileName: 'example',
  subDirectoryParts: [],
});

describe('parseSchemaDocument', () => {
  it('keeps key order, spans and documentation comments', () => {
    const diagnostics = new DiagnosticsCollector();
    const document = parseSchemaDocument(
      input(['### An example.', '### Second line.', 'class: Example', 'fields:', '  name: String'].join('\n')),
      diagnostics,
    );

    expect(diagnostics.events).toEqual([]);
    expect(document?.root.entries.map((entry) => entry.key)).toEqual(['class', 'fields']);

    const classEntry = document && findEntry(document.root, 'class');
    expect(classEntry?.documentation).toEqual(['An example.', 'Second line.']);
    expect(classEntry?.keySpan).toEqual({ start: { line: 2, column: 0 }, end: { line: 2, column: 5 } });
    expect(classEntry?.value).toMatchObject({ kind: 'scalar', value: 'Example' });

    const fields = document && findEntry(document.root, 'fields');
    expect(fields?.value.kind).toBe('mapping');
  });

  it('records the content offset after an opening quote', () => {
    const document = parseSchemaDocument(input(`class: "Example"`), new DiagnosticsCollector());
    const value = document && findEntry(document.root, 'class')?.value;

    expect(value?.kind === 'scalar' && value.contentOffset).toBe(8);
  });

  it('omits the content offset when the value is not verbatim in the source', () => {
    const document = parseSchemaDocument(
      input(['class: "Ex\\x61mple"', 'table: |', '  example'].join('\n')),
      new DiagnosticsCollector(),
    );
    const classValue = document && findEntry(document.root, 'class')?.value;
    const tableValue = document && findEntry(document.root, 'table')?.value;

    expect(classValue).toMatchObject({ kind: 'scalar', value: 'Example' });
    expect(classValue?.kind === 'scalar' && 'contentOffset' in classValue).toBe(false);
    expect(tableValue?.kind).toBe('scalar');
    expect(tableValue?.kind === 'scalar' && 'contentOffset' in tableValue).toBe(false);
  });

  it('stops a documentation run at a plain comment', () => {
    const document = parseSchemaDocument(
      input(['### Dropped.', '# plain', 'class: Example'].join('\n')),
      new DiagnosticsCollector(),
    );

    expect(document && findEntry(document.root, 'class')?.documentation).toBeUndefined();
  });

  it('documents sequence items', () => {
    const document = parseSchemaDocument(
      input(['enum: Color', 'values:', '  ### The sky.', '  - blue', '  - red'].join('\n')),
      new DiagnosticsCollector(),
    );
    const values = document && findEntry(document.root, 'values')?.value;

    expect(values?.kind === 'sequence' && values.items.map((item) => item.documentation)).toEqual([
      ['The sky.'],
      undefined,
    ]);
  });

  it('fails when the top level is not a map', () => {
    const diagnostics = new DiagnosticsCollector();

    expect(parseSchemaDocument(input('- one\n- two'), diagnostics)).toBeUndefined();
    expect(diagnostics.events).toEqual([
      {
        level: 'error',
        message: 'The top level object in the model file must be a Map.',
        code: 'document.invalid-top-level',
        category: 'schema.document',
        source: 'lib/src/models/example.spy.yaml',
        span: { start: { line: 0, column: 0 }, end: { line: 1, column: 5 } },
      },
    ]);
  });

  it('fails without a span for an empty document', () => {
    const diagnostics = new DiagnosticsCollector();

    expect(parseSchemaDocument(input(''), diagnostics)).toBeUndefined();
    expect(diagnostics.events.map((event) => event.message)).toEqual([
      'The top level object in the model file must be a Map.',
    ]);
    expect(diagnostics.events[0]?.span).toBeUndefined();
  });

  it('reports YAML syntax errors', () => {
    const diagnostics = new DiagnosticsCollector();

    parseSchemaDocument(input('class: Example\nfields: [name'), diagnostics);

    expect(diagnostics.hasErrors()).toBe(true);
    expect(diagnostics.errors[0]?.code).toBe('document.yaml-syntax');
    expect(diagnostics.errors[0]?.source).toBe('lib/src/models/example.spy.yaml');
  });

  it('rejects aliases', () => {
    const diagnostics = new DiagnosticsCollector();
    const document = parseSchemaDocument(input('class: &name Example\ntable: *name'), diagnostics);

    expect(diagnostics.events.map((event) => event.message)).toEqual([
      'YAML aliases are not supported in model files.',
    ]);
    expect(document && findEntry(document.root, 'table')?.value).toMatchObject({ kind: 'scalar', value: null });
  });
});
