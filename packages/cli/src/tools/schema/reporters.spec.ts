import { compileSchema, type SchemaDocumentInput } from '@protoyard/compiler';
import { describe, expect, it } from 'vitest';

import { createAnalyzeReport, createInspectReport, formatJsonReport, writeHumanReport } from './reporters.js';

const documentInput = (fileName: string, lines: readonly string[]): SchemaDocumentInput => ({
  yaml: lines.join('\n'),
  sourceFileName: `models/${fileName}.spy.yaml`,
  fileName,
  subDirectoryParts: [],
});

const broken = documentInput('example', ['class: Example', 'fields:', '  owner: Missing?']);

const compileProject = (...documents: SchemaDocumentInput[]) =>
  compileSchema({ project: { name: 'app', documents } });

describe('writeHumanReport', () => {
  it('prints one line per diagnostic and a summary', () => {
    const lines: string[] = [];

    writeHumanReport(compileProject(broken), { write: (line) => lines.push(line) });

    expect(lines).toEqual([
      'models/example.spy.yaml:3:10 error The type "Missing" used by field "owner" was not found.\n',
      'Analyzed 1 model in 1 module: 1 error, 0 warnings.\n',
    ]);
  });
});

describe('formatJsonReport', () => {
  it('sorts keys for a stable analyze report', () => {
    const output = formatJsonReport(createAnalyzeReport(compileProject(broken)));

    expect(output.startsWith('{\n  "diagnostics": [\n')).toBe(true);
    expect(JSON.parse(output)).toEqual({
      summary: { modules: 1, models: 1, errorCount: 1, warningCount: 0 },
      diagnostics: [
        {
          level: 'error',
          message: 'The type "Missing" used by field "owner" was not found.',
          code: 'type.unresolved',
          category: 'schema.type-resolution',
          source: 'models/example.spy.yaml',
          pointer: '/fields/owner',
          span: { start: { line: 2, column: 9 }, end: { line: 2, column: 17 } },
        },
      ],
    });
  });
});

describe('createInspectReport', () => {
  it('attaches projected tables to each module', () => {
    const report = createInspectReport(
      compileProject(
        documentInput('note', ['class: Note', 'table: note', 'fields:', '  text: String']),
        documentInput('tag', ['class: Tag', 'fields:', '  label: String']),
      ),
    );

    expect(report.project.models.map((model) => model.className)).toEqual(['Note', 'Tag']);
    expect(report.project.tables.map((table) => table.name)).toEqual(['note']);
    expect(report.project.tables[0]?.columns.map((column) => column.name)).toEqual(['id', 'text']);
    expect(report.dependencies).toEqual([]);
    expect(report.diagnostics).toEqual([]);
  });
});
