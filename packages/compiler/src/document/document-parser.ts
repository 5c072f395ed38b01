import {
  createDiagnosticSpan,
  DiagnosticCategories,
  type DiagnosticSpan,
  type DiagnosticsPort,
} from '@protoyard/core';
import {
  isAlias,
  isMap,
  isNode,
  isScalar,
  isSeq,
  LineCounter,
  parseDocument,
  Scalar,
  type Node as YamlNode,
  type YAMLError,
} from 'yaml';

import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import type {
  MappingEntry,
  ParsedSchemaDocument,
  ScalarNode,
  ScalarValue,
  SchemaDocumentInput,
  SchemaNode,
  SequenceItem,
  SourceRange,
} from './schema-document.js';

const DOC_COMMENT_MARKER = '###';

interface ConversionContext {
  readonly text: string;
  readonly lines: readonly string[];
  readonly lineCounter: LineCounter;
  readonly diagnostics: DiagnosticsPort;
  readonly sourceFileName: string;
  spanOf(start: number, end: number): DiagnosticSpan;
}

/**
 * Parses one model document into a key/value node tree that keeps source spans for every node.
 * Syntax problems are reported to the diagnostics port; `undefined` is returned when the
 * document cannot be represented as a mapping.
 *
 * @param input - Raw document and its identity.
 * @param diagnostics - Port receiving syntax diagnostics.
 * @returns The parsed document, or `undefined` on a hard per-document failure.
 */
export function parseSchemaDocument(
  input: SchemaDocumentInput,
  diagnostics: DiagnosticsPort,
): ParsedSchemaDocument | undefined {
  const lineCounter = new LineCounter();
  const document = parseDocument(input.yaml, { lineCounter, prettyErrors: false });

  const spanOf = (start: number, end: number): DiagnosticSpan => {
    const from = lineCounter.linePos(start);
    const to = lineCounter.linePos(Math.max(start, end));
    return createDiagnosticSpan(from.line - 1, from.col - 1, to.line - 1, to.col - 1);
  };

  const context: ConversionContext = {
    text: input.yaml,
    lines: input.yaml.split(/\r?\n/),
    lineCounter,
    diagnostics,
    sourceFileName: input.sourceFileName,
    spanOf,
  };

  for (const warning of document.warnings) {
    reportYamlProblem(context, warning, 'warning');
  }
  for (const error of document.errors) {
    reportYamlProblem(context, error, 'error');
  }

  const contents = document.contents;
  if (!contents || !isMap(contents)) {
    if (document.errors.length > 0) {
      return undefined;
    }
    diagnostics.emit({
      level: 'error',
      message: 'The top level object in the model file must be a Map.',
      code: SchemaDiagnosticCodes.invalidTopLevel,
      category: DiagnosticCategories.document,
      source: input.sourceFileName,
      ...(contents ? { span: spanOf(contents.range[0], contents.range[1]) } : {}),
    });
    return undefined;
  }

  const root = convertNode(context, contents, { start: 0, end: input.yaml.length });
  if (root.kind !== 'mapping') {
    return undefined;
  }

  return { input, root, spanOf };
}

function reportYamlProblem(
  context: ConversionContext,
  problem: YAMLError,
  severity: 'error' | 'warning',
): void {
  const [start, end] = problem.pos;

  context.diagnostics.emit({
    level: severity === 'error' ? 'error' : 'warn',
    message: problem.message,
    code: severity === 'error' ? SchemaDiagnosticCodes.yamlSyntax : SchemaDiagnosticCodes.yamlWarning,
    category: DiagnosticCategories.document,
    source: context.sourceFileName,
    span: context.spanOf(start, end),
  });
}

function rangeOf(node: YamlNode, fallback: SourceRange): SourceRange {
  const range = node.range;
  if (!range) {
    return fallback;
  }
  return { start: range[0], end: range[1] };
}

function convertNode(context: ConversionContext, node: YamlNode, fallback: SourceRange): SchemaNode {
  const range = rangeOf(node, fallback);
  const span = context.spanOf(range.start, range.end);

  if (isMap(node)) {
    const entries: MappingEntry[] = [];
    for (const pair of node.items) {
      const entry = convertPair(context, pair.key, pair.value, range);
      if (entry) {
        entries.push(entry);
      }
    }
    return { kind: 'mapping', entries, range, span };
  }

  if (isSeq(node)) {
    const items: SequenceItem[] = [];
    for (const item of node.items) {
      if (!isNode(item)) {
        continue;
      }
      const value = convertNode(context, item, range);
      const documentation = collectDocumentation(context, value.range.start);
      items.push({ value, ...(documentation ? { documentation } : {}) });
    }
    return { kind: 'sequence', items, range, span };
  }

  if (isAlias(node)) {
    context.diagnostics.emit({
      level: 'error',
      message: 'YAML aliases are not supported in model files.',
      code: SchemaDiagnosticCodes.unsupportedAlias,
      category: DiagnosticCategories.document,
      source: context.sourceFileName,
      span,
    });
    return createNullScalar(range, span);
  }

  if (isScalar(node)) {
    const quoted = node.type === Scalar.QUOTE_DOUBLE || node.type === Scalar.QUOTE_SINGLE;
    const value = toScalarValue(node.value);
    const start = quoted ? range.start + 1 : range.start;
    const verbatim = typeof value !== 'string' || context.text.slice(start, start + value.length) === value;
    return {
      kind: 'scalar',
      value,
      ...(verbatim ? { contentOffset: start } : {}),
      range,
      span,
    } satisfies ScalarNode;
  }

  return createNullScalar(range, span);
}

function convertPair(
  context: ConversionContext,
  key: unknown,
  value: unknown,
  parentRange: SourceRange,
): MappingEntry | undefined {
  if (!isScalar(key)) {
    const range = isNode(key) ? rangeOf(key, parentRange) : parentRange;
    context.diagnostics.emit({
      level: 'error',
      message: 'Only scalar keys are supported in model files.',
      code: SchemaDiagnosticCodes.unsupportedKey,
      category: DiagnosticCategories.document,
      source: context.sourceFileName,
      span: context.spanOf(range.start, range.end),
    });
    return undefined;
  }

  const keyRange = rangeOf(key, parentRange);
  const keySpan = context.spanOf(keyRange.start, keyRange.end);
  const valueNode = isNode(value)
    ? convertNode(context, value, { start: keyRange.end, end: keyRange.end })
    : createNullScalar({ start: keyRange.end, end: keyRange.end }, context.spanOf(keyRange.end, keyRange.end));
  const documentation = collectDocumentation(context, keyRange.start);

  return {
    key: String(key.value),
    keyRange,
    keySpan,
    value: valueNode,
    ...(documentation ? { documentation } : {}),
  };
}

function createNullScalar(range: SourceRange, span: DiagnosticSpan): ScalarNode {
  return { kind: 'scalar', value: null, contentOffset: range.start, range, span };
}

function toScalarValue(value: unknown): ScalarValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

/**
 * Collects the contiguous `###` lines directly above the line holding `offset`.
 */
function collectDocumentation(
  context: ConversionContext,
  offset: number,
): readonly string[] | undefined {
  const line = context.lineCounter.linePos(offset).line - 1;
  const collected: string[] = [];

  for (let index = line - 1; index >= 0; index--) {
    const trimmed = (context.lines[index] ?? '').trim();
    if (!trimmed.startsWith(DOC_COMMENT_MARKER)) {
      break;
    }
    collected.unshift(stripDocMarker(trimmed));
  }

  return collected.length > 0 ? collected : undefined;
}

function stripDocMarker(line: string): string {
  const text = line.slice(DOC_COMMENT_MARKER.length);
  return text.startsWith(' ') ? text.slice(1) : text;
}
