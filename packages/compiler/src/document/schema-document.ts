import type { DiagnosticSpan } from '@protoyard/core';

/**
 * One raw model document handed to the compiler together with the identity it is generated
 * under.
 */
export interface SchemaDocumentInput {
  readonly yaml: string;
  readonly sourceFileName: string;
  readonly fileName: string;
  readonly subDirectoryParts: readonly string[];
  readonly moduleAlias?: string;
}

export interface SourceRange {
  readonly start: number;
  readonly end: number;
}

interface SchemaNodeBase {
  readonly range: SourceRange;
  readonly span: DiagnosticSpan;
}

export type ScalarValue = string | number | boolean | null;

export interface ScalarNode extends SchemaNodeBase {
  readonly kind: 'scalar';
  readonly value: ScalarValue;
  /**
   * Absolute offset of the first character of the value text, after any opening quote. Absent
   * when the decoded value does not appear verbatim in the source (escapes, block scalars,
   * folded lines).
   */
  readonly contentOffset?: number;
}

export interface MappingEntry {
  readonly key: string;
  readonly keyRange: SourceRange;
  readonly keySpan: DiagnosticSpan;
  readonly value: SchemaNode;
  readonly documentation?: readonly string[];
}

export interface MappingNode extends SchemaNodeBase {
  readonly kind: 'mapping';
  readonly entries: readonly MappingEntry[];
}

export interface SequenceItem {
  readonly value: SchemaNode;
  readonly documentation?: readonly string[];
}

export interface SequenceNode extends SchemaNodeBase {
  readonly kind: 'sequence';
  readonly items: readonly SequenceItem[];
}

export type SchemaNode = ScalarNode | MappingNode | SequenceNode;

export interface ParsedSchemaDocument {
  readonly input: SchemaDocumentInput;
  readonly root: MappingNode;
  /** Converts absolute offsets into a zero-based span. */
  spanOf(start: number, end: number): DiagnosticSpan;
}

/**
 * Returns the first entry with the given key.
 *
 * @param mapping - Mapping to search.
 * @param key - Key text.
 * @returns The entry, or `undefined` when the key is absent.
 */
export function findEntry(mapping: MappingNode, key: string): MappingEntry | undefined {
  return mapping.entries.find((entry) => entry.key === key);
}

/**
 * Returns the string value of a scalar node.
 *
 * @param node - Node to inspect.
 * @returns The string, or `undefined` for any other node or value type.
 */
export function readString(node: SchemaNode): string | undefined {
  return node.kind === 'scalar' && typeof node.value === 'string' ? node.value : undefined;
}

export function isNullNode(node: SchemaNode): boolean {
  return node.kind === 'scalar' && node.value === null;
}

/**
 * Joins segments into a JSON pointer, escaping `~` and `/`.
 *
 * @param segments - Unescaped pointer segments.
 * @returns The pointer, starting with `/`.
 */
export function toPointer(...segments: readonly string[]): string {
  return segments.map((segment) => `/${segment.replaceAll('~', '~0').replaceAll('/', '~1')}`).join('');
}
