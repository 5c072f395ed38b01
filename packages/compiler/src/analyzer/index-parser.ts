import { DiagnosticCategories } from '@protoyard/core';

import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import type { IssueReporter } from '../diagnostics/issue-reporter.js';
import {
  findEntry,
  readString,
  toPointer,
  type MappingEntry,
  type MappingNode,
  type ParsedSchemaDocument,
} from '../document/schema-document.js';
import type { IndexDraft, SpannedValue } from './analyzed-entity.js';
import { splitTopLevel } from './field-expression.js';
import { findClosestMatch } from './suggestions.js';

export const INDEX_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

const INDEX_KEYS = Object.freeze(['fields', 'type', 'unique', 'distanceFunction', 'parameters'] as const);

/**
 * Reads the `indexes` mapping of a class into drafts. Semantic checks that need resolved field
 * types run later.
 *
 * @param entry - The `indexes` entry.
 * @param document - Document the entry belongs to.
 * @param report - Issue reporter bound to the document.
 * @returns Drafts for every index whose shape could be read.
 */
export function parseIndexes(
  entry: MappingEntry,
  document: ParsedSchemaDocument,
  report: IssueReporter,
): IndexDraft[] {
  if (entry.value.kind !== 'mapping') {
    report({
      message: 'The "indexes" property must be a map of index names to index definitions.',
      code: SchemaDiagnosticCodes.invalidIndex,
      category: DiagnosticCategories.index,
      span: entry.value.span,
      pointer: toPointer('indexes'),
    });
    return [];
  }

  const drafts: IndexDraft[] = [];
  for (const indexEntry of entry.value.entries) {
    const draft = parseIndex(indexEntry, document, report);
    if (draft) {
      drafts.push(draft);
    }
  }
  return drafts;
}

function parseIndex(
  entry: MappingEntry,
  document: ParsedSchemaDocument,
  report: IssueReporter,
): IndexDraft | undefined {
  const pointer = toPointer('indexes', entry.key);
  const issue = (message: string, span = entry.keySpan, itemPointer = pointer) => {
    report({
      message,
      code: SchemaDiagnosticCodes.invalidIndex,
      category: DiagnosticCategories.index,
      span,
      pointer: itemPointer,
    });
  };

  if (!INDEX_NAME_PATTERN.test(entry.key)) {
    issue(`The index name "${entry.key}" must be a snake_case_string.`);
    return undefined;
  }
  if (entry.value.kind !== 'mapping') {
    issue(`The index "${entry.key}" must be a map.`, entry.value.span);
    return undefined;
  }

  const definition = entry.value;
  let valid = true;
  for (const property of definition.entries) {
    if (INDEX_KEYS.some((key) => key === property.key)) {
      continue;
    }
    const suggestion = findClosestMatch(property.key, INDEX_KEYS);
    issue(
      suggestion
        ? `The "${property.key}" property is not allowed for an index. Did you mean "${suggestion}"?`
        : `The "${property.key}" property is not allowed for an index. Valid keys are {${INDEX_KEYS.join(', ')}}.`,
      property.keySpan,
      toPointer('indexes', entry.key, property.key),
    );
    valid = false;
  }

  const fieldsEntry = findEntry(definition, 'fields');
  if (!fieldsEntry) {
    issue(`The index "${entry.key}" must declare its "fields".`);
    return undefined;
  }
  const fields = readIndexFields(fieldsEntry, document);
  if (fields.length === 0) {
    issue(
      `The "fields" of index "${entry.key}" must be a comma separated string or a list of field names.`,
      fieldsEntry.value.span,
      toPointer('indexes', entry.key, 'fields'),
    );
    return undefined;
  }

  const type = readSpannedString(definition, 'type', issue, entry.key);
  const distanceFunction = readSpannedString(definition, 'distanceFunction', issue, entry.key);

  let unique = false;
  const uniqueEntry = findEntry(definition, 'unique');
  if (uniqueEntry) {
    if (uniqueEntry.value.kind === 'scalar' && typeof uniqueEntry.value.value === 'boolean') {
      unique = uniqueEntry.value.value;
    } else {
      issue('The "unique" property must be a bool.', uniqueEntry.value.span, toPointer('indexes', entry.key, 'unique'));
      valid = false;
    }
  }

  const parametersEntry = findEntry(definition, 'parameters');
  const parameters: (SpannedValue<number> & { readonly key: string })[] = [];
  if (parametersEntry) {
    if (parametersEntry.value.kind === 'mapping') {
      for (const parameter of parametersEntry.value.entries) {
        const value = parameter.value;
        if (value.kind === 'scalar' && typeof value.value === 'number') {
          parameters.push({ key: parameter.key, value: value.value, span: parameter.keySpan });
        } else {
          issue(
            `The index parameter "${parameter.key}" must be a number.`,
            value.span,
            toPointer('indexes', entry.key, 'parameters', parameter.key),
          );
          valid = false;
        }
      }
    } else {
      issue(
        'The "parameters" property must be a map.',
        parametersEntry.value.span,
        toPointer('indexes', entry.key, 'parameters'),
      );
      valid = false;
    }
  }

  if (!valid || type === null || distanceFunction === null) {
    return undefined;
  }

  return {
    name: entry.key,
    pointer,
    nameSpan: entry.keySpan,
    fields,
    fieldsSpan: fieldsEntry.value.span,
    unique,
    ...(type ? { type } : {}),
    ...(distanceFunction ? { distanceFunction } : {}),
    ...(parametersEntry ? { parameters, parametersSpan: parametersEntry.keySpan } : {}),
  };
}

function readIndexFields(entry: MappingEntry, document: ParsedSchemaDocument): SpannedValue<string>[] {
  const value = entry.value;
  if (value.kind === 'sequence') {
    const fields: SpannedValue<string>[] = [];
    for (const item of value.items) {
      const name = readString(item.value);
      if (name === undefined || name.trim().length === 0) {
        return [];
      }
      fields.push({ value: name.trim(), span: item.value.span });
    }
    return fields;
  }

  const text = readString(value);
  if (text === undefined || value.kind !== 'scalar') {
    return [];
  }
  const segments = splitTopLevel(text);
  if (segments.some((segment) => segment.text.length === 0)) {
    return [];
  }
  const { contentOffset } = value;
  return segments.map((segment) => ({
    value: segment.text,
    span:
      contentOffset === undefined
        ? value.span
        : document.spanOf(contentOffset + segment.start, contentOffset + segment.end),
  }));
}

/**
 * @returns The spanned string, `undefined` when absent, or `null` when present but not a string.
 */
function readSpannedString(
  mapping: MappingNode,
  key: string,
  issue: (message: string, span?: MappingEntry['keySpan'], pointer?: string) => void,
  indexName: string,
): SpannedValue<string> | undefined | null {
  const property = findEntry(mapping, key);
  if (!property) {
    return undefined;
  }
  const text = readString(property.value);
  if (text === undefined) {
    issue(`The "${key}" property must be a string.`, property.value.span, toPointer('indexes', indexName, key));
    return null;
  }
  return { value: text, span: property.value.span };
}
