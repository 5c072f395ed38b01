import {
  DiagnosticCategories,
  createNullDiagnosticsPort,
  type DiagnosticsPort,
} from '@protoyard/core';

import { createIssueReporter, type IssueReporter } from '../diagnostics/issue-reporter.js';
import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import { ENTITY_KINDS, isEntityKind, type EntityKind } from '../definitions/entity-kind.js';
import type {
  EnumValueDefinition,
  SerializableModelDefinition,
} from '../definitions/model-definitions.js';
import type { EnumSerialization, TypeDefinition } from '../definitions/type-definition.js';
import { parseSchemaDocument } from '../document/document-parser.js';
import {
  findEntry,
  readString,
  toPointer,
  type MappingEntry,
  type MappingNode,
  type ParsedSchemaDocument,
  type SchemaDocumentInput,
} from '../document/schema-document.js';
import { assembleDefinition } from '../pipeline/assemble.js';
import type {
  AnalyzedClass,
  AnalyzedEntity,
  AnalyzedEnum,
  AnalyzedException,
  FieldDraft,
} from './analyzed-entity.js';
import { analyzeField, FIELD_NAME_PATTERN } from './field-analyzer.js';
import { quoteList } from './field-expression.js';
import { parseIndexes } from './index-parser.js';
import { findClosestMatch } from './suggestions.js';

export const DEFAULT_MODULE_ALIAS = 'protocol';

const CLASS_NAME_PATTERN = /^[A-Z][A-Za-z0-9]*$/;
const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

export const ENTITY_KEYS: Readonly<Record<EntityKind, readonly string[]>> = Object.freeze({
  class: ['class', 'table', 'serverOnly', 'managedMigration', 'fields', 'indexes'],
  exception: ['exception', 'serverOnly', 'fields'],
  enum: ['enum', 'serialized', 'values', 'default', 'serverOnly'],
});

const ALL_ENTITY_KEYS = [...new Set(Object.values(ENTITY_KEYS).flat())];

const ENUM_SERIALIZATIONS: readonly EnumSerialization[] = ['byName', 'byIndex'];

interface HeaderContext {
  readonly document: ParsedSchemaDocument;
  readonly report: IssueReporter;
  readonly kind: EntityKind;
  readonly kindEntry: MappingEntry;
  readonly className: string;
  readonly moduleAlias: string;
  readonly serverOnly: boolean;
}

/**
 * Stage one of compilation: reads one document into an entity shell with field and index
 * drafts. Entity references stay unresolved until every document has been analysed.
 *
 * @param input - Raw document and its identity.
 * @param diagnostics - Port receiving every problem found.
 * @returns The analysed entity, or `undefined` when the document does not declare a usable one.
 */
export function analyzeEntity(
  input: SchemaDocumentInput,
  diagnostics: DiagnosticsPort,
): AnalyzedEntity | undefined {
  const document = parseSchemaDocument(input, diagnostics);
  if (!document) {
    return undefined;
  }

  const report = createIssueReporter(diagnostics, input.sourceFileName);
  const kindEntry = detectKind(document.root, report);
  if (!kindEntry || !isEntityKind(kindEntry.key)) {
    return undefined;
  }
  const kind = kindEntry.key;

  validateTopLevelKeys(document.root, kind, report);

  const className = readString(kindEntry.value);
  if (className === undefined || !CLASS_NAME_PATTERN.test(className)) {
    report({
      message: `The "${kind}" property must be a valid class name (e.g. PascalCaseString).`,
      code: SchemaDiagnosticCodes.invalidEntityName,
      category: DiagnosticCategories.entity,
      span: kindEntry.value.span,
      pointer: toPointer(kind),
    });
    return undefined;
  }

  const context: HeaderContext = {
    document,
    report,
    kind,
    kindEntry,
    className,
    moduleAlias: input.moduleAlias ?? DEFAULT_MODULE_ALIAS,
    serverOnly: readBoolean(document.root, 'serverOnly', false, report),
  };

  switch (kind) {
    case 'class':
      return analyzeClass(context);
    case 'exception':
      return analyzeException(context);
    case 'enum':
      return analyzeEnum(context);
  }
}

/**
 * Analyses a single document in isolation and assembles its definition. Field types that name
 * other entities are left unresolved.
 *
 * @param input - Raw document and its identity.
 * @param diagnostics - Port receiving every problem found; discarded when omitted.
 * @returns The definition, or `undefined` when the document declares no usable entity.
 */
export function analyzeModelDocument(
  input: SchemaDocumentInput,
  diagnostics: DiagnosticsPort = createNullDiagnosticsPort(),
): SerializableModelDefinition | undefined {
  const entity = analyzeEntity(input, diagnostics);
  return entity ? assembleDefinition(entity) : undefined;
}

function detectKind(root: MappingNode, report: IssueReporter): MappingEntry | undefined {
  const kindEntries = root.entries.filter((entry) => isEntityKind(entry.key));
  const [first, ...extra] = kindEntries;

  if (!first) {
    report({
      message: `No ${quoteList(ENTITY_KINDS)} type is defined.`,
      code: SchemaDiagnosticCodes.missingKind,
      category: DiagnosticCategories.entity,
    });
    return undefined;
  }

  if (extra.length > 0) {
    const names = kindEntries.map((entry) => `"${entry.key}"`).join(', ');
    const message = `Multiple entity types (${names}) found for a single entity. Only one type per entity allowed.`;
    for (const entry of extra) {
      const line = entry.keySpan.start.line;
      report({
        message,
        code: SchemaDiagnosticCodes.multipleKinds,
        category: DiagnosticCategories.entity,
        span: { start: { line, column: 0 }, end: { line, column: entry.key.length } },
        pointer: toPointer(entry.key),
      });
    }
    return undefined;
  }

  return first;
}

function validateTopLevelKeys(root: MappingNode, kind: EntityKind, report: IssueReporter): void {
  const allowed = ENTITY_KEYS[kind];
  for (const entry of root.entries) {
    if (allowed.includes(entry.key)) {
      continue;
    }
    if (ALL_ENTITY_KEYS.includes(entry.key)) {
      report({
        message: `The "${entry.key}" property is not allowed for ${kind} type. Valid keys are {${allowed.join(', ')}}.`,
        code: SchemaDiagnosticCodes.invalidProperty,
        category: DiagnosticCategories.entity,
        span: entry.keySpan,
        pointer: toPointer(entry.key),
      });
      continue;
    }
    const suggestion = findClosestMatch(entry.key, allowed);
    if (suggestion) {
      report({
        message: `The "${entry.key}" property is not allowed for ${kind} type. Did you mean "${suggestion}"?`,
        code: SchemaDiagnosticCodes.misspelledProperty,
        category: DiagnosticCategories.entity,
        span: entry.keySpan,
        pointer: toPointer(entry.key),
      });
    }
  }
}

function readBoolean(root: MappingNode, key: string, fallback: boolean, report: IssueReporter): boolean {
  const entry = findEntry(root, key);
  if (!entry) {
    return fallback;
  }
  if (entry.value.kind === 'scalar' && typeof entry.value.value === 'boolean') {
    return entry.value.value;
  }
  report({
    message: `The "${key}" property must be a bool.`,
    code: SchemaDiagnosticCodes.invalidProperty,
    category: DiagnosticCategories.entity,
    span: entry.value.span,
    pointer: toPointer(key),
  });
  return fallback;
}

function entityType(context: HeaderContext, serialized?: EnumSerialization): TypeDefinition {
  return {
    name: context.className,
    nullable: false,
    generics: [],
    category: 'entity',
    moduleAlias: context.moduleAlias,
    entityKind: context.kind,
    ...(serialized ? { enumSerialization: serialized } : {}),
  };
}

function baseDefinition(context: HeaderContext, serialized?: EnumSerialization) {
  const input = context.document.input;
  return {
    fileName: input.fileName,
    sourceFileName: input.sourceFileName,
    className: context.className,
    subDirectoryParts: [...input.subDirectoryParts],
    serverOnly: context.serverOnly,
    type: entityType(context, serialized),
    moduleAlias: context.moduleAlias,
    ...(context.kindEntry.documentation ? { documentation: context.kindEntry.documentation } : {}),
  };
}

function analyzeClass(context: HeaderContext): AnalyzedClass {
  const { document, report } = context;
  const tableEntry = findEntry(document.root, 'table');
  let table: string | undefined;
  if (tableEntry) {
    const value = readString(tableEntry.value);
    if (value !== undefined && TABLE_NAME_PATTERN.test(value)) {
      table = value;
    } else {
      report({
        message: 'The "table" property must be a snake_case_string.',
        code: SchemaDiagnosticCodes.invalidTableName,
        category: DiagnosticCategories.entity,
        span: tableEntry.value.span,
        pointer: toPointer('table'),
      });
    }
  }

  const hasTable = table !== undefined;
  const managedMigration = readBoolean(document.root, 'managedMigration', true, report);
  const fields = analyzeFields(context, hasTable);
  if (hasTable && !hasDeclaredField(document.root, 'id')) {
    fields.unshift(createSyntheticIdField(context));
  }

  const indexesEntry = findEntry(document.root, 'indexes');
  let indexes: AnalyzedClass['indexes'] = [];
  if (indexesEntry) {
    if (hasTable) {
      indexes = parseIndexes(indexesEntry, document, report);
    } else {
      report({
        message: 'The "indexes" property requires the class to have a "table".',
        code: SchemaDiagnosticCodes.invalidIndex,
        category: DiagnosticCategories.index,
        span: indexesEntry.keySpan,
        pointer: toPointer('indexes'),
      });
    }
  }

  return {
    definition: {
      ...baseDefinition(context),
      kind: 'class',
      managedMigration,
      fields: [],
      indexes: [],
      ...(table === undefined ? {} : { table }),
    },
    nameSpan: context.kindEntry.value.span,
    fields,
    indexes,
    ...(tableEntry && hasTable ? { tableSpan: tableEntry.value.span } : {}),
  };
}

function analyzeException(context: HeaderContext): AnalyzedException {
  return {
    definition: { ...baseDefinition(context), kind: 'exception', fields: [] },
    nameSpan: context.kindEntry.value.span,
    fields: analyzeFields(context, false),
  };
}

function hasDeclaredField(root: MappingNode, name: string): boolean {
  const fields = findEntry(root, 'fields');
  return fields?.value.kind === 'mapping' && findEntry(fields.value, name) !== undefined;
}

function analyzeFields(context: HeaderContext, hasTable: boolean): FieldDraft[] {
  const entry = findEntry(context.document.root, 'fields');
  if (!entry || context.kind === 'enum') {
    return [];
  }
  if (entry.value.kind !== 'mapping') {
    context.report({
      message: 'The "fields" property must be a map of field names to types.',
      code: SchemaDiagnosticCodes.invalidFieldType,
      category: DiagnosticCategories.field,
      span: entry.value.span,
      pointer: toPointer('fields'),
    });
    return [];
  }

  const drafts: FieldDraft[] = [];
  for (const fieldEntry of entry.value.entries) {
    const draft = analyzeField(fieldEntry, {
      document: context.document,
      report: context.report,
      kind: context.kind,
      hasTable,
    });
    if (draft) {
      drafts.push(draft);
    }
  }
  return drafts;
}

function createSyntheticIdField(context: HeaderContext): FieldDraft {
  const span = context.kindEntry.keySpan;
  return {
    name: 'id',
    pointer: toPointer('fields', 'id'),
    nameSpan: span,
    typeSpan: span,
    type: { name: 'int', nullable: true, generics: [], category: 'scalar' },
    scope: 'all',
    shouldPersist: true,
    defaultPersist: { value: 'serial', span },
    origin: 'synthesized',
  };
}

function analyzeEnum(context: HeaderContext): AnalyzedEnum {
  const { document, report } = context;

  let serialized: EnumSerialization | undefined;
  const serializedEntry = findEntry(document.root, 'serialized');
  if (serializedEntry) {
    const value = readString(serializedEntry.value);
    serialized = ENUM_SERIALIZATIONS.find((candidate) => candidate === value);
    if (!serialized) {
      report({
        message: 'The "serialized" property must be one of "byName" or "byIndex".',
        code: SchemaDiagnosticCodes.invalidProperty,
        category: DiagnosticCategories.entity,
        span: serializedEntry.value.span,
        pointer: toPointer('serialized'),
      });
    }
  }

  const values = readEnumValues(context);

  let defaultValue: string | undefined;
  const defaultEntry = findEntry(document.root, 'default');
  if (defaultEntry) {
    const value = readString(defaultEntry.value);
    if (value !== undefined && values.some((candidate) => candidate.name === value)) {
      defaultValue = value;
    } else {
      report({
        message: `The default value "${value ?? ''}" must be one of the values of the enum.`,
        code: SchemaDiagnosticCodes.invalidEnumDefault,
        category: DiagnosticCategories.entity,
        span: defaultEntry.value.span,
        pointer: toPointer('default'),
      });
    }
  }

  return {
    definition: {
      ...baseDefinition(context, serialized),
      kind: 'enum',
      values,
      ...(serialized ? { serialized } : {}),
      ...(defaultValue === undefined ? {} : { defaultValue }),
    },
    nameSpan: context.kindEntry.value.span,
    fields: [],
  };
}

function readEnumValues(context: HeaderContext): EnumValueDefinition[] {
  const { document, report } = context;
  const entry = findEntry(document.root, 'values');
  const issue = (message: string, span = entry?.keySpan ?? context.kindEntry.keySpan, pointer = toPointer('values')) => {
    report({
      message,
      code: SchemaDiagnosticCodes.invalidEnumValues,
      category: DiagnosticCategories.entity,
      span,
      pointer,
    });
  };

  if (!entry) {
    issue('The "values" property is required for an enum.');
    return [];
  }
  if (entry.value.kind !== 'sequence' || entry.value.items.length === 0) {
    issue('The "values" property must be a non-empty list of strings.', entry.value.span);
    return [];
  }

  const values: EnumValueDefinition[] = [];
  entry.value.items.forEach((item, index) => {
    const pointer = toPointer('values', String(index));
    const name = readString(item.value);
    if (name === undefined) {
      issue('The "values" property must be a non-empty list of strings.', item.value.span, pointer);
      return;
    }
    if (!FIELD_NAME_PATTERN.test(name)) {
      issue(`The enum value "${name}" must be a valid lowerCamelCase name.`, item.value.span, pointer);
      return;
    }
    if (values.some((value) => value.name === name)) {
      issue(`The enum value "${name}" is declared more than once.`, item.value.span, pointer);
      return;
    }
    values.push({ name, ...(item.documentation ? { documentation: item.documentation } : {}) });
  });
  return values;
}
