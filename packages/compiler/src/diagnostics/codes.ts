/**
 * Stable identifiers attached to every diagnostic the compiler emits.
 */
export const SchemaDiagnosticCodes = {
  yamlSyntax: 'document.yaml-syntax',
  yamlWarning: 'document.yaml-warning',
  invalidTopLevel: 'document.invalid-top-level',
  unsupportedAlias: 'document.unsupported-alias',
  unsupportedKey: 'document.unsupported-key',

  missingKind: 'entity.missing-kind',
  multipleKinds: 'entity.multiple-kinds',
  invalidEntityName: 'entity.invalid-name',
  invalidProperty: 'entity.invalid-property',
  misspelledProperty: 'entity.misspelled-property',
  invalidTableName: 'entity.invalid-table-name',
  invalidEnumValues: 'entity.invalid-enum-values',
  invalidEnumDefault: 'entity.invalid-enum-default',

  invalidFieldName: 'field.invalid-name',
  invalidFieldType: 'field.invalid-type',
  invalidAnnotation: 'field.invalid-annotation',
  invalidDefaultValue: 'field.invalid-default',
  invalidIdField: 'field.invalid-id',

  unresolvedType: 'type.unresolved',
  unknownModule: 'type.unknown-module',
  ambiguousType: 'type.ambiguous',

  invalidRelation: 'relation.invalid',
  missingCounterpart: 'relation.missing-counterpart',
  ambiguousRelation: 'relation.ambiguous',

  invalidIndex: 'index.invalid',

  duplicateModule: 'module.duplicate-module',
  duplicateClass: 'module.duplicate-class',
  duplicateTable: 'module.duplicate-table',
  duplicateIndex: 'module.duplicate-index',
} as const;

export type SchemaDiagnosticCode = (typeof SchemaDiagnosticCodes)[keyof typeof SchemaDiagnosticCodes];
