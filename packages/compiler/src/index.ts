export { analyzeEntity, analyzeModelDocument, DEFAULT_MODULE_ALIAS, ENTITY_KEYS } from './analyzer/entity-analyzer.js';
export type { AnalyzedEntity } from './analyzer/analyzed-entity.js';
export { parseTypeExpression, type TypeExpression } from './analyzer/type-expression.js';
export { SchemaDiagnosticCodes, type SchemaDiagnosticCode } from './diagnostics/codes.js';
export { ENTITY_KINDS, isEntityKind, type EntityKind } from './definitions/entity-kind.js';
export {
  DISTANCE_FUNCTIONS,
  INDEX_TYPES,
  REFERENTIAL_ACTIONS,
  type ClassDefinition,
  type DefaultValueDefinition,
  type DistanceFunction,
  type EnumDefinition,
  type EnumValueDefinition,
  type ExceptionDefinition,
  type FieldScope,
  type ForeignKeyRelationDefinition,
  type IndexDefinition,
  type IndexType,
  type ListRelationDefinition,
  type ObjectRelationDefinition,
  type ProtocolDefinition,
  type ReferentialAction,
  type RelationDefinition,
  type SerializableModelDefinition,
  type SerializableModelFieldDefinition,
} from './definitions/model-definitions.js';
export {
  CONTAINER_ARITY,
  SCALAR_TYPE_NAMES,
  VECTOR_TYPE_NAMES,
  classifyBuiltin,
} from './definitions/type-catalog.js';
export {
  describeType,
  type EnumSerialization,
  type TypeCategory,
  type TypeDefinition,
} from './definitions/type-definition.js';
export { parseSchemaDocument } from './document/document-parser.js';
export type { ParsedSchemaDocument, SchemaDocumentInput } from './document/schema-document.js';
export {
  compileSchema,
  type CompilationResult,
  type CompileSchemaOptions,
  type CompilerStage,
  type SchemaModuleSource,
} from './pipeline/compile-schema.js';
export { columnTypeOf, createTableDefinitions } from './pipeline/table-definitions.js';
export { createEntityIndex, type EntityIndex } from './resolver/entity-index.js';
export { resolveTypes } from './resolver/type-resolver.js';
export { resolveRelations } from './resolver/relation-resolver.js';
export { validateIndexes } from './resolver/index-validator.js';
export { validateUniqueNames } from './resolver/uniqueness-validator.js';
