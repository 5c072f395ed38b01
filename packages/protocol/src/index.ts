export {
  BUILTIN_SCALAR_NAMES,
  decodeScalar,
  encodeScalar,
  isBuiltinScalarName,
  scalarNameOf,
  type BuiltinScalarName,
} from './builtin-codecs.js';
export {
  createDispatchRegistry,
  type DispatchRegistry,
  type DispatchRegistryOptions,
} from './dispatch-registry.js';
export { DeserializationTypeNotFoundError, SerializationTypeNotFoundError } from './errors.js';
export { found, isFound, notMine, type LookupResult } from './lookup-result.js';
export {
  createModuleSerializer,
  defineModel,
  type ModelEntry,
  type ModuleSerializer,
  type ModuleSerializerOptions,
  type SerializedRecord,
} from './module-serializer.js';
export type {
  ColumnDefinition,
  ForeignKeyDefinition,
  TableDefinition,
  TableIndexDefinition,
  TableReferentialAction,
} from './table-definition.js';
export {
  describeTypeToken,
  formatTypeToken,
  parseTypeToken,
  type ModelConstructor,
  type ParsedTypeToken,
  type TypeToken,
} from './type-token.js';
