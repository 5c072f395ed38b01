import type { EntityKind } from './entity-kind.js';
import type { EnumSerialization, TypeDefinition } from './type-definition.js';

export type FieldScope = 'all' | 'serverOnly' | 'none';

export const REFERENTIAL_ACTIONS = Object.freeze([
  'Cascade',
  'Restrict',
  'NoAction',
  'SetNull',
  'SetDefault',
] as const);

export type ReferentialAction = (typeof REFERENTIAL_ACTIONS)[number];

export function isReferentialAction(value: string): value is ReferentialAction {
  return REFERENTIAL_ACTIONS.some((action) => action === value);
}

export interface DefaultValueDefinition {
  /** `model` applies when an instance is constructed, `persist` when a row is inserted. */
  readonly origin: 'model' | 'persist';
  readonly value: string;
}

/**
 * Field holding another entity. The foreign key lives on this class (`foreignKeyField`) or,
 * for a named one-to-one relation, on the target (`targetForeignKeyField`).
 */
export interface ObjectRelationDefinition {
  readonly kind: 'object';
  readonly name?: string;
  readonly targetClass: string;
  readonly targetModuleAlias: string;
  readonly targetTable: string;
  readonly foreignKeyField?: string;
  readonly targetForeignKeyField?: string;
}

/** `List<Entity>` side of a one-to-many relation; the key lives on the element class. */
export interface ListRelationDefinition {
  readonly kind: 'list';
  readonly name?: string;
  readonly targetClass: string;
  readonly targetModuleAlias: string;
  readonly targetTable: string;
  readonly foreignKeyField: string;
  /** `true` when the key field was synthesized and is hidden from the model. */
  readonly implicitForeignKey: boolean;
}

/** Scalar field storing the key of a row in `parentTable`. */
export interface ForeignKeyRelationDefinition {
  readonly kind: 'foreignKey';
  readonly name?: string;
  readonly parentTable: string;
  readonly referencedField: string;
  readonly onDelete: ReferentialAction;
  readonly onUpdate: ReferentialAction;
  /** Object or list field this key backs, if any. */
  readonly relationField?: string;
  readonly relationFieldOwner?: string;
}

export type RelationDefinition =
  | ObjectRelationDefinition
  | ListRelationDefinition
  | ForeignKeyRelationDefinition;

export interface SerializableModelFieldDefinition {
  readonly name: string;
  readonly type: TypeDefinition;
  readonly scope: FieldScope;
  readonly shouldPersist: boolean;
  readonly relation?: RelationDefinition;
  readonly defaults: readonly DefaultValueDefinition[];
  readonly documentation?: readonly string[];
  readonly origin: 'declared' | 'synthesized';
}

export const INDEX_TYPES = Object.freeze([
  'btree',
  'hash',
  'gist',
  'spgist',
  'gin',
  'brin',
  'hnsw',
  'ivfflat',
] as const);

export type IndexType = (typeof INDEX_TYPES)[number];

export const VECTOR_INDEX_TYPES = Object.freeze(['hnsw', 'ivfflat'] as const);

export const DISTANCE_FUNCTIONS = Object.freeze([
  'l2',
  'innerProduct',
  'cosine',
  'l1',
  'hamming',
  'jaccard',
] as const);

export type DistanceFunction = (typeof DISTANCE_FUNCTIONS)[number];

export interface IndexDefinition {
  readonly name: string;
  readonly fields: readonly string[];
  readonly type: IndexType;
  readonly unique: boolean;
  readonly distanceFunction?: DistanceFunction;
  readonly parameters?: Readonly<Record<string, number>>;
}

interface ModelDefinitionBase {
  readonly kind: EntityKind;
  readonly fileName: string;
  readonly sourceFileName: string;
  readonly className: string;
  readonly subDirectoryParts: readonly string[];
  readonly serverOnly: boolean;
  readonly documentation?: readonly string[];
  readonly type: TypeDefinition;
  readonly moduleAlias: string;
}

export interface ClassDefinition extends ModelDefinitionBase {
  readonly kind: 'class';
  readonly table?: string;
  readonly managedMigration: boolean;
  readonly fields: readonly SerializableModelFieldDefinition[];
  readonly indexes: readonly IndexDefinition[];
}

export interface ExceptionDefinition extends ModelDefinitionBase {
  readonly kind: 'exception';
  readonly fields: readonly SerializableModelFieldDefinition[];
}

export interface EnumValueDefinition {
  readonly name: string;
  readonly documentation?: readonly string[];
}

export interface EnumDefinition extends ModelDefinitionBase {
  readonly kind: 'enum';
  readonly values: readonly EnumValueDefinition[];
  readonly serialized?: EnumSerialization;
  readonly defaultValue?: string;
}

export type SerializableModelDefinition = ClassDefinition | ExceptionDefinition | EnumDefinition;

/**
 * The validated models of one module.
 */
export interface ProtocolDefinition {
  readonly moduleName: string;
  readonly moduleAlias: string;
  readonly models: readonly SerializableModelDefinition[];
}

export function isIndexType(value: string): value is IndexType {
  return INDEX_TYPES.some((type) => type === value);
}

export function isVectorIndexType(value: IndexType): boolean {
  return VECTOR_INDEX_TYPES.some((type) => type === value);
}

export function isDistanceFunction(value: string): value is DistanceFunction {
  return DISTANCE_FUNCTIONS.some((name) => name === value);
}
