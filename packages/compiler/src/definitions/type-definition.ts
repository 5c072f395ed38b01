import type { EntityKind } from './entity-kind.js';

export type TypeCategory = 'scalar' | 'vector' | 'container' | 'entity' | 'unresolved';

/**
 * Closed description of a field or entity type.
 *
 * Built-in types are classified while a document is analysed; entity references stay
 * `unresolved` until every document of the compilation has been read.
 */
export interface TypeDefinition {
  readonly name: string;
  readonly nullable: boolean;
  readonly generics: readonly TypeDefinition[];
  readonly category: TypeCategory;
  /** Alias of the module declaring the referenced entity. */
  readonly moduleAlias?: string;
  readonly entityKind?: EntityKind;
  readonly dimension?: number;
  /** Serialization mode of a referenced enum. */
  readonly enumSerialization?: EnumSerialization;
}

export type EnumSerialization = 'byName' | 'byIndex';

/**
 * Renders a type the way it is written in a model document, without module prefixes.
 *
 * @param type - Type to render.
 * @returns Text such as `List<Example?>?` or `Vector(512)`.
 */
export function describeType(type: TypeDefinition): string {
  const dimension = type.dimension === undefined ? '' : `(${type.dimension})`;
  const generics =
    type.generics.length > 0 ? `<${type.generics.map((generic) => describeType(generic)).join(', ')}>` : '';
  return `${type.name}${dimension}${generics}${type.nullable ? '?' : ''}`;
}

export function withNullability(type: TypeDefinition, nullable: boolean): TypeDefinition {
  return type.nullable === nullable ? type : { ...type, nullable };
}

/**
 * Returns the element type of a `List<T>`.
 *
 * @param type - Candidate list type.
 * @returns The element type, or `undefined` when `type` is not a list.
 */
export function listElementType(type: TypeDefinition): TypeDefinition | undefined {
  if (type.category !== 'container' || type.name !== 'List') {
    return undefined;
  }
  return type.generics[0];
}

/**
 * Compares two types ignoring nullability.
 */
export function isSameBaseType(left: TypeDefinition, right: TypeDefinition): boolean {
  return describeType(withNullability(left, false)) === describeType(withNullability(right, false));
}
