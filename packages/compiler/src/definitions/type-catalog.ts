/**
 * Built-in type names understood without any entity declaration.
 */
export const SCALAR_TYPE_NAMES = Object.freeze([
  'int',
  'double',
  'bool',
  'String',
  'DateTime',
  'Duration',
  'ByteData',
  'UuidValue',
  'BigInt',
  'Uri',
] as const);

export const VECTOR_TYPE_NAMES = Object.freeze(['Vector', 'HalfVector', 'SparseVector', 'Bit'] as const);

export const CONTAINER_ARITY = Object.freeze({
  List: 1,
  Set: 1,
  Map: 2,
} as const);

export type ScalarTypeName = (typeof SCALAR_TYPE_NAMES)[number];
export type VectorTypeName = (typeof VECTOR_TYPE_NAMES)[number];
export type ContainerTypeName = keyof typeof CONTAINER_ARITY;

export type BuiltinClassification =
  | { readonly category: 'scalar'; readonly name: ScalarTypeName }
  | { readonly category: 'vector'; readonly name: VectorTypeName }
  | { readonly category: 'container'; readonly name: ContainerTypeName; readonly arity: number };

export function isScalarTypeName(name: string): name is ScalarTypeName {
  return SCALAR_TYPE_NAMES.some((candidate) => candidate === name);
}

export function isVectorTypeName(name: string): name is VectorTypeName {
  return VECTOR_TYPE_NAMES.some((candidate) => candidate === name);
}

export function isContainerTypeName(name: string): name is ContainerTypeName {
  return Object.hasOwn(CONTAINER_ARITY, name);
}

/**
 * Looks a type name up in the built-in catalog.
 *
 * @param name - Bare type name without generics, dimension or nullability.
 * @returns The classification, or `undefined` for names that must refer to an entity.
 */
export function classifyBuiltin(name: string): BuiltinClassification | undefined {
  if (isScalarTypeName(name)) {
    return { category: 'scalar', name };
  }
  if (isVectorTypeName(name)) {
    return { category: 'vector', name };
  }
  if (isContainerTypeName(name)) {
    return { category: 'container', name, arity: CONTAINER_ARITY[name] };
  }
  return undefined;
}
