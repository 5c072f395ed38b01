import {
  decodeScalar,
  encodeScalar,
  isBuiltinScalarName,
  scalarNameOf,
} from './builtin-codecs.js';
import { DeserializationTypeNotFoundError, SerializationTypeNotFoundError } from './errors.js';
import { isFound } from './lookup-result.js';
import type { ModuleSerializer, SerializedRecord } from './module-serializer.js';
import type { TableDefinition } from './table-definition.js';
import {
  describeTypeToken,
  formatTypeToken,
  parseTypeToken,
  type ModelConstructor,
  type ParsedTypeToken,
  type TypeToken,
} from './type-token.js';

/**
 * Read-only composition of the serializers of every module known to a process.
 */
export interface DispatchRegistry {
  readonly rootModuleName: string;
  readonly moduleNames: readonly string[];
  deserialize(data: unknown, type: TypeToken): unknown;
  deserializeModel<T>(data: unknown, type: ModelConstructor<T>): T;
  deserializeByClassName(record: SerializedRecord): unknown;
  classNameForObject(value: unknown): string | undefined;
  encodeWithClassName(value: unknown): SerializedRecord;
  tableForType(type: TypeToken): TableDefinition | undefined;
  allTableDefinitions(): readonly TableDefinition[];
}

export interface DispatchRegistryOptions {
  /** Module of the running application. Its class names carry no namespace prefix. */
  readonly root: ModuleSerializer;
  /** Dependency modules in lookup order. */
  readonly modules?: readonly ModuleSerializer[];
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'Object';
  }
  return typeof value;
}

/**
 * Builds the dispatch registry of a process once, at start-up. The returned object is frozen and
 * holds no mutable state, so it can be shared by concurrent request handlers.
 *
 * @param options - Root module plus dependency modules in lookup order.
 * @returns The frozen registry.
 * @throws Error when two modules share a module name.
 */
export function createDispatchRegistry(options: DispatchRegistryOptions): DispatchRegistry {
  const { root } = options;
  const modules = Object.freeze([...(options.modules ?? [])]);
  const names = new Set<string>([root.moduleName]);
  for (const module of modules) {
    if (names.has(module.moduleName)) {
      throw new Error(`The module "${module.moduleName}" is registered more than once.`);
    }
    names.add(module.moduleName);
  }

  const prefixedModule = (className: string): { module: ModuleSerializer; localName: string } | undefined => {
    let match: ModuleSerializer | undefined;
    for (const module of modules) {
      if (
        className.startsWith(`${module.moduleName}.`) &&
        (!match || module.moduleName.length > match.moduleName.length)
      ) {
        match = module;
      }
    }
    return match ? { module: match, localName: className.slice(match.moduleName.length + 1) } : undefined;
  };

  /**
   * Modules to ask for a type, in order. Constructors are unambiguous and go through the
   * dependency modules before the root. A string naming a registered `<moduleName>.` prefix goes
   * to that module alone, under its local name; bare names try the root before the modules.
   */
  const candidatesFor = (
    type: TypeToken,
    token: ParsedTypeToken | undefined,
  ): readonly { readonly module: ModuleSerializer; readonly type: TypeToken }[] => {
    if (!token) {
      return [...modules, root].map((module) => ({ module, type }));
    }
    const prefixed = prefixedModule(token.name);
    if (prefixed) {
      return [{ module: prefixed.module, type: formatTypeToken({ ...token, name: prefixed.localName }) }];
    }
    return [root, ...modules].map((module) => ({ module, type }));
  };

  const decodeSetOfScalars = (data: unknown, token: ParsedTypeToken): { value: unknown } | undefined => {
    const [element] = token.generics;
    if (token.name !== 'Set' || token.generics.length !== 1 || !element || !isBuiltinScalarName(element.name)) {
      return undefined;
    }
    if (element.generics.length > 0) {
      return undefined;
    }
    if (token.nullable && data == null) {
      return { value: null };
    }
    if (!Array.isArray(data)) {
      throw new TypeError(`Expected a list for "${formatTypeToken(token)}".`);
    }
    const scalar = element.name;
    return {
      value: new Set(
        data.map((item: unknown) => (element.nullable && item == null ? null : decodeScalar(scalar, item))),
      ),
    };
  };

  const decodeBuiltin = (data: unknown, token: ParsedTypeToken): { value: unknown } | undefined => {
    if (token.nullable && data == null) {
      return { value: null };
    }
    const [first, second] = token.generics;
    if (token.generics.length === 0 && isBuiltinScalarName(token.name)) {
      return { value: decodeScalar(token.name, data) };
    }
    if ((token.name === 'List' || token.name === 'Set') && first && token.generics.length === 1) {
      if (!Array.isArray(data)) {
        throw new TypeError(`Expected a list for "${formatTypeToken(token)}".`);
      }
      const elementType = formatTypeToken(first);
      const items = data.map((item: unknown) => deserialize(item, elementType));
      return { value: token.name === 'List' ? items : new Set(items) };
    }
    if (token.name === 'Map' && first && second && token.generics.length === 2) {
      const keyType = formatTypeToken(first);
      const valueType = formatTypeToken(second);
      if (first.name === 'String' && !first.nullable) {
        if (typeof data !== 'object' || data === null || Array.isArray(data)) {
          throw new TypeError(`Expected an object for "${formatTypeToken(token)}".`);
        }
        return {
          value: new Map(Object.entries(data).map(([key, value]) => [key, deserialize(value, valueType)])),
        };
      }
      if (!Array.isArray(data)) {
        throw new TypeError(`Expected a list of entries for "${formatTypeToken(token)}".`);
      }
      return {
        value: new Map(
          data.map((entry: unknown) => {
            if (typeof entry !== 'object' || entry === null || !('k' in entry) || !('v' in entry)) {
              throw new TypeError(`Expected a { k, v } entry for "${formatTypeToken(token)}".`);
            }
            return [deserialize(entry.k, keyType), deserialize(entry.v, valueType)];
          }),
        ),
      };
    }
    return undefined;
  };

  const deserialize = (data: unknown, type: TypeToken): unknown => {
    const token = typeof type === 'string' ? parseTypeToken(type) : undefined;
    const set = token ? decodeSetOfScalars(data, token) : undefined;
    if (set) {
      return set.value;
    }

    for (const candidate of candidatesFor(type, token)) {
      const result = candidate.module.deserialize(data, candidate.type);
      if (isFound(result)) {
        return result.value;
      }
    }

    const builtin = token ? decodeBuiltin(data, token) : undefined;
    if (builtin) {
      return builtin.value;
    }
    throw new DeserializationTypeNotFoundError(describeTypeToken(type));
  };

  const registry: DispatchRegistry = {
    rootModuleName: root.moduleName,
    moduleNames: Object.freeze(modules.map((module) => module.moduleName)),
    deserialize,
    deserializeModel<T>(data: unknown, type: ModelConstructor<T>): T {
      const value = deserialize(data, type);
      if (value instanceof type) {
        return value;
      }
      throw new TypeError(`The deserializer of "${type.name}" returned a value of another type.`);
    },
    deserializeByClassName(record: SerializedRecord): unknown {
      const prefixed = prefixedModule(record.className);
      if (prefixed) {
        const result = prefixed.module.deserializeByClassName({ className: prefixed.localName, data: record.data });
        if (isFound(result)) {
          return result.value;
        }
        throw new DeserializationTypeNotFoundError(record.className);
      }

      const result = root.deserializeByClassName({ className: record.className, data: record.data });
      if (isFound(result)) {
        return result.value;
      }
      if (isBuiltinScalarName(record.className)) {
        return decodeScalar(record.className, record.data);
      }
      throw new DeserializationTypeNotFoundError(record.className);
    },
    classNameForObject(value: unknown): string | undefined {
      const rootName = root.classNameForObject(value) ?? scalarNameOf(value);
      if (rootName !== undefined) {
        return rootName;
      }
      for (const module of modules) {
        const className = module.classNameForObject(value);
        if (className !== undefined) {
          return `${module.moduleName}.${className}`;
        }
      }
      return undefined;
    },
    encodeWithClassName(value: unknown): SerializedRecord {
      const rootName = root.classNameForObject(value);
      if (rootName !== undefined) {
        const encoded = root.encode(value);
        if (isFound(encoded)) {
          return { className: rootName, data: encoded.value };
        }
      }
      const scalar = scalarNameOf(value);
      if (scalar !== undefined) {
        return { className: scalar, data: encodeScalar(value) };
      }
      for (const module of modules) {
        const className = module.classNameForObject(value);
        const encoded = className === undefined ? undefined : module.encode(value);
        if (className !== undefined && encoded && isFound(encoded)) {
          return { className: `${module.moduleName}.${className}`, data: encoded.value };
        }
      }
      throw new SerializationTypeNotFoundError(describeValue(value));
    },
    tableForType(type: TypeToken): TableDefinition | undefined {
      const token = typeof type === 'string' ? parseTypeToken(type) : undefined;
      for (const candidate of candidatesFor(type, token)) {
        const table = candidate.module.tableForType(candidate.type);
        if (table) {
          return table;
        }
      }
      return undefined;
    },
    allTableDefinitions(): readonly TableDefinition[] {
      return Object.freeze([...modules.flatMap((module) => module.tableDefinitions), ...root.tableDefinitions]);
    },
  };

  return Object.freeze(registry);
}
