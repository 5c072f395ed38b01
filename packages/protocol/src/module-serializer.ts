import { found, notMine, type LookupResult } from './lookup-result.js';
import type { TableDefinition } from './table-definition.js';
import { parseTypeToken, type ModelConstructor, type ParsedTypeToken, type TypeToken } from './type-token.js';

/**
 * JSON envelope naming the class of the encoded data.
 */
export interface SerializedRecord {
  readonly className: string;
  readonly data: unknown;
}

/**
 * Serializer of a single module. Every lookup answers `not-mine` for types the module does not
 * declare; failures while decoding a recognized type are thrown.
 */
export interface ModuleSerializer {
  readonly moduleName: string;
  readonly tableDefinitions: readonly TableDefinition[];
  deserialize(data: unknown, type: TypeToken): LookupResult;
  deserializeByClassName(record: SerializedRecord): LookupResult;
  classNameForObject(value: unknown): string | undefined;
  encode(value: unknown): LookupResult;
  tableForType(type: TypeToken): TableDefinition | undefined;
}

export interface ModelEntry<T = unknown> {
  readonly className: string;
  readonly type: ModelConstructor<T>;
  /** Name of the table backing the model, when it is database-backed. */
  readonly table?: string;
  fromJson(data: unknown): T;
  toJson(value: T): unknown;
}

export interface ModuleSerializerOptions {
  readonly moduleName: string;
  readonly models: readonly ModelEntry[];
  readonly tableDefinitions?: readonly TableDefinition[];
}

/**
 * Identity helper keeping the model type of an entry inferred when it is listed beside entries
 * of other models.
 */
export function defineModel<T>(entry: ModelEntry<T>): ModelEntry<T> {
  return entry;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds a module serializer from the model entries of one module.
 *
 * Recognized string tokens are `Name`, `Name?`, `List<Name>` and `Map<String, Name>` (each
 * optionally nullable, elements optionally nullable) where `Name` is one of the module's
 * classes.
 *
 * @param options - Module name, model entries and the module's table definitions.
 * @returns A frozen serializer.
 */
export function createModuleSerializer(options: ModuleSerializerOptions): ModuleSerializer {
  const { moduleName } = options;
  const models = [...options.models];
  const tableDefinitions = Object.freeze([...(options.tableDefinitions ?? [])]);
  const byName = new Map(models.map((entry) => [entry.className, entry]));

  const entryForToken = (token: ParsedTypeToken): ModelEntry | undefined =>
    token.generics.length === 0 ? byName.get(token.name) : undefined;

  const entryForType = (type: TypeToken): ModelEntry | undefined => {
    if (typeof type !== 'string') {
      return models.find((entry) => entry.type === type);
    }
    const token = parseTypeToken(type);
    return token ? entryForToken(token) : undefined;
  };

  const decodeElement = (entry: ModelEntry, token: ParsedTypeToken, data: unknown): unknown =>
    token.nullable && data == null ? null : entry.fromJson(data);

  const deserializeToken = (data: unknown, token: ParsedTypeToken): LookupResult => {
    const model = entryForToken(token);
    if (model) {
      return found(decodeElement(model, token, data));
    }

    const [first, second] = token.generics;
    if (token.name === 'List' && first && token.generics.length === 1) {
      const element = entryForToken(first);
      if (!element) {
        return notMine;
      }
      if (token.nullable && data == null) {
        return found(null);
      }
      if (!Array.isArray(data)) {
        throw new TypeError(`Expected a list of "${element.className}" in module "${moduleName}".`);
      }
      return found(data.map((item: unknown) => decodeElement(element, first, item)));
    }

    if (token.name === 'Map' && first?.name === 'String' && second && token.generics.length === 2) {
      const element = entryForToken(second);
      if (!element) {
        return notMine;
      }
      if (token.nullable && data == null) {
        return found(null);
      }
      if (!isRecord(data)) {
        throw new TypeError(`Expected a map of "${element.className}" in module "${moduleName}".`);
      }
      return found(
        new Map(Object.entries(data).map(([key, value]) => [key, decodeElement(element, second, value)])),
      );
    }

    return notMine;
  };

  const ownerOf = (value: unknown): ModelEntry | undefined =>
    models.find((entry) => value instanceof entry.type);

  return Object.freeze({
    moduleName,
    tableDefinitions,
    deserialize(data: unknown, type: TypeToken): LookupResult {
      if (typeof type !== 'string') {
        const entry = entryForType(type);
        return entry ? found(entry.fromJson(data)) : notMine;
      }
      const token = parseTypeToken(type);
      return token ? deserializeToken(data, token) : notMine;
    },
    deserializeByClassName(record: SerializedRecord): LookupResult {
      const entry = byName.get(record.className);
      return entry ? found(entry.fromJson(record.data)) : notMine;
    },
    classNameForObject(value: unknown): string | undefined {
      return ownerOf(value)?.className;
    },
    encode(value: unknown): LookupResult {
      const entry = ownerOf(value);
      return entry ? found(entry.toJson(value)) : notMine;
    },
    tableForType(type: TypeToken): TableDefinition | undefined {
      const table = entryForType(type)?.table;
      return table === undefined ? undefined : tableDefinitions.find((definition) => definition.name === table);
    },
  });
}
