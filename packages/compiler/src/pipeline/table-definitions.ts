import type {
  ColumnDefinition,
  ForeignKeyDefinition,
  TableDefinition,
  TableIndexDefinition,
} from '@protoyard/protocol';

import { durationToMilliseconds, unquote } from '../analyzer/default-values.js';
import type {
  ClassDefinition,
  EnumDefinition,
  ProtocolDefinition,
  SerializableModelFieldDefinition,
} from '../definitions/model-definitions.js';
import type { TypeDefinition } from '../definitions/type-definition.js';

const SCALAR_COLUMN_TYPES: Readonly<Record<string, string>> = Object.freeze({
  int: 'bigint',
  double: 'double precision',
  bool: 'boolean',
  String: 'text',
  BigInt: 'text',
  Uri: 'text',
  DateTime: 'timestamp without time zone',
  Duration: 'bigint',
  ByteData: 'bytea',
  UuidValue: 'uuid',
});

const VECTOR_COLUMN_TYPES: Readonly<Record<string, string>> = Object.freeze({
  Vector: 'vector',
  HalfVector: 'halfvec',
  SparseVector: 'sparsevec',
  Bit: 'bit',
});

/**
 * Maps a field type to the column type storing it.
 *
 * @param type - Resolved field type.
 * @returns The column type; containers, classes and unresolved types are stored as `json`.
 */
export function columnTypeOf(type: TypeDefinition): string {
  switch (type.category) {
    case 'scalar': {
      return SCALAR_COLUMN_TYPES[type.name] ?? 'json';
    }
    case 'vector': {
      const base = VECTOR_COLUMN_TYPES[type.name] ?? 'vector';
      return `${base}(${type.dimension ?? 0})`;
    }
    case 'entity': {
      if (type.entityKind !== 'enum') {
        return 'json';
      }
      return type.enumSerialization === 'byName' ? 'text' : 'bigint';
    }
    default: {
      return 'json';
    }
  }
}

function quoteLiteral(value: string, cast: string): string {
  return `'${value.replaceAll("'", "''")}'::${cast}`;
}

type EnumLookup = (type: TypeDefinition) => EnumDefinition | undefined;

function columnDefaultOf(
  table: string,
  field: SerializableModelFieldDefinition,
  findEnum: EnumLookup,
): string | undefined {
  const value = field.defaults.find((entry) => entry.origin === 'persist')?.value;
  if (value === undefined) {
    return undefined;
  }
  const { type } = field;

  if (type.category === 'entity') {
    const definition = findEnum(type);
    if (type.enumSerialization === 'byName') {
      return quoteLiteral(value, 'text');
    }
    const index = definition?.values.findIndex((entry) => entry.name === value) ?? -1;
    return index === -1 ? undefined : String(index);
  }

  switch (type.name) {
    case 'int': {
      return value === 'serial' ? `nextval('${table}_id_seq'::regclass)` : value;
    }
    case 'DateTime': {
      return value === 'now' ? 'CURRENT_TIMESTAMP' : quoteLiteral(value, 'timestamp without time zone');
    }
    case 'UuidValue': {
      if (value === 'random') {
        return 'gen_random_uuid()';
      }
      if (value === 'random_v7') {
        return 'gen_random_uuid_v7()';
      }
      return quoteLiteral(unquote(value) ?? value, 'uuid');
    }
    case 'String':
    case 'BigInt': {
      return quoteLiteral(unquote(value) ?? value, 'text');
    }
    case 'Duration': {
      const milliseconds = durationToMilliseconds(value);
      return milliseconds === undefined ? undefined : String(milliseconds);
    }
    default: {
      return value;
    }
  }
}

function projectTable(moduleName: string, model: ClassDefinition, table: string, findEnum: EnumLookup): TableDefinition {
  const persisted = model.fields.filter((field) => field.shouldPersist);

  const columns = persisted.map((field): ColumnDefinition => {
    const columnDefault = columnDefaultOf(table, field, findEnum);
    return {
      name: field.name,
      columnType: columnTypeOf(field.type),
      isNullable: field.name === 'id' ? false : field.type.nullable,
      ...(columnDefault === undefined ? {} : { columnDefault }),
    };
  });

  const foreignKeys: ForeignKeyDefinition[] = [];
  for (const field of persisted) {
    if (field.relation?.kind !== 'foreignKey') {
      continue;
    }
    foreignKeys.push({
      constraintName: `${table}_fk_${foreignKeys.length}`,
      columns: [field.name],
      referenceTable: field.relation.parentTable,
      referenceColumns: [field.relation.referencedField],
      onDelete: field.relation.onDelete,
      onUpdate: field.relation.onUpdate,
    });
  }

  const indexes: TableIndexDefinition[] = [
    {
      indexName: `${table}_pkey`,
      elements: ['id'],
      type: 'btree',
      isUnique: true,
      isPrimary: true,
    },
    ...model.indexes.map(
      (index): TableIndexDefinition => ({
        indexName: index.name,
        elements: index.fields,
        type: index.type,
        isUnique: index.unique,
        isPrimary: false,
        ...(index.distanceFunction ? { distanceFunction: index.distanceFunction } : {}),
        ...(index.parameters ? { parameters: index.parameters } : {}),
      }),
    ),
  ];

  return {
    name: table,
    module: moduleName,
    managed: model.managedMigration,
    columns,
    foreignKeys,
    indexes,
  };
}

/**
 * Projects every database-backed class of a module into the runtime table shape.
 *
 * @param protocol - Module whose tables are projected.
 * @param dependencies - Other modules of the compilation, consulted for enums declared there.
 * @returns One table definition per class with a `table`, in model order.
 */
export function createTableDefinitions(
  protocol: ProtocolDefinition,
  dependencies: readonly ProtocolDefinition[] = [],
): TableDefinition[] {
  const enums = [protocol, ...dependencies].flatMap((module) =>
    module.models.filter((model): model is EnumDefinition => model.kind === 'enum'),
  );
  const findEnum: EnumLookup = (type) =>
    enums.find((model) => model.className === type.name && model.moduleAlias === type.moduleAlias);

  const tables: TableDefinition[] = [];
  for (const model of protocol.models) {
    if (model.kind === 'class' && model.table !== undefined) {
      tables.push(projectTable(protocol.moduleName, model, model.table, findEnum));
    }
  }
  return tables;
}
