export type TableReferentialAction = 'Cascade' | 'Restrict' | 'NoAction' | 'SetNull' | 'SetDefault';

export interface ColumnDefinition {
  readonly name: string;
  readonly columnType: string;
  readonly isNullable: boolean;
  readonly columnDefault?: string;
}

export interface ForeignKeyDefinition {
  readonly constraintName: string;
  readonly columns: readonly string[];
  readonly referenceTable: string;
  readonly referenceColumns: readonly string[];
  readonly onDelete: TableReferentialAction;
  readonly onUpdate: TableReferentialAction;
}

export interface TableIndexDefinition {
  readonly indexName: string;
  readonly elements: readonly string[];
  readonly type: string;
  readonly isUnique: boolean;
  readonly isPrimary: boolean;
  readonly distanceFunction?: string;
  readonly parameters?: Readonly<Record<string, number>>;
}

/**
 * Database table of one database-backed class, as declared by the module owning it.
 */
export interface TableDefinition {
  readonly name: string;
  readonly module: string;
  readonly managed: boolean;
  readonly columns: readonly ColumnDefinition[];
  readonly foreignKeys: readonly ForeignKeyDefinition[];
  readonly indexes: readonly TableIndexDefinition[];
}
