import { isAnalyzedClass, type AnalyzedClass, type AnalyzedEntity } from '../analyzer/analyzed-entity.js';
import type { TypeDefinition } from '../definitions/type-definition.js';

/**
 * Read-only lookup over every entity shell of a compilation.
 */
export interface EntityIndex {
  readonly moduleAliases: readonly string[];
  hasModule(alias: string): boolean;
  find(moduleAlias: string, className: string): AnalyzedEntity | undefined;
  /** Modules other than `exceptAlias` declaring `className`, in module order. */
  findElsewhere(className: string, exceptAlias: string): readonly AnalyzedEntity[];
  findClass(type: TypeDefinition): AnalyzedClass | undefined;
  findTable(table: string): AnalyzedClass | undefined;
}

export function entityKey(moduleAlias: string, className: string): string {
  return `${moduleAlias}:${className}`;
}

/**
 * Indexes entities by module and class name. The first declaration wins when a module declares
 * the same class twice.
 *
 * @param entities - Entities in processing order.
 * @param moduleAliases - Every module alias of the compilation, including empty modules.
 * @returns The lookup.
 */
export function createEntityIndex(
  entities: readonly AnalyzedEntity[],
  moduleAliases: readonly string[],
): EntityIndex {
  const byKey = new Map<string, AnalyzedEntity>();
  const byTable = new Map<string, AnalyzedClass>();

  for (const entity of entities) {
    const key = entityKey(entity.definition.moduleAlias, entity.definition.className);
    if (!byKey.has(key)) {
      byKey.set(key, entity);
    }
    if (isAnalyzedClass(entity) && entity.definition.table && !byTable.has(entity.definition.table)) {
      byTable.set(entity.definition.table, entity);
    }
  }

  const aliases = new Set(moduleAliases);

  return {
    moduleAliases,
    hasModule: (alias) => aliases.has(alias),
    find: (moduleAlias, className) => byKey.get(entityKey(moduleAlias, className)),
    findElsewhere: (className, exceptAlias) =>
      moduleAliases
        .filter((alias) => alias !== exceptAlias)
        .map((alias) => byKey.get(entityKey(alias, className)))
        .filter((entity): entity is AnalyzedEntity => entity !== undefined),
    findClass: (type) => {
      if (type.category !== 'entity' || type.moduleAlias === undefined) {
        return undefined;
      }
      const entity = byKey.get(entityKey(type.moduleAlias, type.name));
      return entity && isAnalyzedClass(entity) ? entity : undefined;
    },
    findTable: (table) => byTable.get(table),
  };
}
