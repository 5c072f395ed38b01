import { DiagnosticCategories, type DiagnosticsPort } from '@protoyard/core';

import { isAnalyzedClass, type AnalyzedEntity } from '../analyzer/analyzed-entity.js';
import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import { createIssueReporter } from '../diagnostics/issue-reporter.js';
import { toPointer } from '../document/schema-document.js';
import { entityKey } from './entity-index.js';

/**
 * Reports class names declared twice within a module, and table or index names declared twice
 * anywhere in the compilation. The first declaration in processing order keeps the name.
 *
 * @param entities - Entities in processing order.
 * @param diagnostics - Port receiving the conflicts.
 */
export function validateUniqueNames(entities: readonly AnalyzedEntity[], diagnostics: DiagnosticsPort): void {
  const classes = new Map<string, AnalyzedEntity>();
  const tables = new Map<string, AnalyzedEntity>();
  const indexes = new Map<string, AnalyzedEntity>();

  for (const entity of entities) {
    const { definition } = entity;
    const report = createIssueReporter(diagnostics, definition.sourceFileName);

    const key = entityKey(definition.moduleAlias, definition.className);
    const existingClass = classes.get(key);
    if (existingClass) {
      report({
        message: `The class name "${definition.className}" is already declared in "${existingClass.definition.sourceFileName}".`,
        code: SchemaDiagnosticCodes.duplicateClass,
        category: DiagnosticCategories.module,
        span: entity.nameSpan,
        pointer: toPointer(definition.kind),
      });
    } else {
      classes.set(key, entity);
    }

    if (!isAnalyzedClass(entity)) {
      continue;
    }

    const table = entity.definition.table;
    if (table !== undefined) {
      const owner = tables.get(table);
      if (owner) {
        report({
          message: `The table name "${table}" is already used by "${owner.definition.className}".`,
          code: SchemaDiagnosticCodes.duplicateTable,
          category: DiagnosticCategories.module,
          span: entity.tableSpan,
          pointer: toPointer('table'),
        });
      } else {
        tables.set(table, entity);
      }
    }

    for (const index of entity.indexes) {
      const owner = indexes.get(index.name);
      if (owner) {
        report({
          message: `The index name "${index.name}" is already used by "${owner.definition.className}".`,
          code: SchemaDiagnosticCodes.duplicateIndex,
          category: DiagnosticCategories.module,
          span: index.nameSpan,
          pointer: index.pointer,
        });
      } else {
        indexes.set(index.name, entity);
      }
    }
  }
}
