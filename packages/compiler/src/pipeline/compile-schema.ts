import {
  DiagnosticCategories,
  DiagnosticsCollector,
  noopLogger,
  type DiagnosticEvent,
  type StructuredLogger,
} from '@protoyard/core';

import type { AnalyzedEntity } from '../analyzer/analyzed-entity.js';
import { analyzeEntity } from '../analyzer/entity-analyzer.js';
import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import type { ProtocolDefinition } from '../definitions/model-definitions.js';
import type { SchemaDocumentInput } from '../document/schema-document.js';
import { createEntityIndex } from '../resolver/entity-index.js';
import { validateIndexes } from '../resolver/index-validator.js';
import { resolveRelations } from '../resolver/relation-resolver.js';
import { resolveTypes } from '../resolver/type-resolver.js';
import { validateUniqueNames } from '../resolver/uniqueness-validator.js';
import { assembleDefinition } from './assemble.js';
import { deepFreeze } from './deep-freeze.js';

const LOGGER_NAME = 'compiler';

export type CompilerStage =
  | 'analyze'
  | 'resolve-types'
  | 'resolve-relations'
  | 'validate-indexes'
  | 'assemble';

/**
 * Documents of one module. `alias` defaults to `name`; `module:<alias>:` prefixes and
 * generated namespaces use it.
 */
export interface SchemaModuleSource {
  readonly name: string;
  readonly alias?: string;
  readonly documents: readonly SchemaDocumentInput[];
}

export interface CompileSchemaOptions {
  readonly project: SchemaModuleSource;
  readonly dependencies?: readonly SchemaModuleSource[];
  readonly diagnostics?: DiagnosticsCollector;
  readonly logger?: StructuredLogger;
}

export interface CompilationResult {
  readonly project: ProtocolDefinition;
  readonly dependencies: readonly ProtocolDefinition[];
  readonly diagnostics: readonly DiagnosticEvent[];
  readonly hasErrors: boolean;
}

interface ModuleIdentity {
  readonly name: string;
  readonly alias: string;
}

function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Compiles a project module and its dependency modules into validated protocol definitions.
 *
 * Every document is analysed before any type is resolved, so forward and circular references
 * are legal. Documents are processed in source file name order, which makes the output and the
 * diagnostics independent of the order documents are supplied in.
 *
 * @param options - Modules to compile plus optional collector and logger.
 * @returns Frozen protocol definitions and every diagnostic emitted.
 */
export function compileSchema(options: CompileSchemaOptions): CompilationResult {
  const diagnostics = options.diagnostics ?? new DiagnosticsCollector();
  const logger = options.logger ?? noopLogger;
  const totalStart = performance.now();

  const runStage = <T>(stage: CompilerStage, run: () => T): T => {
    const start = performance.now();
    const result = run();
    logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'compiler.stage',
      elapsedMs: performance.now() - start,
      data: { stage, errorCount: diagnostics.errorCount },
    });
    return result;
  };

  const sources = [options.project, ...(options.dependencies ?? [])];
  const modules: ModuleIdentity[] = [];
  const entities = runStage('analyze', () => {
    const analyzed: AnalyzedEntity[] = [];
    for (const source of sources) {
      const alias = source.alias ?? source.name;
      if (modules.some((module) => module.alias === alias)) {
        diagnostics.emit({
          level: 'error',
          message: `The module alias "${alias}" is used by more than one module.`,
          code: SchemaDiagnosticCodes.duplicateModule,
          category: DiagnosticCategories.module,
        });
        continue;
      }
      modules.push({ name: source.name, alias });

      const documents = [...source.documents].sort((left, right) =>
        compareText(left.sourceFileName, right.sourceFileName),
      );
      for (const document of documents) {
        const entity = analyzeEntity({ ...document, moduleAlias: alias }, diagnostics);
        if (entity) {
          analyzed.push(entity);
        }
      }
    }
    validateUniqueNames(analyzed, diagnostics);
    return analyzed;
  });

  const aliases = modules.map((module) => module.alias);
  const typed = runStage('resolve-types', () =>
    resolveTypes(entities, createEntityIndex(entities, aliases), diagnostics),
  );
  const related = runStage('resolve-relations', () =>
    resolveRelations(typed, createEntityIndex(typed, aliases), diagnostics),
  );
  const indexed = runStage('validate-indexes', () => validateIndexes(related, diagnostics));

  const protocols = runStage('assemble', () =>
    modules.map(
      (module): ProtocolDefinition =>
        deepFreeze({
          moduleName: module.name,
          moduleAlias: module.alias,
          models: indexed
            .filter((entity) => entity.definition.moduleAlias === module.alias)
            .map((entity) => assembleDefinition(entity)),
        }),
    ),
  );

  const [project, ...dependencies] = protocols;
  const hasErrors = diagnostics.hasErrors();
  logger.log({
    level: hasErrors ? 'warn' : 'info',
    name: LOGGER_NAME,
    event: 'compiler.complete',
    elapsedMs: performance.now() - totalStart,
    data: {
      modules: protocols.length,
      models: protocols.reduce((total, protocol) => total + protocol.models.length, 0),
      errorCount: diagnostics.errorCount,
      warningCount: diagnostics.warnings.length,
    },
  });

  return Object.freeze({
    project: project ?? deepFreeze({ moduleName: options.project.name, moduleAlias: options.project.name, models: [] }),
    dependencies: Object.freeze(dependencies),
    diagnostics: diagnostics.snapshot(),
    hasErrors,
  });
}
