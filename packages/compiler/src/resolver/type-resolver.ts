import { DiagnosticCategories, type DiagnosticsPort } from '@protoyard/core';

import type { AnalyzedEntity, DefaultAnnotation, FieldDraft } from '../analyzer/analyzed-entity.js';
import { SchemaDiagnosticCodes, type SchemaDiagnosticCode } from '../diagnostics/codes.js';
import { createIssueReporter, type IssueReporter } from '../diagnostics/issue-reporter.js';
import { describeType, type TypeDefinition } from '../definitions/type-definition.js';
import type { EntityIndex } from './entity-index.js';

interface ResolutionContext {
  readonly index: EntityIndex;
  readonly entity: AnalyzedEntity;
  readonly field: FieldDraft;
  readonly report: IssueReporter;
}

/**
 * Stage two, first pass: resolves every entity reference in field types against the complete
 * set of shells. Unresolvable names are reported and stay `unresolved`.
 *
 * @param entities - Entities in processing order.
 * @param index - Lookup over the same entities.
 * @param diagnostics - Port receiving resolution problems.
 * @returns New entities whose field types are resolved.
 */
export function resolveTypes(
  entities: readonly AnalyzedEntity[],
  index: EntityIndex,
  diagnostics: DiagnosticsPort,
): AnalyzedEntity[] {
  return entities.map((entity) => {
    if (entity.fields.length === 0) {
      return entity;
    }
    const report = createIssueReporter(diagnostics, entity.definition.sourceFileName);
    const fields = entity.fields.map((field) => {
      const context: ResolutionContext = { index, entity, field, report };
      const type = resolveType(field.type, context);
      return checkEnumDefaults({ ...field, type }, context);
    });
    return { ...entity, fields };
  });
}

function resolveType(type: TypeDefinition, context: ResolutionContext): TypeDefinition {
  if (type.category === 'container') {
    return { ...type, generics: type.generics.map((generic) => resolveType(generic, context)) };
  }
  if (type.category !== 'unresolved') {
    return type;
  }

  const target = lookupEntity(type, context);
  if (!target) {
    return type;
  }

  const definition = target.definition;
  return {
    name: definition.className,
    nullable: type.nullable,
    generics: [],
    category: 'entity',
    moduleAlias: definition.moduleAlias,
    entityKind: definition.kind,
    ...(definition.kind === 'enum' && definition.serialized
      ? { enumSerialization: definition.serialized }
      : {}),
  };
}

function lookupEntity(type: TypeDefinition, context: ResolutionContext): AnalyzedEntity | undefined {
  const { index, entity, field, report } = context;
  const issue = (message: string, code: SchemaDiagnosticCode) => {
    report({
      message,
      code,
      category: DiagnosticCategories.typeResolution,
      span: field.typeSpan,
      pointer: field.pointer,
    });
  };
  const notFound = () => {
    issue(
      `The type "${type.name}" used by field "${field.name}" was not found.`,
      SchemaDiagnosticCodes.unresolvedType,
    );
  };

  if (type.moduleAlias !== undefined) {
    if (!index.hasModule(type.moduleAlias)) {
      issue(`The module "${type.moduleAlias}" was not found.`, SchemaDiagnosticCodes.unknownModule);
      return undefined;
    }
    const found = index.find(type.moduleAlias, type.name);
    if (!found) {
      notFound();
    }
    return found;
  }

  const local = index.find(entity.definition.moduleAlias, type.name);
  if (local) {
    return local;
  }

  const [candidate, ...others] = index.findElsewhere(type.name, entity.definition.moduleAlias);
  if (!candidate) {
    notFound();
    return undefined;
  }
  if (others.length > 0) {
    const aliases = [candidate, ...others].map((other) => other.definition.moduleAlias).join(', ');
    issue(
      `The type "${type.name}" used by field "${field.name}" is declared by several modules (${aliases}). Use a "module:<alias>:" prefix.`,
      SchemaDiagnosticCodes.ambiguousType,
    );
    return undefined;
  }
  return candidate;
}

function checkEnumDefaults(field: FieldDraft, context: ResolutionContext): FieldDraft {
  if (field.type.category !== 'entity' || (!field.defaultModel && !field.defaultPersist)) {
    return field;
  }

  const target = context.index.find(field.type.moduleAlias ?? '', field.type.name);
  const enumValues = target?.definition.kind === 'enum' ? target.definition.values : undefined;
  const reported = new Set<DefaultAnnotation>();

  const check = (annotation: DefaultAnnotation | undefined): DefaultAnnotation | undefined => {
    if (!annotation) {
      return undefined;
    }
    if (enumValues?.some((value) => value.name === annotation.value)) {
      return annotation;
    }
    if (!reported.has(annotation)) {
      reported.add(annotation);
      context.report({
        message: enumValues
          ? `The default value "${annotation.value}" is not a value of the enum "${field.type.name}".`
          : `Default values are not supported for the type "${describeType(field.type)}".`,
        code: SchemaDiagnosticCodes.invalidDefaultValue,
        category: DiagnosticCategories.field,
        span: annotation.span,
        pointer: field.pointer,
      });
    }
    return undefined;
  };

  const { defaultModel: _model, defaultPersist: _persist, ...rest } = field;
  const defaultModel = check(field.defaultModel);
  const defaultPersist = check(field.defaultPersist);
  return {
    ...rest,
    ...(defaultModel ? { defaultModel } : {}),
    ...(defaultPersist ? { defaultPersist } : {}),
  };
}
