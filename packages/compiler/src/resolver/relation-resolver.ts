import { DiagnosticCategories, type DiagnosticSpan, type DiagnosticsPort } from '@protoyard/core';

import {
  isAnalyzedClass,
  type AnalyzedClass,
  type AnalyzedEntity,
  type FieldDraft,
  type RelationAnnotation,
  type SpannedValue,
} from '../analyzer/analyzed-entity.js';
import type { RelationParameterKey } from '../analyzer/field-expression.js';
import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import { createIssueReporter, type IssueReporter } from '../diagnostics/issue-reporter.js';
import {
  isReferentialAction,
  type ForeignKeyRelationDefinition,
  type ReferentialAction,
} from '../definitions/model-definitions.js';
import {
  describeType,
  isSameBaseType,
  listElementType,
  withNullability,
  type TypeDefinition,
} from '../definitions/type-definition.js';
import { toPointer } from '../document/schema-document.js';
import type { EntityIndex } from './entity-index.js';

const DEFAULT_ID_TYPE: TypeDefinition = { name: 'int', nullable: false, generics: [], category: 'scalar' };

/**
 * Field drafts of every entity while relations are being paired, keyed by entity so duplicate
 * class names keep separate drafts. Synthesized foreign keys are inserted here so later
 * relations see them.
 */
class RelationWorkspace {
  private readonly fields = new Map<AnalyzedEntity, FieldDraft[]>();

  constructor(entities: readonly AnalyzedEntity[]) {
    for (const entity of entities) {
      this.fields.set(entity, [...entity.fields]);
    }
  }

  fieldsOf(entity: AnalyzedEntity): readonly FieldDraft[] {
    return this.fields.get(entity) ?? [];
  }

  findField(entity: AnalyzedEntity, name: string): FieldDraft | undefined {
    return this.fieldsOf(entity).find((field) => field.name === name);
  }

  update(entity: AnalyzedEntity, name: string, update: (field: FieldDraft) => FieldDraft): void {
    const fields = this.fields.get(entity);
    const position = fields?.findIndex((field) => field.name === name) ?? -1;
    const current = fields?.[position];
    if (fields && current) {
      fields[position] = update(current);
    }
  }

  insertAfter(entity: AnalyzedEntity, anchor: string, field: FieldDraft): void {
    const fields = this.fields.get(entity);
    if (!fields) {
      return;
    }
    const position = fields.findIndex((candidate) => candidate.name === anchor);
    fields.splice(position === -1 ? fields.length : position + 1, 0, field);
  }

  append(entity: AnalyzedEntity, field: FieldDraft): void {
    this.fields.get(entity)?.push(field);
  }

  idType(entity: AnalyzedEntity): TypeDefinition {
    const id = this.findField(entity, 'id');
    return id ? withNullability(id.type, false) : DEFAULT_ID_TYPE;
  }

  build(entities: readonly AnalyzedEntity[]): AnalyzedEntity[] {
    return entities.map((entity) => {
      const fields = this.fields.get(entity);
      return fields ? { ...entity, fields } : entity;
    });
  }
}

interface RelationContext {
  readonly index: EntityIndex;
  readonly workspace: RelationWorkspace;
  readonly owner: AnalyzedClass;
  readonly table: string;
  readonly field: FieldDraft;
  readonly annotation: RelationAnnotation;
  readonly report: IssueReporter;
}

type RelationParameters = RelationAnnotation['parameters'];

/**
 * Stage two, second pass: pairs relation annotations, synthesizes foreign-key fields and
 * checks referential actions.
 *
 * @param entities - Entities with resolved field types.
 * @param index - Lookup over the same entities.
 * @param diagnostics - Port receiving relation problems.
 * @returns New entities whose relation fields carry relation definitions.
 */
export function resolveRelations(
  entities: readonly AnalyzedEntity[],
  index: EntityIndex,
  diagnostics: DiagnosticsPort,
): AnalyzedEntity[] {
  const workspace = new RelationWorkspace(entities);

  for (const owner of entities) {
    const table = isAnalyzedClass(owner) ? owner.definition.table : undefined;
    if (!isAnalyzedClass(owner) || table === undefined) {
      continue;
    }
    const report = createIssueReporter(diagnostics, owner.definition.sourceFileName);
    for (const declared of owner.fields) {
      if (!declared.relationAnnotation) {
        continue;
      }
      const field = workspace.findField(owner, declared.name) ?? declared;
      resolveFieldRelation({
        index,
        workspace,
        owner,
        table,
        field,
        annotation: declared.relationAnnotation,
        report,
      });
    }
  }

  return workspace.build(entities);
}

function relationIssue(context: RelationContext, message: string, span: DiagnosticSpan = context.annotation.span): void {
  context.report({
    message,
    code: SchemaDiagnosticCodes.invalidRelation,
    category: DiagnosticCategories.relation,
    span,
    pointer: context.field.pointer,
  });
}

function resolveFieldRelation(context: RelationContext): void {
  const { field, annotation } = context;
  const parent = annotation.parameters.parent;
  if (parent) {
    resolveParentRelation(context, parent);
    return;
  }

  const type = field.type;
  if (containsUnresolved(type)) {
    return;
  }
  if (type.category === 'entity') {
    const target = requireTableClass(context, type);
    if (target) {
      requireNullableRelationField(context);
      resolveObjectRelation(context, target);
    }
    return;
  }

  const element = listElementType(type);
  if (element?.category === 'entity') {
    const target = requireTableClass(context, element);
    if (target) {
      requireNullableRelationField(context);
      resolveListRelation(context, target);
    }
    return;
  }

  relationIssue(
    context,
    'The "relation" annotation requires a field referencing a class with a "table", a list of such classes or a "parent" table.',
  );
}

function containsUnresolved(type: TypeDefinition): boolean {
  return type.category === 'unresolved' || type.generics.some((generic) => containsUnresolved(generic));
}

function requireTableClass(context: RelationContext, type: TypeDefinition): AnalyzedClass | undefined {
  const target = context.index.findClass(type);
  if (!target || target.definition.table === undefined) {
    relationIssue(context, `The relation target "${type.name}" must be a class with a "table".`, context.field.typeSpan);
    return undefined;
  }
  return target;
}

function requireNullableRelationField(context: RelationContext): void {
  if (!context.field.type.nullable) {
    relationIssue(
      context,
      `The relation field "${context.field.name}" must be nullable.`,
      context.field.typeSpan,
    );
  }
}

function referentialAction(value: SpannedValue<string> | undefined): ReferentialAction {
  return value && isReferentialAction(value.value) ? value.value : 'NoAction';
}

function rejectParameters(
  context: RelationContext,
  keys: readonly RelationParameterKey[],
  message: (key: RelationParameterKey) => string,
): void {
  for (const key of keys) {
    const parameter = context.annotation.parameters[key];
    if (parameter) {
      relationIssue(context, message(key), parameter.span);
    }
  }
}

function pointsTo(type: TypeDefinition | undefined, entity: AnalyzedEntity): boolean {
  return (
    type?.category === 'entity' &&
    type.name === entity.definition.className &&
    type.moduleAlias === entity.definition.moduleAlias
  );
}

function findCounterpart(
  context: RelationContext,
  target: AnalyzedClass,
  name: SpannedValue<string>,
): FieldDraft | undefined {
  const { owner, field, workspace } = context;
  const candidates = workspace
    .fieldsOf(target)
    .filter(
      (candidate) =>
        candidate.relationAnnotation?.parameters.name?.value === name.value &&
        !(target === owner && candidate.name === field.name),
    );

  const [counterpart, ...others] = candidates;
  if (!counterpart) {
    context.report({
      message: `No counterpart for the named relation "${name.value}" was found on "${target.definition.className}".`,
      code: SchemaDiagnosticCodes.missingCounterpart,
      category: DiagnosticCategories.relation,
      span: name.span,
      pointer: field.pointer,
    });
    return undefined;
  }
  if (others.length > 0) {
    context.report({
      message: `The named relation "${name.value}" has ${candidates.length} counterparts on "${target.definition.className}". A named relation pairs exactly two fields.`,
      code: SchemaDiagnosticCodes.ambiguousRelation,
      category: DiagnosticCategories.relation,
      span: name.span,
      pointer: field.pointer,
    });
    return undefined;
  }
  return counterpart;
}

function objectSideForeignKey(field: FieldDraft): string {
  return field.relationAnnotation?.parameters.field?.value ?? `${field.name}Id`;
}

function resolveObjectRelation(context: RelationContext, target: AnalyzedClass): void {
  const { owner, field, workspace } = context;
  const parameters = context.annotation.parameters;
  const name = parameters.name;
  const targetTable = target.definition.table ?? '';

  let holdsKey = true;
  let counterpart: FieldDraft | undefined;
  if (name) {
    counterpart = findCounterpart(context, target, name);
    if (!counterpart) {
      return;
    }
    if (pointsTo(counterpart.type, owner)) {
      const declaresField = parameters.field !== undefined;
      const counterpartDeclaresField = counterpart.relationAnnotation?.parameters.field !== undefined;
      if (declaresField === counterpartDeclaresField) {
        const ownKey = `${owner.definition.className}.${field.name}`;
        const otherKey = `${target.definition.className}.${counterpart.name}`;
        if (ownKey <= otherKey) {
          relationIssue(
            context,
            `Exactly one side of the one-to-one relation "${name.value}" must declare "field".`,
            name.span,
          );
        }
        return;
      }
      holdsKey = declaresField;
    } else if (!pointsTo(listElementType(counterpart.type), owner)) {
      relationIssue(
        context,
        `The field "${target.definition.className}.${counterpart.name}" of the named relation "${name.value}" does not reference "${owner.definition.className}".`,
        name.span,
      );
      return;
    }
  }

  if (!holdsKey && counterpart) {
    rejectParameters(
      context,
      ['onDelete', 'onUpdate', 'optional'],
      (key) => `The "${key}" parameter can only be set on the side of the relation holding the foreign key.`,
    );
    const targetForeignKeyField = objectSideForeignKey(counterpart);
    workspace.update(owner, field.name, (draft) => ({
      ...draft,
      shouldPersist: false,
      relation: {
        kind: 'object',
        targetClass: target.definition.className,
        targetModuleAlias: target.definition.moduleAlias,
        targetTable,
        targetForeignKeyField,
        ...(name ? { name: name.value } : {}),
      },
    }));
    return;
  }

  const onDelete = referentialAction(parameters.onDelete);
  const onUpdate = referentialAction(parameters.onUpdate);
  const idType = workspace.idType(target);
  const foreignKey: ForeignKeyRelationDefinition = {
    kind: 'foreignKey',
    parentTable: targetTable,
    referencedField: 'id',
    onDelete,
    onUpdate,
    relationField: field.name,
    relationFieldOwner: owner.definition.className,
  };

  let foreignKeyField: string;
  if (parameters.field) {
    foreignKeyField = parameters.field.value;
    const existing = workspace.findField(owner, foreignKeyField);
    if (!existing) {
      relationIssue(
        context,
        `The field "${foreignKeyField}" referenced by "field" was not found on "${owner.definition.className}".`,
        parameters.field.span,
      );
      return;
    }
    if (existing.relationAnnotation || existing.relation) {
      relationIssue(
        context,
        `The field "${foreignKeyField}" cannot hold the foreign key because it already declares a relation.`,
        parameters.field.span,
      );
      return;
    }
    if (!isSameBaseType(existing.type, idType)) {
      relationIssue(
        context,
        `The field "${foreignKeyField}" must be of type "${describeType(idType)}" to reference "${target.definition.className}".`,
        parameters.field.span,
      );
      return;
    }
    if (onDelete === 'SetNull' && !existing.type.nullable) {
      relationIssue(
        context,
        `The "onDelete" value "SetNull" requires the field "${foreignKeyField}" to be nullable.`,
        parameters.onDelete?.span,
      );
      return;
    }
    workspace.update(owner, foreignKeyField, (draft) => ({ ...draft, relation: foreignKey }));
  } else {
    foreignKeyField = `${field.name}Id`;
    if (workspace.findField(owner, foreignKeyField)) {
      relationIssue(
        context,
        `The field "${foreignKeyField}" already exists on "${owner.definition.className}". Reference it with "field=${foreignKeyField}".`,
      );
      return;
    }
    const nullable = parameters.optional !== undefined || onDelete === 'SetNull';
    workspace.insertAfter(owner, field.name, {
      name: foreignKeyField,
      pointer: toPointer('fields', foreignKeyField),
      nameSpan: field.nameSpan,
      typeSpan: field.typeSpan,
      type: withNullability(idType, nullable),
      scope: field.scope,
      shouldPersist: true,
      relation: foreignKey,
      origin: 'synthesized',
    });
  }

  workspace.update(owner, field.name, (draft) => ({
    ...draft,
    shouldPersist: false,
    relation: {
      kind: 'object',
      targetClass: target.definition.className,
      targetModuleAlias: target.definition.moduleAlias,
      targetTable,
      foreignKeyField,
      ...(name ? { name: name.value } : {}),
    },
  }));
}

function resolveListRelation(context: RelationContext, target: AnalyzedClass): void {
  const { owner, field, workspace, table } = context;
  const name = context.annotation.parameters.name;
  const targetTable = target.definition.table ?? '';

  rejectParameters(
    context,
    ['onDelete', 'onUpdate'],
    (key) => `The "${key}" parameter can only be set on the side of the relation holding the foreign key.`,
  );
  rejectParameters(
    context,
    ['field', 'optional'],
    (key) => `The "${key}" parameter cannot be used on a list relation.`,
  );

  let foreignKeyField: string;
  let implicitForeignKey = false;
  if (name) {
    const counterpart = findCounterpart(context, target, name);
    if (!counterpart) {
      return;
    }
    if (pointsTo(counterpart.type, owner)) {
      foreignKeyField = objectSideForeignKey(counterpart);
    } else if (counterpart.relationAnnotation?.parameters.parent?.value === table) {
      foreignKeyField = counterpart.name;
    } else {
      relationIssue(
        context,
        `The field "${target.definition.className}.${counterpart.name}" of the named relation "${name.value}" does not reference "${owner.definition.className}".`,
        name.span,
      );
      return;
    }
  } else {
    const className = owner.definition.className;
    foreignKeyField = `_${lowerFirst(className)}${upperFirst(field.name)}${className}Id`;
    implicitForeignKey = true;
    if (workspace.findField(target, foreignKeyField)) {
      relationIssue(
        context,
        `The field "${foreignKeyField}" already exists on "${target.definition.className}".`,
      );
      return;
    }
    workspace.append(target, {
      name: foreignKeyField,
      pointer: toPointer('fields', foreignKeyField),
      nameSpan: field.nameSpan,
      typeSpan: field.typeSpan,
      type: withNullability(workspace.idType(owner), true),
      scope: 'none',
      shouldPersist: true,
      hidden: true,
      relation: {
        kind: 'foreignKey',
        parentTable: table,
        referencedField: 'id',
        onDelete: 'NoAction',
        onUpdate: 'NoAction',
        relationField: field.name,
        relationFieldOwner: className,
      },
      origin: 'synthesized',
    });
  }

  workspace.update(owner, field.name, (draft) => ({
    ...draft,
    shouldPersist: false,
    relation: {
      kind: 'list',
      targetClass: target.definition.className,
      targetModuleAlias: target.definition.moduleAlias,
      targetTable,
      foreignKeyField,
      implicitForeignKey,
      ...(name ? { name: name.value } : {}),
    },
  }));
}

function resolveParentRelation(context: RelationContext, parent: SpannedValue<string>): void {
  const { field, workspace } = context;
  const parameters: RelationParameters = context.annotation.parameters;

  if (field.type.category !== 'scalar') {
    relationIssue(
      context,
      `The "parent" parameter requires a field holding the parent's id, found "${describeType(field.type)}".`,
      field.typeSpan,
    );
    return;
  }
  rejectParameters(
    context,
    ['field', 'optional'],
    (key) => `The "${key}" parameter cannot be combined with "parent".`,
  );

  const parentClass = context.index.findTable(parent.value);
  if (!parentClass) {
    relationIssue(context, `The parent table "${parent.value}" was not found.`, parent.span);
    return;
  }

  const idType = workspace.idType(parentClass);
  if (!isSameBaseType(field.type, idType)) {
    relationIssue(
      context,
      `The field "${field.name}" must be of type "${describeType(idType)}" to reference the table "${parent.value}".`,
      field.typeSpan,
    );
    return;
  }

  const onDelete = referentialAction(parameters.onDelete);
  if (onDelete === 'SetNull' && !field.type.nullable) {
    relationIssue(
      context,
      `The "onDelete" value "SetNull" requires the field "${field.name}" to be nullable.`,
      parameters.onDelete?.span,
    );
    return;
  }

  workspace.update(context.owner, field.name, (draft) => ({
    ...draft,
    relation: {
      kind: 'foreignKey',
      parentTable: parent.value,
      referencedField: 'id',
      onDelete,
      onUpdate: referentialAction(parameters.onUpdate),
      ...(parameters.name ? { name: parameters.name.value } : {}),
    },
  }));
}

function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

function upperFirst(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
