import { DiagnosticCategories, type DiagnosticSpan, type DiagnosticsPort } from '@protoyard/core';

import {
  isAnalyzedClass,
  type AnalyzedClass,
  type AnalyzedEntity,
  type FieldDraft,
  type IndexDraft,
} from '../analyzer/analyzed-entity.js';
import { quoteList } from '../analyzer/field-expression.js';
import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import { createIssueReporter, type IssueReporter } from '../diagnostics/issue-reporter.js';
import {
  INDEX_TYPES,
  isDistanceFunction,
  isIndexType,
  isVectorIndexType,
  type DistanceFunction,
  type IndexDefinition,
  type IndexType,
} from '../definitions/model-definitions.js';

const VECTOR_DISTANCE_FUNCTIONS: readonly DistanceFunction[] = ['l2', 'innerProduct', 'cosine', 'l1'];
const BIT_DISTANCE_FUNCTIONS: readonly DistanceFunction[] = ['hamming', 'jaccard'];

const INDEX_PARAMETERS: Readonly<Partial<Record<IndexType, readonly string[]>>> = Object.freeze({
  hnsw: ['m', 'ef_construction'],
  ivfflat: ['lists'],
});

/**
 * Stage two, last pass: checks index drafts against the final field set of each class and
 * turns them into index definitions.
 *
 * @param entities - Entities after relation resolution.
 * @param diagnostics - Port receiving index problems.
 * @returns New entities carrying their validated indexes.
 */
export function validateIndexes(
  entities: readonly AnalyzedEntity[],
  diagnostics: DiagnosticsPort,
): AnalyzedEntity[] {
  return entities.map((entity) => {
    if (!isAnalyzedClass(entity) || entity.indexes.length === 0) {
      return entity;
    }
    const report = createIssueReporter(diagnostics, entity.definition.sourceFileName);
    const resolvedIndexes = entity.indexes
      .map((draft) => validateIndex(entity, draft, report))
      .filter((index): index is IndexDefinition => index !== undefined);
    return { ...entity, resolvedIndexes };
  });
}

function validateIndex(
  entity: AnalyzedClass,
  draft: IndexDraft,
  report: IssueReporter,
): IndexDefinition | undefined {
  let valid = true;
  const issue = (message: string, span: DiagnosticSpan) => {
    valid = false;
    report({
      message,
      code: SchemaDiagnosticCodes.invalidIndex,
      category: DiagnosticCategories.index,
      span,
      pointer: draft.pointer,
    });
  };

  const fields: FieldDraft[] = [];
  const seen = new Set<string>();
  for (const reference of draft.fields) {
    if (seen.has(reference.value)) {
      issue(`The field "${reference.value}" is listed more than once in index "${draft.name}".`, reference.span);
      continue;
    }
    seen.add(reference.value);
    const field = entity.fields.find((candidate) => candidate.name === reference.value);
    if (!field) {
      issue(`The field "${reference.value}" used by index "${draft.name}" does not exist.`, reference.span);
      continue;
    }
    if (!field.shouldPersist) {
      issue(`The field "${reference.value}" used by index "${draft.name}" is not persisted.`, reference.span);
      continue;
    }
    fields.push(field);
  }

  const vectorFields = fields.filter((field) => field.type.category === 'vector');
  let type: IndexType;
  if (draft.type) {
    if (!isIndexType(draft.type.value)) {
      issue(
        `The index type "${draft.type.value}" is not valid. Valid types are ${quoteList(INDEX_TYPES)}.`,
        draft.type.span,
      );
      return undefined;
    }
    type = draft.type.value;
  } else {
    type = fields.length === 1 && vectorFields.length === 1 ? 'hnsw' : 'btree';
  }

  const vectorIndex = isVectorIndexType(type);
  const [vectorField] = vectorFields;
  if (vectorIndex) {
    if (draft.fields.length !== 1 || !vectorField) {
      issue(`The "${type}" index "${draft.name}" must contain exactly one vector field.`, draft.fieldsSpan);
    }
    if (draft.unique) {
      issue(`The vector index "${draft.name}" cannot be unique.`, draft.nameSpan);
    }
  } else {
    for (const field of vectorFields) {
      const reference = draft.fields.find((candidate) => candidate.value === field.name);
      issue(
        `The vector field "${field.name}" can only be indexed with "hnsw" or "ivfflat".`,
        reference?.span ?? draft.fieldsSpan,
      );
    }
  }

  let distanceFunction: DistanceFunction | undefined;
  if (draft.distanceFunction) {
    const value = draft.distanceFunction.value;
    if (!vectorIndex) {
      issue('The "distanceFunction" property is only allowed on vector indexes.', draft.distanceFunction.span);
    } else if (vectorField) {
      const allowed = vectorField.type.name === 'Bit' ? BIT_DISTANCE_FUNCTIONS : VECTOR_DISTANCE_FUNCTIONS;
      if (isDistanceFunction(value) && allowed.includes(value)) {
        distanceFunction = value;
      } else {
        issue(
          `The distance function "${value}" is not valid for "${vectorField.type.name}" fields. Valid values are ${quoteList(allowed)}.`,
          draft.distanceFunction.span,
        );
      }
    }
  } else if (vectorIndex && vectorField) {
    distanceFunction = vectorField.type.name === 'Bit' ? 'hamming' : 'l2';
  }

  let parameters: Record<string, number> | undefined;
  if (draft.parameters && draft.parametersSpan) {
    const allowed = INDEX_PARAMETERS[type];
    if (!allowed) {
      issue('The "parameters" property is only allowed on vector indexes.', draft.parametersSpan);
    } else {
      parameters = {};
      for (const parameter of draft.parameters) {
        if (!allowed.includes(parameter.key)) {
          issue(
            `The parameter "${parameter.key}" is not valid for "${type}" indexes. Valid parameters are ${quoteList(allowed)}.`,
            parameter.span,
          );
          continue;
        }
        if (!Number.isInteger(parameter.value) || parameter.value <= 0) {
          issue(`The parameter "${parameter.key}" must be a positive integer.`, parameter.span);
          continue;
        }
        parameters[parameter.key] = parameter.value;
      }
    }
  }

  if (!valid) {
    return undefined;
  }

  return {
    name: draft.name,
    fields: fields.map((field) => field.name),
    type,
    unique: draft.unique,
    ...(distanceFunction ? { distanceFunction } : {}),
    ...(parameters ? { parameters } : {}),
  };
}
