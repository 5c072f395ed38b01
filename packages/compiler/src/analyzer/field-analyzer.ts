import { DiagnosticCategories, type DiagnosticSpan } from '@protoyard/core';

import { SchemaDiagnosticCodes } from '../diagnostics/codes.js';
import type { IssueReporter } from '../diagnostics/issue-reporter.js';
import {
  isReferentialAction,
  REFERENTIAL_ACTIONS,
  type FieldScope,
} from '../definitions/model-definitions.js';
import { describeType, type TypeDefinition } from '../definitions/type-definition.js';
import {
  readString,
  toPointer,
  type MappingEntry,
  type ParsedSchemaDocument,
} from '../document/schema-document.js';
import type { DefaultAnnotation, FieldDraft, RelationAnnotation, SpannedValue } from './analyzed-entity.js';
import { checkDefaultValue } from './default-values.js';
import {
  parseFieldExpression,
  quoteList,
  type DefaultAnnotationKey,
  type DefaultFieldAnnotation,
  type ExpressionSegment,
  type FieldAnnotation,
  type RelationParameter,
  type RelationParameterKey,
} from './field-expression.js';
import { buildTypeDefinition } from './type-builder.js';

export const FIELD_NAME_PATTERN = /^[a-z][A-Za-z0-9]*$/;

export interface FieldAnalysisContext {
  readonly document: ParsedSchemaDocument;
  readonly report: IssueReporter;
  readonly kind: 'class' | 'exception';
  readonly hasTable: boolean;
}

/**
 * Turns one `fields` entry into a draft. Problems are reported against the offending clause;
 * `undefined` means the field is left out of the model.
 *
 * @param entry - Entry of the `fields` mapping.
 * @param context - Document and entity the field belongs to.
 * @returns The field draft, or `undefined` when the name or type is unusable.
 */
export function analyzeField(entry: MappingEntry, context: FieldAnalysisContext): FieldDraft | undefined {
  const { document, report } = context;
  const pointer = toPointer('fields', entry.key);

  if (!FIELD_NAME_PATTERN.test(entry.key)) {
    report({
      message: `The field name "${entry.key}" must be a valid lowerCamelCase name.`,
      code: SchemaDiagnosticCodes.invalidFieldName,
      category: DiagnosticCategories.field,
      span: entry.keySpan,
      pointer,
    });
    return undefined;
  }

  const expression = readString(entry.value);
  if (expression === undefined || entry.value.kind !== 'scalar') {
    report({
      message: `The field "${entry.key}" must be declared with a type string.`,
      code: SchemaDiagnosticCodes.invalidFieldType,
      category: DiagnosticCategories.field,
      span: entry.value.span,
      pointer,
    });
    return undefined;
  }

  const { contentOffset, span: valueSpan } = entry.value;
  const spanOf = (segment: { readonly start: number; readonly end: number }): DiagnosticSpan =>
    contentOffset === undefined
      ? valueSpan
      : document.spanOf(contentOffset + segment.start, contentOffset + segment.end);

  const parsed = parseFieldExpression(expression);
  for (const issue of parsed.issues) {
    report({
      message: issue.message,
      code: parsed.type ? SchemaDiagnosticCodes.invalidAnnotation : SchemaDiagnosticCodes.invalidFieldType,
      category: DiagnosticCategories.field,
      span: spanOf(issue),
      pointer,
    });
  }
  if (!parsed.type) {
    return undefined;
  }

  const typeSpan = spanOf(parsed.typeSegment);
  const type = buildTypeDefinition(parsed.type, (message, offending) => {
    report({
      message,
      code: SchemaDiagnosticCodes.invalidFieldType,
      category: DiagnosticCategories.field,
      span: spanOf(offending),
      pointer,
    });
  });
  if (!type) {
    return undefined;
  }

  if (context.kind === 'class' && context.hasTable && entry.key === 'id' && !isValidIdType(type)) {
    report({
      message: 'The "id" field must be of type "int" or "UuidValue".',
      code: SchemaDiagnosticCodes.invalidIdField,
      category: DiagnosticCategories.field,
      span: typeSpan,
      pointer,
    });
    return undefined;
  }

  const annotations = applyAnnotations(parsed.annotations, type, context, pointer, spanOf);

  return {
    name: entry.key,
    pointer,
    nameSpan: entry.keySpan,
    typeSpan,
    type,
    scope: annotations.scope,
    shouldPersist: annotations.shouldPersist,
    origin: 'declared',
    ...(annotations.persistSpan ? { persistSpan: annotations.persistSpan } : {}),
    ...(annotations.relation ? { relationAnnotation: annotations.relation } : {}),
    ...(annotations.defaultModel ? { defaultModel: annotations.defaultModel } : {}),
    ...(annotations.defaultPersist ? { defaultPersist: annotations.defaultPersist } : {}),
    ...(entry.documentation ? { documentation: entry.documentation } : {}),
  };
}

function isValidIdType(type: TypeDefinition): boolean {
  return type.category === 'scalar' && (type.name === 'int' || type.name === 'UuidValue');
}

interface AppliedAnnotations {
  readonly scope: FieldScope;
  readonly shouldPersist: boolean;
  readonly persistSpan?: DiagnosticSpan;
  readonly relation?: RelationAnnotation;
  readonly defaultModel?: DefaultAnnotation;
  readonly defaultPersist?: DefaultAnnotation;
}

function applyAnnotations(
  annotations: readonly FieldAnnotation[],
  type: TypeDefinition,
  context: FieldAnalysisContext,
  pointer: string,
  spanOf: (segment: ExpressionSegment) => DiagnosticSpan,
): AppliedAnnotations {
  const { report } = context;
  const annotationIssue = (message: string, segment: ExpressionSegment) => {
    report({
      message,
      code: SchemaDiagnosticCodes.invalidAnnotation,
      category: DiagnosticCategories.field,
      span: spanOf(segment),
      pointer,
    });
  };
  const defaultIssue = (message: string, segment: ExpressionSegment) => {
    report({
      message,
      code: SchemaDiagnosticCodes.invalidDefaultValue,
      category: DiagnosticCategories.field,
      span: spanOf(segment),
      pointer,
    });
  };

  let scope: FieldScope = 'all';
  let persist: boolean | undefined;
  let persistSpan: DiagnosticSpan | undefined;
  let relation: RelationAnnotation | undefined;
  const defaults: Partial<Record<DefaultAnnotationKey, DefaultFieldAnnotation>> = {};

  for (const annotation of annotations) {
    switch (annotation.kind) {
      case 'scope':
        if (context.kind === 'exception') {
          annotationIssue('The "scope" annotation is not allowed on exception fields.', annotation.segment);
          break;
        }
        scope = annotation.value;
        break;
      case 'persist':
        if (context.kind === 'exception') {
          annotationIssue('The "persist" annotation is not allowed on exception fields.', annotation.segment);
          break;
        }
        if (!context.hasTable) {
          annotationIssue(
            'The "persist" annotation requires the class to have a "table".',
            annotation.segment,
          );
          break;
        }
        persist = annotation.persist;
        persistSpan = spanOf(annotation.segment);
        break;
      case 'relation':
        if (context.kind === 'exception') {
          annotationIssue('The "relation" annotation is not allowed on exception fields.', annotation.segment);
          break;
        }
        if (!context.hasTable) {
          annotationIssue(
            'The "relation" annotation requires the class to have a "table".',
            annotation.segment,
          );
          break;
        }
        relation = buildRelationAnnotation(annotation.parameters, annotation.segment, spanOf, annotationIssue);
        break;
      case 'default':
      case 'defaultModel':
      case 'defaultPersist':
        defaults[annotation.kind] = annotation;
        break;
    }
  }

  const shouldPersist = context.kind === 'class' && context.hasTable ? (persist ?? true) : false;

  const combined = defaults.default;
  if (combined && (defaults.defaultModel || defaults.defaultPersist)) {
    defaultIssue(
      'The "default" annotation cannot be combined with "defaultModel" or "defaultPersist".',
      combined.segment,
    );
  }

  const checked = (annotation: DefaultFieldAnnotation | undefined, key: string) => {
    if (!annotation) {
      return undefined;
    }
    const result = checkDefaultValue(type, annotation.value, key);
    if (result.kind === 'invalid') {
      defaultIssue(result.message, annotation.segment);
      return undefined;
    }
    return { value: annotation.value, span: spanOf(annotation.segment) } satisfies DefaultAnnotation;
  };

  let defaultModel = checked(defaults.defaultModel, 'defaultModel');
  let defaultPersist: DefaultAnnotation | undefined;

  const persistAnnotation = defaults.defaultPersist;
  if (persistAnnotation) {
    if (!context.hasTable || context.kind !== 'class') {
      defaultIssue('The "defaultPersist" annotation requires the class to have a "table".', persistAnnotation.segment);
    } else if (!shouldPersist) {
      defaultIssue('The "defaultPersist" annotation cannot be used on a field that is not persisted.', persistAnnotation.segment);
    } else if (!type.nullable) {
      defaultIssue(
        `The "defaultPersist" annotation requires a nullable type, found "${describeType(type)}".`,
        persistAnnotation.segment,
      );
    } else {
      defaultPersist = checked(persistAnnotation, 'defaultPersist');
    }
  }

  if (combined && !defaults.defaultModel && !defaults.defaultPersist) {
    const value = checked(combined, 'default');
    if (value) {
      defaultModel = value;
      if (shouldPersist) {
        defaultPersist = value;
      }
    }
  }

  return {
    scope,
    shouldPersist,
    ...(persistSpan ? { persistSpan } : {}),
    ...(relation ? { relation } : {}),
    ...(defaultModel ? { defaultModel } : {}),
    ...(defaultPersist ? { defaultPersist } : {}),
  };
}

function buildRelationAnnotation(
  parameters: readonly RelationParameter[],
  segment: ExpressionSegment,
  spanOf: (segment: ExpressionSegment) => DiagnosticSpan,
  issue: (message: string, segment: ExpressionSegment) => void,
): RelationAnnotation {
  const collected: Partial<Record<RelationParameterKey, SpannedValue<string>>> = {};

  for (const parameter of parameters) {
    const value = parameter.value ?? '';
    if ((parameter.key === 'onDelete' || parameter.key === 'onUpdate') && !isReferentialAction(value)) {
      issue(
        `The "${parameter.key}" value "${value}" is not valid. Valid values are ${quoteList(REFERENTIAL_ACTIONS)}.`,
        parameter.segment,
      );
      continue;
    }
    collected[parameter.key] = { value, span: spanOf(parameter.segment) };
  }

  return { span: spanOf(segment), parameters: collected };
}
