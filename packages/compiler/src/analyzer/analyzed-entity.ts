import type { DiagnosticSpan } from '@protoyard/core';

import type {
  ClassDefinition,
  EnumDefinition,
  ExceptionDefinition,
  FieldScope,
  IndexDefinition,
  RelationDefinition,
} from '../definitions/model-definitions.js';
import type { TypeDefinition } from '../definitions/type-definition.js';
import type { RelationParameterKey } from './field-expression.js';

export interface SpannedValue<T> {
  readonly value: T;
  readonly span: DiagnosticSpan;
}

export interface RelationAnnotation {
  readonly span: DiagnosticSpan;
  readonly parameters: Readonly<Partial<Record<RelationParameterKey, SpannedValue<string>>>>;
}

export interface DefaultAnnotation {
  readonly value: string;
  readonly span: DiagnosticSpan;
}

/**
 * A field as written in its document, carried between pipeline stages until assembly.
 */
export interface FieldDraft {
  readonly name: string;
  readonly pointer: string;
  readonly nameSpan: DiagnosticSpan;
  readonly typeSpan: DiagnosticSpan;
  readonly type: TypeDefinition;
  readonly scope: FieldScope;
  readonly shouldPersist: boolean;
  readonly persistSpan?: DiagnosticSpan;
  readonly relationAnnotation?: RelationAnnotation;
  readonly relation?: RelationDefinition;
  readonly defaultModel?: DefaultAnnotation;
  readonly defaultPersist?: DefaultAnnotation;
  readonly documentation?: readonly string[];
  readonly origin: 'declared' | 'synthesized';
  /** Excluded from the model's serialized shape (hidden foreign keys). */
  readonly hidden?: boolean;
}

export interface IndexDraft {
  readonly name: string;
  readonly pointer: string;
  readonly nameSpan: DiagnosticSpan;
  readonly fields: readonly SpannedValue<string>[];
  readonly fieldsSpan: DiagnosticSpan;
  readonly type?: SpannedValue<string>;
  readonly unique: boolean;
  readonly distanceFunction?: SpannedValue<string>;
  readonly parameters?: readonly (SpannedValue<number> & { readonly key: string })[];
  readonly parametersSpan?: DiagnosticSpan;
}

export interface AnalyzedEntityBase {
  readonly nameSpan: DiagnosticSpan;
  readonly fields: readonly FieldDraft[];
}

/**
 * Stage one output: the entity header plus drafts awaiting cross-document resolution.
 * `definition` holds no fields or indexes until assembly.
 */
export interface AnalyzedClass extends AnalyzedEntityBase {
  readonly definition: ClassDefinition;
  readonly tableSpan?: DiagnosticSpan;
  readonly indexes: readonly IndexDraft[];
  readonly resolvedIndexes?: readonly IndexDefinition[];
}

export interface AnalyzedException extends AnalyzedEntityBase {
  readonly definition: ExceptionDefinition;
}

export interface AnalyzedEnum extends AnalyzedEntityBase {
  readonly definition: EnumDefinition;
}

export type AnalyzedEntity = AnalyzedClass | AnalyzedException | AnalyzedEnum;

export function isAnalyzedClass(entity: AnalyzedEntity): entity is AnalyzedClass {
  return entity.definition.kind === 'class';
}
