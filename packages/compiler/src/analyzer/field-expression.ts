import type { FieldScope } from '../definitions/model-definitions.js';
import { findClosestMatch } from './suggestions.js';
import { parseTypeExpression, type TypeExpression } from './type-expression.js';

/** Trimmed slice of an expression; offsets are relative to the full expression text. */
export interface ExpressionSegment {
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

export interface ExpressionIssue {
  readonly message: string;
  readonly start: number;
  readonly end: number;
}

export const RELATION_PARAMETER_KEYS = Object.freeze([
  'name',
  'parent',
  'field',
  'onDelete',
  'onUpdate',
  'optional',
] as const);

export type RelationParameterKey = (typeof RELATION_PARAMETER_KEYS)[number];

export interface RelationParameter {
  readonly key: RelationParameterKey;
  readonly value?: string;
  readonly segment: ExpressionSegment;
}

export const ANNOTATION_KEYS = Object.freeze([
  'relation',
  'default',
  'defaultModel',
  'defaultPersist',
  'scope',
  'persist',
] as const);

export type DefaultAnnotationKey = 'default' | 'defaultModel' | 'defaultPersist';

export type FieldAnnotation =
  | {
      readonly kind: 'relation';
      readonly parameters: readonly RelationParameter[];
      readonly segment: ExpressionSegment;
    }
  | {
      readonly kind: DefaultAnnotationKey;
      readonly value: string;
      readonly segment: ExpressionSegment;
    }
  | { readonly kind: 'scope'; readonly value: FieldScope; readonly segment: ExpressionSegment }
  | { readonly kind: 'persist'; readonly persist: boolean; readonly segment: ExpressionSegment };

export type DefaultFieldAnnotation = Extract<FieldAnnotation, { readonly kind: DefaultAnnotationKey }>;

export interface ParsedFieldExpression {
  /** Parsed type with offsets relative to the full expression. */
  readonly type?: TypeExpression;
  readonly typeSegment: ExpressionSegment;
  readonly annotations: readonly FieldAnnotation[];
  readonly issues: readonly ExpressionIssue[];
}

const SCOPES: readonly FieldScope[] = ['all', 'serverOnly', 'none'];

/**
 * Splits `text` at separators that are not nested in `<>`, `()` or quotes.
 *
 * @param text - Text to split.
 * @param offset - Offset added to every segment position.
 * @param separator - Single separator character.
 * @returns Trimmed segments in order, including empty ones.
 */
export function splitTopLevel(text: string, offset = 0, separator = ','): ExpressionSegment[] {
  const segments: ExpressionSegment[] = [];
  let depth = 0;
  let quote: string | undefined;
  let segmentStart = 0;

  for (let index = 0; index <= text.length; index++) {
    const character = text.charAt(index);
    if (index < text.length) {
      if (quote) {
        if (character === quote) {
          quote = undefined;
        }
        continue;
      }
      if (character === "'" || character === '"') {
        quote = character;
        continue;
      }
      if (character === '<' || character === '(') {
        depth++;
        continue;
      }
      if ((character === '>' || character === ')') && depth > 0) {
        depth--;
        continue;
      }
      if (character !== separator || depth > 0) {
        continue;
      }
    }
    segments.push(createSegment(text, segmentStart, index, offset));
    segmentStart = index + 1;
  }

  return segments;
}

function createSegment(text: string, start: number, end: number, offset: number): ExpressionSegment {
  const raw = text.slice(start, end);
  const leading = raw.length - raw.trimStart().length;
  const trimmed = raw.trim();
  return {
    text: trimmed,
    start: offset + start + leading,
    end: offset + start + leading + trimmed.length,
  };
}

/**
 * Parses a field expression `type (',' annotation)*`.
 *
 * Every malformed annotation yields its own issue; parsing continues past it.
 *
 * @param text - The field's expression string.
 * @returns The parsed type, annotations and issues.
 */
export function parseFieldExpression(text: string): ParsedFieldExpression {
  const issues: ExpressionIssue[] = [];
  const [typeSegment = createSegment(text, 0, text.length, 0), ...annotationSegments] =
    splitTopLevel(text);

  let type: TypeExpression | undefined;
  if (typeSegment.text.length === 0) {
    issues.push({
      message: 'The field must declare a type.',
      start: typeSegment.start,
      end: typeSegment.end,
    });
  } else {
    const result = parseTypeExpression(typeSegment.text);
    if (result.ok) {
      type = shiftTypeExpression(result.expression, typeSegment.start);
    } else {
      issues.push({
        message: result.error.message,
        start: typeSegment.start + result.error.start,
        end: typeSegment.start + result.error.end,
      });
    }
  }

  const annotations: FieldAnnotation[] = [];
  const seen = new Set<string>();
  for (const segment of annotationSegments) {
    const annotation = parseAnnotation(segment, issues);
    if (!annotation) {
      continue;
    }
    const identity = annotation.kind;
    if (seen.has(identity)) {
      issues.push({
        message: `The "${identity}" annotation is declared more than once.`,
        start: segment.start,
        end: segment.end,
      });
      continue;
    }
    seen.add(identity);
    annotations.push(annotation);
  }

  return {
    typeSegment,
    annotations,
    issues,
    ...(type ? { type } : {}),
  };
}

function shiftTypeExpression(expression: TypeExpression, offset: number): TypeExpression {
  return {
    ...expression,
    start: expression.start + offset,
    end: expression.end + offset,
    generics: expression.generics.map((generic) => shiftTypeExpression(generic, offset)),
  };
}

function splitAssignment(segment: ExpressionSegment): { key: string; value?: string } {
  const equals = segment.text.indexOf('=');
  if (equals === -1) {
    return { key: segment.text };
  }
  return { key: segment.text.slice(0, equals).trim(), value: segment.text.slice(equals + 1).trim() };
}

function parseAnnotation(
  segment: ExpressionSegment,
  issues: ExpressionIssue[],
): FieldAnnotation | undefined {
  const issue = (message: string) => {
    issues.push({ message, start: segment.start, end: segment.end });
  };

  if (segment.text.length === 0) {
    issue('Empty annotations are not allowed.');
    return undefined;
  }

  if (segment.text === 'persist' || segment.text === '!persist') {
    return { kind: 'persist', persist: segment.text === 'persist', segment };
  }

  if (segment.text === 'relation' || segment.text.startsWith('relation(')) {
    return parseRelationAnnotation(segment, issues);
  }

  const { key, value } = splitAssignment(segment);
  switch (key) {
    case 'default':
    case 'defaultModel':
    case 'defaultPersist': {
      if (value === undefined || value.length === 0) {
        issue(`The "${key}" annotation requires a value.`);
        return undefined;
      }
      return { kind: key, value, segment };
    }
    case 'scope': {
      const scope = SCOPES.find((candidate) => candidate === value);
      if (!scope) {
        issue(`The "scope" value "${value ?? ''}" is not valid. Valid values are ${quoteList(SCOPES)}.`);
        return undefined;
      }
      return { kind: 'scope', value: scope, segment };
    }
    default: {
      const suggestion = findClosestMatch(key, ANNOTATION_KEYS);
      issue(
        suggestion
          ? `The field option "${key}" is not valid. Did you mean "${suggestion}"?`
          : `The field option "${key}" is not valid. Valid options are ${quoteList(ANNOTATION_KEYS)}.`,
      );
      return undefined;
    }
  }
}

function parseRelationAnnotation(
  segment: ExpressionSegment,
  issues: ExpressionIssue[],
): FieldAnnotation | undefined {
  if (segment.text === 'relation') {
    return { kind: 'relation', parameters: [], segment };
  }
  if (!segment.text.endsWith(')')) {
    issues.push({
      message: 'The "relation" annotation is missing a closing ")".',
      start: segment.start,
      end: segment.end,
    });
    return undefined;
  }

  const openParen = 'relation('.length;
  const inner = segment.text.slice(openParen, -1);
  const parameters: RelationParameter[] = [];
  const seen = new Set<string>();

  for (const parameterSegment of splitTopLevel(inner, segment.start + openParen)) {
    const issue = (message: string) => {
      issues.push({ message, start: parameterSegment.start, end: parameterSegment.end });
    };
    if (parameterSegment.text.length === 0) {
      issue('Empty relation parameters are not allowed.');
      continue;
    }

    const { key, value } = splitAssignment(parameterSegment);
    const known = RELATION_PARAMETER_KEYS.find((candidate) => candidate === key);
    if (!known) {
      const suggestion = findClosestMatch(key, RELATION_PARAMETER_KEYS);
      issue(
        suggestion
          ? `The relation parameter "${key}" is not valid. Did you mean "${suggestion}"?`
          : `The relation parameter "${key}" is not valid. Valid parameters are ${quoteList(RELATION_PARAMETER_KEYS)}.`,
      );
      continue;
    }
    if (seen.has(known)) {
      issue(`The relation parameter "${known}" is declared more than once.`);
      continue;
    }
    seen.add(known);

    if (known === 'optional') {
      if (value !== undefined) {
        issue('The relation parameter "optional" does not take a value.');
        continue;
      }
      parameters.push({ key: known, segment: parameterSegment });
      continue;
    }
    if (value === undefined || value.length === 0) {
      issue(`The relation parameter "${known}" requires a value.`);
      continue;
    }
    parameters.push({ key: known, value, segment: parameterSegment });
  }

  return { kind: 'relation', parameters, segment };
}

/**
 * Formats values as `"a", "b" or "c"`.
 */
export function quoteList(values: readonly string[]): string {
  const quoted = values.map((value) => `"${value}"`);
  if (quoted.length <= 1) {
    return quoted.join('');
  }
  return `${quoted.slice(0, -1).join(', ')} or ${quoted.at(-1) ?? ''}`;
}
