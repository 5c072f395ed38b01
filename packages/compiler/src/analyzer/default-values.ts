import { describeType, type TypeDefinition } from '../definitions/type-definition.js';

export type DefaultValueCheck =
  | { readonly kind: 'valid' }
  | { readonly kind: 'deferred' }
  | { readonly kind: 'invalid'; readonly message: string };

const VALID: DefaultValueCheck = { kind: 'valid' };

const ISO_UTC_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?Z$/;
const UUID = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
const INTEGER = /^-?\d+$/;
const DOUBLE = /^-?\d+(?:\.\d+)?$/;
const DURATION = /^(?:(\d+)d)?\s*(?:(\d+)h)?\s*(?:(\d+)min)?\s*(?:(\d+)s)?\s*(?:(\d+)ms)?$/;

/**
 * Removes one pair of matching single or double quotes.
 *
 * @param value - Raw default text.
 * @returns The unquoted text, or `undefined` when the value is not quoted.
 */
export function unquote(value: string): string | undefined {
  if (value.length < 2) {
    return undefined;
  }
  const first = value.charAt(0);
  if ((first === "'" || first === '"') && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return undefined;
}

/**
 * Checks a default value against the field's type. Enum and unresolved entity types are
 * deferred until every document has been read.
 *
 * @param type - Declared field type.
 * @param value - Default value text as written after `=`.
 * @param key - Annotation the value came from, used in messages.
 * @returns The outcome of the check.
 */
export function checkDefaultValue(type: TypeDefinition, value: string, key: string): DefaultValueCheck {
  if (type.category === 'unresolved') {
    return { kind: 'deferred' };
  }
  if (type.category === 'entity') {
    return type.entityKind === 'enum'
      ? { kind: 'deferred' }
      : unsupported(type, key);
  }
  if (type.category !== 'scalar') {
    return unsupported(type, key);
  }

  const invalid = (expectation: string): DefaultValueCheck => ({
    kind: 'invalid',
    message: `The "${key}" value "${value}" is not valid for the type "${describeType(type)}". ${expectation}`,
  });

  switch (type.name) {
    case 'DateTime':
      return value === 'now' || isUtcTimestamp(value)
        ? VALID
        : invalid('Use "now" or a UTC timestamp such as "2024-05-01T10:00:00Z".');
    case 'UuidValue': {
      if (value === 'random' || value === 'random_v7') {
        return VALID;
      }
      const unquoted = unquote(value);
      return unquoted !== undefined && UUID.test(unquoted)
        ? VALID
        : invalid('Use "random", "random_v7" or a quoted UUID.');
    }
    case 'int':
      return INTEGER.test(value) ? VALID : invalid('Use an integer.');
    case 'double':
      return DOUBLE.test(value) ? VALID : invalid('Use a number.');
    case 'bool':
      return value === 'true' || value === 'false' ? VALID : invalid('Use "true" or "false".');
    case 'String':
      return unquote(value) === undefined ? invalid('Use a quoted string.') : VALID;
    case 'BigInt': {
      const unquoted = unquote(value);
      return unquoted !== undefined && INTEGER.test(unquoted)
        ? VALID
        : invalid('Use a quoted integer.');
    }
    case 'Duration':
      return isDuration(value) ? VALID : invalid('Use a duration such as "1d 2h 3min 4s 5ms".');
    default:
      return unsupported(type, key);
  }
}

function unsupported(type: TypeDefinition, key: string): DefaultValueCheck {
  return {
    kind: 'invalid',
    message: `The "${key}" annotation is not supported for the type "${describeType(type)}".`,
  };
}

function isUtcTimestamp(value: string): boolean {
  return ISO_UTC_TIMESTAMP.test(value) && !Number.isNaN(Date.parse(value));
}

function isDuration(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length > 0 && DURATION.test(trimmed);
}

const DURATION_UNITS_MS = [86_400_000, 3_600_000, 60_000, 1000, 1] as const;

/**
 * Converts a valid duration default such as `1d 2h` to milliseconds.
 *
 * @returns The total, or `undefined` when the text is not a duration.
 */
export function durationToMilliseconds(value: string): number | undefined {
  const trimmed = value.trim();
  const match = trimmed.length > 0 ? DURATION.exec(trimmed) : null;
  if (!match) {
    return undefined;
  }
  return DURATION_UNITS_MS.reduce((total, unit, index) => total + Number(match[index + 1] ?? 0) * unit, 0);
}
