import { describe, expect, it } from 'vitest';

import type { TypeDefinition } from '../definitions/type-definition.js';
import { checkDefaultValue, unquote } from './default-values.js';

function scalar(name: string, nullable = false): TypeDefinition {
  return { name, nullable, generics: [], category: 'scalar' };
}

describe('unquote', () => {
  it('strips matching quotes only', () => {
    expect(unquote("'hello'")).toBe('hello');
    expect(unquote('"hello"')).toBe('hello');
    expect(unquote('\'hello"')).toBeUndefined();
    expect(unquote('hello')).toBeUndefined();
  });
});

describe('checkDefaultValue', () => {
  it.each([
    ['DateTime', 'now'],
    ['DateTime', '2024-05-01T10:00:00Z'],
    ['DateTime', '2024-05-01T10:00:00.123Z'],
    ['UuidValue', 'random'],
    ['UuidValue', 'random_v7'],
    ['UuidValue', "'550e8400-e29b-41d4-a716-446655440000'"],
    ['int', '-42'],
    ['double', '3.5'],
    ['bool', 'false'],
    ['String', "'guest'"],
    ['BigInt', "'12345678901234567890'"],
    ['Duration', '1d 2h'],
    ['Duration', '30min 5ms'],
  ])('accepts %s default %s', (typeName, value) => {
    expect(checkDefaultValue(scalar(typeName), value, 'default')).toEqual({ kind: 'valid' });
  });

  it('rejects mismatched values with the expectation', () => {
    expect(checkDefaultValue(scalar('int'), '1.5', 'defaultModel')).toEqual({
      kind: 'invalid',
      message: 'The "defaultModel" value "1.5" is not valid for the type "int". Use an integer.',
    });
    expect(checkDefaultValue(scalar('String', true), 'guest', 'default')).toEqual({
      kind: 'invalid',
      message: 'The "default" value "guest" is not valid for the type "String?". Use a quoted string.',
    });
  });

  it.each([
    ['DateTime', 'yesterday'],
    ['DateTime', '2024-05-01 10:00:00'],
    ['UuidValue', 'not-a-uuid'],
    ['bool', 'yes'],
    ['BigInt', '12'],
    ['Duration', '2 weeks'],
  ])('rejects %s default %s', (typeName, value) => {
    expect(checkDefaultValue(scalar(typeName), value, 'default').kind).toBe('invalid');
  });

  it('rejects defaults on types without a literal form', () => {
    expect(checkDefaultValue(scalar('ByteData'), "'abc'", 'default')).toEqual({
      kind: 'invalid',
      message: 'The "default" annotation is not supported for the type "ByteData".',
    });
    expect(
      checkDefaultValue(
        { name: 'List', nullable: false, generics: [scalar('int')], category: 'container' },
        '[]',
        'default',
      ),
    ).toEqual({
      kind: 'invalid',
      message: 'The "default" annotation is not supported for the type "List<int>".',
    });
  });

  it('defers enum and unresolved types', () => {
    expect(
      checkDefaultValue({ name: 'Color', nullable: false, generics: [], category: 'unresolved' }, 'red', 'default'),
    ).toEqual({ kind: 'deferred' });
    expect(
      checkDefaultValue(
        { name: 'Color', nullable: false, generics: [], category: 'entity', entityKind: 'enum' },
        'red',
        'default',
      ),
    ).toEqual({ kind: 'deferred' });
  });
});
