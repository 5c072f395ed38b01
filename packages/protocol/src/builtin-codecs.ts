export const BUILTIN_SCALAR_NAMES = Object.freeze(['String', 'int', 'double', 'bool', 'BigInt', 'DateTime'] as const);

export type BuiltinScalarName = (typeof BUILTIN_SCALAR_NAMES)[number];

export function isBuiltinScalarName(name: string): name is BuiltinScalarName {
  return BUILTIN_SCALAR_NAMES.some((candidate) => candidate === name);
}

function mismatch(name: BuiltinScalarName, data: unknown): TypeError {
  const shown = typeof data === 'string' ? JSON.stringify(data) : String(data);
  return new TypeError(`Cannot decode ${shown} as "${name}".`);
}

/**
 * Decodes the JSON representation of a built-in scalar.
 *
 * @throws TypeError when the data does not have the scalar's shape.
 */
export function decodeScalar(name: BuiltinScalarName, data: unknown): unknown {
  switch (name) {
    case 'String': {
      if (typeof data === 'string') {
        return data;
      }
      break;
    }
    case 'int': {
      if (typeof data === 'number' && Number.isInteger(data)) {
        return data;
      }
      break;
    }
    case 'double': {
      if (typeof data === 'number') {
        return data;
      }
      break;
    }
    case 'bool': {
      if (typeof data === 'boolean') {
        return data;
      }
      break;
    }
    case 'BigInt': {
      if (typeof data === 'string' && /^-?\d+$/.test(data)) {
        return BigInt(data);
      }
      break;
    }
    case 'DateTime': {
      if (typeof data === 'string') {
        const date = new Date(data);
        if (!Number.isNaN(date.getTime())) {
          return date;
        }
      }
      break;
    }
  }
  throw mismatch(name, data);
}

/**
 * Finds the built-in scalar a runtime value belongs to. Integral numbers are reported as `int`.
 */
export function scalarNameOf(value: unknown): BuiltinScalarName | undefined {
  switch (typeof value) {
    case 'string': {
      return 'String';
    }
    case 'number': {
      return Number.isInteger(value) ? 'int' : 'double';
    }
    case 'boolean': {
      return 'bool';
    }
    case 'bigint': {
      return 'BigInt';
    }
    default: {
      return value instanceof Date ? 'DateTime' : undefined;
    }
  }
}

export function encodeScalar(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}
