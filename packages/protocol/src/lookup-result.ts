/**
 * Answer of a single module to a lookup: either the value, or a statement that the requested
 * type belongs to somebody else.
 */
export type LookupResult<T = unknown> =
  | { readonly kind: 'found'; readonly value: T }
  | { readonly kind: 'not-mine' };

export const notMine: LookupResult<never> = Object.freeze({ kind: 'not-mine' });

export function found<T>(value: T): LookupResult<T> {
  return { kind: 'found', value };
}

export function isFound<T>(result: LookupResult<T>): result is { readonly kind: 'found'; readonly value: T } {
  return result.kind === 'found';
}
