/**
 * Recursively freezes plain objects and arrays.
 *
 * @param value - The value to freeze.
 * @returns The same reference, frozen.
 */
export function deepFreeze<T>(value: T): T {
  if (!value || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  for (const entry of Object.values(value)) {
    deepFreeze(entry);
  }
  Object.freeze(value);
  return value;
}
