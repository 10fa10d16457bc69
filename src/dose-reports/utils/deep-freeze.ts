/**
 * Recursively freezes plain objects and arrays. RegExp instances are left as
 * they are.
 */
export function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (
      typeof nested === 'object' &&
      nested !== null &&
      !(nested instanceof RegExp) &&
      !Object.isFrozen(nested)
    ) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
