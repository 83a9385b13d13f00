import { deepCompare, type CompareOptions } from './deep-compare';
import { isObject } from './is-object';

/**
 * Returns the part of `desired` that differs from `actual`. Keys that exist only on `actual`
 * are ignored, so fields populated by the server never count as a change.
 */
export function filterChanges(
  desired: Record<string, unknown>,
  actual: Record<string, unknown>,
  options: CompareOptions = { allowMissingAsUndefined: true, emptyAsMissing: true },
): Record<string, unknown> {
  const changes: Record<string, unknown> = {};

  for (const key of Object.keys(desired)) {
    const desiredValue = desired[key];
    const actualValue = actual[key];

    if (desiredValue === undefined) {
      continue;
    }

    if (deepCompare(desiredValue, actualValue, options) || containedIn(desiredValue, actualValue, options)) {
      continue;
    }

    if (isObject(desiredValue) && isObject(actualValue)) {
      const nested = filterChanges(desiredValue, actualValue, options);
      if (Object.keys(nested).length > 0) {
        changes[key] = nested;
      }
    } else {
      changes[key] = desiredValue;
    }
  }

  return changes;
}

/**
 * Keys that `previous` set and `desired` no longer declares, limited to those still present on
 * `actual`. Each removal is marked with null, as in a JSON merge patch.
 */
export function removedFields(
  previous: Record<string, unknown>,
  desired: Record<string, unknown>,
  actual: Record<string, unknown>,
): Record<string, unknown> {
  const removed: Record<string, unknown> = {};

  for (const key of Object.keys(previous)) {
    const previousValue = previous[key];
    const desiredValue = desired[key];
    const actualValue = actual[key];

    if (actualValue === undefined) {
      continue;
    }

    if (desiredValue === undefined) {
      removed[key] = null;
    } else if (isObject(previousValue) && isObject(desiredValue) && isObject(actualValue)) {
      const nested = removedFields(previousValue, desiredValue, actualValue);
      if (Object.keys(nested).length > 0) {
        removed[key] = nested;
      }
    }
  }

  return removed;
}

/** List items match when each desired item is contained in the live item at the same index. */
function containedIn(desired: unknown, actual: unknown, options: CompareOptions): boolean {
  if (!Array.isArray(desired) || !Array.isArray(actual) || desired.length !== actual.length) {
    return false;
  }
  return desired.every((item, index) => {
    const other = actual[index];
    if (isObject(item) && isObject(other)) {
      return Object.keys(filterChanges(item, other, options)).length === 0;
    }
    return deepCompare(item, other, options) || containedIn(item, other, options);
  });
}

/** The part of `actual` that `desired` declares, shaped like `desired`. */
export function projectOnto(desired: unknown, actual: unknown): unknown {
  if (isObject(desired) && isObject(actual)) {
    return Object.fromEntries(
      Object.keys(desired)
        .filter((key) => key in actual)
        .map((key) => [key, projectOnto(desired[key], actual[key])]),
    );
  }
  if (Array.isArray(desired) && Array.isArray(actual)) {
    return actual.map((item, index) => (index < desired.length ? projectOnto(desired[index], item) : item));
  }
  return actual;
}
