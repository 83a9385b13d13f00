import { isObject } from './is-object';

export type CompareOptions = {
  /** A key missing on one side equals an `undefined` value on the other. */
  allowMissingAsUndefined?: boolean;
  /** Empty maps and lists equal a missing key; the API server drops them on write. */
  emptyAsMissing?: boolean;
};

const isEmpty = (value: unknown): boolean =>
  (Array.isArray(value) && value.length === 0) || (isObject(value) && Object.keys(value).length === 0);

export function deepCompare(obj1: unknown, obj2: unknown, options: CompareOptions = {}): boolean {
  if (obj1 === obj2) {
    return true;
  }
  if (options.emptyAsMissing && (obj1 === undefined || isEmpty(obj1)) && (obj2 === undefined || isEmpty(obj2))) {
    return true;
  }
  if (Array.isArray(obj1) && Array.isArray(obj2)) {
    return arraysEqual(obj1, obj2, options);
  }
  if (isObject(obj1) && isObject(obj2)) {
    return objectsEqual(obj1, obj2, options);
  }

  return false;
}

function arraysEqual(arr1: unknown[], arr2: unknown[], options: CompareOptions): boolean {
  if (arr1.length !== arr2.length) {
    return false;
  }
  return arr1.every((item, index) => deepCompare(item, arr2[index], options));
}

function objectsEqual(obj1: Record<string, unknown>, obj2: Record<string, unknown>, options: CompareOptions): boolean {
  const allKeys = new Set([...Object.keys(obj1), ...Object.keys(obj2)]);

  for (const key of allKeys) {
    const val1 = obj1[key];
    const val2 = obj2[key];
    const missing = !(key in obj1) || !(key in obj2);

    if (missing && options.allowMissingAsUndefined && val1 === undefined && val2 === undefined) {
      continue;
    }
    if (missing && options.emptyAsMissing && (val1 === undefined || isEmpty(val1)) && (val2 === undefined || isEmpty(val2))) {
      continue;
    }

    if (!deepCompare(val1, val2, options)) {
      return false;
    }
  }

  return true;
}
