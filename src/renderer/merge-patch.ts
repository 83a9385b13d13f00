import { isObject } from '@/utils/is-object';

/**
 * JSON merge patch (RFC 7386): objects merge recursively, `null` removes a key and any other
 * value, lists included, replaces the target outright.
 */
export const mergePatch = (target: unknown, patch: unknown): unknown => {
  if (!isObject(patch)) {
    return structuredClone(patch);
  }

  const result: Record<string, unknown> = isObject(target) ? { ...target } : {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      result[key] = mergePatch(result[key], value);
    }
  }
  return result;
};
