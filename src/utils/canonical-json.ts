import { createHash } from 'node:crypto';
import { isObject } from './is-object';

/** Recursively sorts object keys so equal values always serialize to the same bytes. */
export const canonicalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .filter((key) => value[key] !== undefined)
        .map((key) => [key, canonicalize(value[key])]),
    );
  }
  return value;
};

export const canonicalStringify = (value: unknown): string => JSON.stringify(canonicalize(value));

export const sha256 = (...parts: string[]): string => {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
    hash.update('\0');
  }
  return hash.digest('hex');
};
