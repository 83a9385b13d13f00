import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`; rejects with an AbortError when the signal fires first. */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export const isAbortError = (err: unknown): boolean => err instanceof Error && err.name === 'AbortError';
