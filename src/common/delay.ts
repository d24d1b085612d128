import { setTimeout as sleep } from 'timers/promises';

/**
 * Waits `ms` milliseconds. Resolves true when the full delay elapsed and
 * false when `signal` aborted it.
 */
export const delay = async (
  ms: number,
  signal?: AbortSignal,
): Promise<boolean> => {
  if (signal?.aborted) {
    return false;
  }

  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
};
