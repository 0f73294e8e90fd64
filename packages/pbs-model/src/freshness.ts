import { StaleDataError } from './errors';

export const DEFAULT_MAX_AGE_SECONDS = 120;

export function nowInSeconds(now: Date = new Date()): number {
  return Math.floor(now.getTime() / 1000);
}

/**
 * Throws {@link StaleDataError} unless `timestamp` (epoch seconds) is at most
 * `maxAgeSeconds` old.
 */
export function assertFresh(
  timestamp: unknown,
  now: Date = new Date(),
  maxAgeSeconds: number = DEFAULT_MAX_AGE_SECONDS
): number {
  if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
    throw new StaleDataError('document has no timestamp', null);
  }
  const ageSeconds = now.getTime() / 1000 - timestamp;
  if (ageSeconds > maxAgeSeconds) {
    throw new StaleDataError(`document is ${Math.floor(ageSeconds)}s old`, ageSeconds);
  }
  return ageSeconds;
}

export function isFresh(timestamp: unknown, now?: Date, maxAgeSeconds?: number): boolean {
  try {
    assertFresh(timestamp, now, maxAgeSeconds);
    return true;
  } catch (error) {
    if (error instanceof StaleDataError) {
      return false;
    }
    throw error;
  }
}
