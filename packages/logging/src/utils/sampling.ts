/**
 * Sampling utilities for high-volume log levels
 */

/**
 * Check if an event should be logged for the given sample rate
 * @param sampleRate - Rate between 0 and 1, where 1 means log everything
 */
export function shouldSample(
  sampleRate: number,
  random: () => number = Math.random,
): boolean {
  if (sampleRate >= 1) {
    return true;
  }

  if (sampleRate <= 0) {
    return false;
  }

  return random() < sampleRate;
}

/**
 * Parse sample rate from an environment string, clamped to 0..1
 */
export function parseSampleRate(value?: string): number {
  if (!value) return 1;

  const rate = parseFloat(value);
  if (isNaN(rate)) return 1;

  return Math.max(0, Math.min(1, rate));
}
