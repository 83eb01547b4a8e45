/**
 * Calculates the smoothing factor of an exponentially decayed rate.
 * @param tickSeconds Seconds between two ticks
 * @param windowMinutes Length of the averaging window in minutes
 * @returns Weight given to the newest instantaneous rate
 */
export const calculateAlpha = (
  tickSeconds: number,
  windowMinutes: number
): number => 1 - Math.exp(-tickSeconds / (windowMinutes * 60));

/**
 * Converts the events accumulated during one tick into a per-second rate
 * @param uncounted Events marked since the previous tick
 * @param tickSeconds Seconds between two ticks
 * @returns Events per second
 */
export const calculateInstantaneousRate = (
  uncounted: number,
  tickSeconds: number
): number => uncounted / tickSeconds;

/**
 * Moves the current rate towards the instantaneous rate by `alpha`.
 * @param current Previous decayed rate
 * @param instantaneous Rate observed during the last tick
 * @param alpha Smoothing factor, see {@link calculateAlpha}
 * @returns The new decayed rate
 */
export const applyDecay = (
  current: number,
  instantaneous: number,
  alpha: number
): number => current + alpha * (instantaneous - current);
