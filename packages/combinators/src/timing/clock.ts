import { performance } from 'node:perf_hooks';

/**
 * Zero-argument timestamp source. Values must be non-decreasing and share one unit;
 * the built-in clocks use seconds.
 */
export type Clock = () => number;

/** High-resolution wall clock, unaffected by system clock adjustments. */
export const monotonicClock: Clock = () => performance.now() / 1000;

/** User plus system CPU time consumed by this process. */
export const cpuClock: Clock = () => {
  const usage = process.cpuUsage();
  return (usage.user + usage.system) / 1_000_000;
};
