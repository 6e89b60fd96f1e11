/**
 * Telemetry simulator for running the service without field hardware.
 */

import { round2 } from '../telemetry/flow-statistics';

export const SIMULATED_MIN = 10;
export const SIMULATED_MAX = 95;

/** Uniform in [10, 95], two decimals */
export function simulateReadingValue(random: () => number = Math.random): number {
  return round2(SIMULATED_MIN + random() * (SIMULATED_MAX - SIMULATED_MIN));
}
