import { describe, expect, it } from 'vitest';
import { SIMULATED_MAX, SIMULATED_MIN, simulateReadingValue } from './reading-simulator';

describe('simulateReadingValue', () => {
  it('maps the random source onto the simulated range', () => {
    expect(simulateReadingValue(() => 0)).toBe(SIMULATED_MIN);
    expect(simulateReadingValue(() => 0.5)).toBe(52.5);
    expect(simulateReadingValue(() => 0.123456)).toBe(20.49);
  });

  it('stays within bounds for the default source', () => {
    for (let i = 0; i < 200; i++) {
      const value = simulateReadingValue();
      expect(value).toBeGreaterThanOrEqual(SIMULATED_MIN);
      expect(value).toBeLessThanOrEqual(SIMULATED_MAX);
    }
  });
});
