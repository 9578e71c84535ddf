import { MAX_TIMER_DELAY_MS, timeoutToDelay } from '../src/index.js';

describe('timeoutToDelay', () => {
  it('converts seconds to milliseconds', () => {
    expect(timeoutToDelay(1.5)).toBe(1500);
    expect(timeoutToDelay(0)).toBe(0);
  });

  it('clamps delays timers cannot hold', () => {
    expect(timeoutToDelay(3_000_000)).toBe(MAX_TIMER_DELAY_MS);
    expect(MAX_TIMER_DELAY_MS).toBe(2_147_483_647);
  });
});
