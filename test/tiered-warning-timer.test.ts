import { describe, it, expect } from 'vitest';
import { TieredWarningTimer, selectWarningThresholds } from '../src/tiered-warning-timer.js';

const MINUTE = 60_000;

/** Poll every 30s from 0 to the target and collect the warnings fired */
function collectWarnings(timer: TieredWarningTimer, targetAt: number): number[] {
  const fired: number[] = [];
  for (let now = 0; now <= targetAt; now += 30_000) {
    const poll = timer.poll(targetAt, now);
    if (poll.warning !== null) fired.push(poll.warning);
    if (poll.due) break;
  }
  return fired;
}

describe('selectWarningThresholds', () => {
  it('should pick tiers from the original delay', () => {
    expect(selectWarningThresholds(20 * MINUTE)).toEqual([10, 5, 1]);
    expect(selectWarningThresholds(10 * MINUTE)).toEqual([5, 1]);
    expect(selectWarningThresholds(3 * MINUTE)).toEqual([1]);
  });

  it('should treat the boundaries as exclusive', () => {
    expect(selectWarningThresholds(14 * MINUTE)).toEqual([5, 1]);
    expect(selectWarningThresholds(5 * MINUTE)).toEqual([1]);
    expect(selectWarningThresholds(0)).toEqual([1]);
  });
});

describe('TieredWarningTimer', () => {
  it('should fire every tier once, largest first, over a full countdown', () => {
    const timer = new TieredWarningTimer([10, 5, 1]);
    expect(collectWarnings(timer, 20 * MINUTE)).toEqual([10, 5, 1]);
    expect([...timer.sent].sort((a, b) => a - b)).toEqual([1, 5, 10]);
  });

  it('should never fire a threshold twice', () => {
    const timer = new TieredWarningTimer([5, 1]);
    const target = 10 * MINUTE;

    expect(timer.poll(target, 5 * MINUTE).warning).toBe(5);
    expect(timer.poll(target, 5 * MINUTE + 1000).warning).toBeNull();
    expect(timer.poll(target, 6 * MINUTE).warning).toBeNull();
  });

  it('should report due without a warning once the target is reached', () => {
    const timer = new TieredWarningTimer([1]);
    expect(timer.poll(MINUTE, MINUTE)).toEqual({ warning: null, due: true });
    expect(timer.sent.size).toBe(0);
  });

  it('should silently skip tiers whose window already passed', () => {
    const timer = new TieredWarningTimer([10, 5, 1]);
    const target = 20 * MINUTE;

    // 2.5 minutes left: the 10 and 5 windows are gone
    expect(timer.poll(target, target - 2.5 * MINUTE).warning).toBeNull();
    expect(timer.sent.has(10)).toBe(true);
    expect(timer.sent.has(5)).toBe(true);

    expect(timer.poll(target, target - 0.5 * MINUTE).warning).toBe(1);
  });

  it('should announce only the smallest tier when windows overlap', () => {
    const timer = new TieredWarningTimer([5, 1], 10);
    expect(timer.poll(MINUTE, 30_000).warning).toBe(1);
    expect(timer.sent.has(5)).toBe(true);
  });

  it('should dedupe and sort thresholds descending', () => {
    expect(new TieredWarningTimer([1, 15, 5, 5]).thresholds).toEqual([15, 5, 1]);
  });

  it('should fire again after reset()', () => {
    const timer = new TieredWarningTimer([1]);
    expect(timer.poll(MINUTE, 30_000).warning).toBe(1);
    timer.reset();
    expect(timer.poll(MINUTE, 40_000).warning).toBe(1);
  });
});
