import { VirtualClock, RealClock } from '../VirtualClock';

describe('VirtualClock', () => {
  test('starts at the given time', () => {
    expect(new VirtualClock().now()).toBe(0);
    expect(new VirtualClock(1_700_000_000_000).now()).toBe(1_700_000_000_000);
  });

  test('rejects negative or infinite initial time', () => {
    expect(() => new VirtualClock(-100)).toThrow('non-negative finite number');
    expect(() => new VirtualClock(Infinity)).toThrow('non-negative finite number');
  });

  test('only moves when advanced', () => {
    const clock = new VirtualClock(1000);
    expect(clock.now()).toBe(1000);

    clock.advance(500);
    clock.advance(0);

    expect(clock.now()).toBe(1500);
  });

  test('rejects negative advance', () => {
    expect(() => new VirtualClock(1000).advance(-1)).toThrow('non-negative finite number');
  });
});

describe('RealClock', () => {
  test('returns the wall clock time', () => {
    const before = Date.now();
    const now = RealClock.now();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(Date.now());
  });
});
