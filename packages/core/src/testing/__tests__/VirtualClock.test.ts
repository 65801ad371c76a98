import { VirtualClock } from '../VirtualClock';

describe('VirtualClock', () => {
  test('starts at the given time', () => {
    expect(new VirtualClock().now()).toBe(0);
    expect(new VirtualClock(1_704_067_200_000).now()).toBe(1_704_067_200_000);
  });

  test('rejects negative or non-finite start times', () => {
    expect(() => new VirtualClock(-100)).toThrow('non-negative finite number');
    expect(() => new VirtualClock(Infinity)).toThrow('non-negative finite number');
  });

  test('only moves when advanced or set', () => {
    const clock = new VirtualClock(1000);
    expect(clock.now()).toBe(1000);
    expect(clock.advance(500)).toBe(1500);
    clock.set(200);
    expect(clock.now()).toBe(200);
  });

  test('now works when detached from the instance', () => {
    const clock = new VirtualClock(10);
    const now = clock.now;
    clock.advance(5);
    expect(now()).toBe(15);
  });

  test('rejects negative advance', () => {
    const clock = new VirtualClock(10);
    expect(() => clock.advance(-1)).toThrow('non-negative finite number');
  });
});
