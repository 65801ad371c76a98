/**
 * Manually driven time source for stale/expiry tests. Pass `clock.now` (or
 * `() => clock.now()`) wherever a component takes a `clock` option.
 *
 * ```typescript
 * const clock = new VirtualClock(Date.parse('2024-01-01T00:00:00Z'));
 * const store = new MarkerStore({ clock: clock.now });
 * clock.advance(5_000);
 * store.sweep();
 * ```
 */
export class VirtualClock {
  private currentTime: number;

  constructor(initialTime: number = 0) {
    if (!Number.isFinite(initialTime) || initialTime < 0) {
      throw new Error('Initial time must be a non-negative finite number');
    }
    this.currentTime = initialTime;
  }

  /** Bound so it can be handed out as a plain function. */
  readonly now = (): number => this.currentTime;

  advance(ms: number): number {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new Error('Advance amount must be a non-negative finite number');
    }
    this.currentTime += ms;
    return this.currentTime;
  }

  set(time: number): void {
    if (!Number.isFinite(time) || time < 0) {
      throw new Error('Time must be a non-negative finite number');
    }
    this.currentTime = time;
  }
}
