/**
 * Manually advanced clock for deterministic scheduling tests
 */

export class ManualClock {
  private current: number;

  constructor(start = 1_000_000) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}
