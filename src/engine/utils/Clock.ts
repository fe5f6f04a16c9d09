// Wall-clock seconds; every siege timer compares against this.

export interface Clock {
  now(): number;
}

/** Hand-driven clock for simulations and tests */
export class ManualClock implements Clock {
  constructor(private seconds = 0) {}

  now(): number {
    return this.seconds;
  }

  set(seconds: number): void {
    this.seconds = seconds;
  }

  advance(seconds: number): number {
    this.seconds += seconds;
    return this.seconds;
  }
}
