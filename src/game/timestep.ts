/**
 * Wall-clock accumulator: feed it elapsed milliseconds, it reports how many
 * whole periods have passed. At most `maxSteps` periods are reported per
 * call and the rest of the backlog is discarded.
 */
export class FixedTimestep {
  private accumulator = 0;

  constructor(
    readonly periodMs: number,
    private readonly maxSteps = Infinity,
  ) {
    if (!(periodMs > 0)) throw new RangeError(`period must be positive, got ${periodMs}`);
  }

  advance(elapsedMs: number): number {
    if (elapsedMs > 0) this.accumulator += elapsedMs;
    const due = Math.floor(this.accumulator / this.periodMs);
    if (due > this.maxSteps) {
      this.accumulator = 0;
      return this.maxSteps;
    }
    this.accumulator -= due * this.periodMs;
    return due;
  }
}
