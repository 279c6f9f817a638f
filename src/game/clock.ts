import { DEFAULT_STEP_SIZE } from './constants.js';

export interface ClockOptions {
  stepSize?: number;
  running?: boolean;
  tick?: number;
}

export function isValidStepSize(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0;
}

/**
 * Simulation clock: monotonic tick counter, days-per-tick step size and a
 * running flag. Changes made between two steps apply from the next step.
 */
export class SimulationClock {
  private _tick: number;
  private _stepSize: number;
  running: boolean;

  constructor(options: ClockOptions = {}) {
    const stepSize = options.stepSize ?? DEFAULT_STEP_SIZE;
    if (!isValidStepSize(stepSize)) throw new RangeError(`invalid step size ${stepSize}`);
    this._stepSize = stepSize;
    this._tick = options.tick ?? 0;
    this.running = options.running ?? false;
  }

  get tick(): number {
    return this._tick;
  }

  get stepSize(): number {
    return this._stepSize;
  }

  /** Returns false (and keeps the current value) unless `n` is a positive integer. */
  setStepSize(n: number): boolean {
    if (!isValidStepSize(n)) return false;
    this._stepSize = n;
    return true;
  }

  /** Flips the running flag and returns the new value. */
  toggle(): boolean {
    this.running = !this.running;
    return this.running;
  }

  /** Advances one tick if running; returns whether time moved. */
  advance(): boolean {
    if (!this.running) return false;
    this._tick += 1;
    return true;
  }

  /** Simulated days since tick 0. */
  time(): number {
    return this._tick * this._stepSize;
  }

  /** Moves forward to an authoritative tick; never moves backward. */
  syncTo(tick: number): boolean {
    if (!Number.isSafeInteger(tick) || tick < this._tick) return false;
    this._tick = tick;
    return true;
  }
}
