import type { StepResult } from './simulation.js';

/** Anything advanced one fixed step at a time: a simulation or a replica. */
export interface Steppable {
  step(): StepResult;
}

export interface GameLoopOptions<T extends Steppable> {
  simHz: number;
  broadcastHz: number;
  /** Called after every fixed step. */
  onStep?: (target: T, result: StepResult) => void;
  /** Called on the broadcast cadence; omit for a loop that never broadcasts (singleplayer). */
  onBroadcast?: (target: T) => void;
  /** Monotonic milliseconds; defaults to performance.now. */
  now?: () => number;
}

export interface GameLoop {
  /** Runs one scheduler frame immediately (what the interval calls). */
  frame(): void;
  stop(): void;
  readonly running: boolean;
}
