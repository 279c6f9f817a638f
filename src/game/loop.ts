import { createLogger } from '../logger.js';
import { MAX_CATCHUP_STEPS } from './constants.js';
import { FixedTimestep } from './timestep.js';
import type { GameLoop, GameLoopOptions, Steppable } from './types.js';

// ---------------------------------------------------------------------------
// Fixed-step scheduler
//  - simulation steps at SIM_HZ through an accumulator (bounded catch-up)
//  - broadcast fires at BROADCAST_HZ on its own accumulator, at most once per frame
//  - network handlers only enqueue; the step drains the queue
// ---------------------------------------------------------------------------

const log = createLogger('sim');

export function startGameLoop<T extends Steppable>(target: T, options: GameLoopOptions<T>): GameLoop {
  const now = options.now ?? (() => performance.now());
  const simStep = new FixedTimestep(1000 / options.simHz, MAX_CATCHUP_STEPS);
  const broadcastStep = options.onBroadcast ? new FixedTimestep(1000 / options.broadcastHz, 1) : undefined;
  const frameMs = 1000 / Math.max(options.simHz, options.onBroadcast ? options.broadcastHz : 0);

  let last = now();
  let interval: NodeJS.Timeout | undefined;

  function frame() {
    const t = now();
    const elapsed = t - last;
    last = t;
    const steps = simStep.advance(elapsed);
    for (let i = 0; i < steps; i++) {
      const result = target.step();
      options.onStep?.(target, result);
    }
    if (broadcastStep && options.onBroadcast && broadcastStep.advance(elapsed) > 0) {
      options.onBroadcast(target);
    }
  }

  interval = setInterval(frame, frameMs);
  log.info(`loop started: ${options.simHz}Hz simulation, ${options.onBroadcast ? `${options.broadcastHz}Hz broadcast` : 'no broadcast'}`);

  return {
    frame,
    stop() {
      if (!interval) return;
      clearInterval(interval);
      interval = undefined;
      log.info('loop stopped');
    },
    get running() {
      return interval !== undefined;
    },
  };
}
