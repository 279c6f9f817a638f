import type { BodyData } from '../types/game.js';
import { startGameLoop } from '../game/loop.js';
import { enterGameStage, initialRunning, isInGame } from '../game/modes.js';
import type { ClientMode, GameStage } from '../game/modes.js';
import { Simulation } from '../game/simulation.js';
import type { SimulationOptions } from '../game/simulation.js';
import type { GameLoop } from '../game/types.js';
import { createLogger } from '../logger.js';

const log = createLogger('local');

export type LocalMode = Extract<ClientMode, 'singleplayer' | 'explorer'>;

export interface LocalGameOptions {
  simHz: number;
  simulation?: Omit<SimulationOptions, 'running'>;
  /** Monotonic milliseconds for the loop; defaults to performance.now. */
  now?: () => number;
}

export interface LocalGame {
  readonly mode: LocalMode;
  readonly simulation: Simulation;
  readonly loop: GameLoop;
  /** Current stage; undefined in the explorer, which has none. */
  readonly stage: GameStage | undefined;
  enterStage(stage: GameStage): void;
  stop(): void;
}

/**
 * Runs an authoritative simulation in process. Singleplayer opens in the
 * preparation stage with time paused; the explorer runs time from the start.
 */
export function startLocalGame(mode: LocalMode, catalog: BodyData[], options: LocalGameOptions): LocalGame {
  const inGame = isInGame(mode);
  const simulation = new Simulation(catalog, { ...options.simulation, running: initialRunning(mode) });
  let stage: GameStage | undefined;

  function enterStage(next: GameStage) {
    if (!inGame) throw new Error(`mode ${mode} has no game stages`);
    enterGameStage(simulation.clock, next);
    stage = next;
    log.info(`${mode}: entered ${next} stage`);
  }

  if (inGame) enterStage('preparation');
  const loop = startGameLoop(simulation, { simHz: options.simHz, broadcastHz: options.simHz, now: options.now });

  return {
    mode,
    simulation,
    loop,
    get stage() {
      return stage;
    },
    enterStage,
    stop: () => loop.stop(),
  };
}
