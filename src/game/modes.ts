import type { SimulationClock } from './clock.js';

export const CLIENT_MODES = ['none', 'singleplayer', 'multiplayer', 'explorer', 'server'] as const;
export type ClientMode = (typeof CLIENT_MODES)[number];

export type GameStage = 'preparation' | 'action';

export function isClientMode(v: unknown): v is ClientMode {
  return typeof v === 'string' && (CLIENT_MODES as readonly string[]).includes(v);
}

/** Bodies and ships exist: every mode except the main menu. */
export function isLoaded(mode: ClientMode): mode is Exclude<ClientMode, 'none'> {
  return mode !== 'none';
}

/** Running the game proper, as opposed to the explorer or the menu. */
export function isInGame(mode: ClientMode): boolean {
  return mode === 'singleplayer' || mode === 'multiplayer' || mode === 'server';
}

/** Owns the truth: the server, or a local singleplayer instance. */
export function isAuthoritative(mode: ClientMode): boolean {
  return mode === 'singleplayer' || mode === 'server';
}

/** Time runs during the action stage only. */
export function enterGameStage(clock: SimulationClock, stage: GameStage) {
  clock.running = stage === 'action';
}

/**
 * Initial running flag when a mode is entered. Multiplayer takes whatever the
 * server says in `initialData`.
 */
export function initialRunning(mode: ClientMode): boolean {
  switch (mode) {
    case 'explorer':
      return true;
    case 'none':
    case 'singleplayer':
    case 'multiplayer':
    case 'server':
      return false;
  }
}
