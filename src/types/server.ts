import type { WebSocketServer } from 'ws';
import type { BodiesConfig } from './game.js';
import type { Simulation } from '../game/simulation.js';

/** Authoritative state shared by the socket handlers and the admin console. */
export interface ServerSession {
  wss: WebSocketServer;
  simulation: Simulation;
  /** Flips the clock and broadcasts the new flag on the reliable channel. */
  toggleTime(): boolean;
  /** Reloads the bodies and broadcasts the new config on the reliable channel. */
  setBodiesConfig(config: BodiesConfig): void;
}

export interface StartedServer extends ServerSession {
  port: number;
  usingTls: boolean;
  stop: () => Promise<void>;
}
