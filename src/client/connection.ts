import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { BodyData, ShipId, Vector3 } from '../types/game.js';
import type { StepResult, SimulationOptions } from '../game/simulation.js';
import { readMainBodies } from '../game/bodies.js';
import { decodeToClient } from '../codec.js';
import { sendJson } from '../socketUtils.js';
import { createLogger } from '../logger.js';
import { Replica } from './replica.js';

const log = createLogger('net');

export interface ReplicaOptions extends SimulationOptions {
  catalog?: BodyData[];
}

export interface ReplicaClient {
  readonly replica: Replica;
  readonly socket: WebSocket;
  /** Spawns the ship locally and asks the server for it. */
  createShip(id: ShipId, position: Vector3, velocity: Vector3, acceleration?: Vector3): void;
  /** One local step; applies the server frames received since the last one. */
  step(): StepResult;
  close(): Promise<void>;
}

/**
 * Opens a connection to an authoritative server and mirrors it in a local
 * `Replica`. Rejects when the connection cannot be established.
 */
export async function connectReplica(url: string, options: ReplicaOptions = {}): Promise<ReplicaClient> {
  const { catalog, ...simOptions } = options;
  const replica = new Replica(catalog ?? readMainBodies(), simOptions);
  const socket = new WebSocket(url);

  socket.on('message', (data: RawData) => {
    const decoded = decodeToClient(data.toString());
    if (!decoded.ok) {
      log.warn(`ignoring frame from server: ${decoded.error}`);
      return;
    }
    replica.receive(decoded.message);
  });

  await new Promise<void>((resolve, reject) => {
    socket.once('open', () => resolve());
    socket.once('error', reject);
  });
  log.info(`connected to ${url}`);

  socket.on('error', (err) => {
    log.error('connection error', err);
  });
  socket.on('close', () => {
    log.info(`disconnected from ${url}`);
  });

  return {
    replica,
    socket,
    createShip(id, position, velocity, acceleration) {
      sendJson(socket, replica.createShip(id, position, velocity, acceleration));
    },
    step: () => replica.step(),
    close: async () => {
      if (socket.readyState === WebSocket.CLOSED) return;
      await new Promise<void>((resolve) => {
        socket.once('close', () => resolve());
        socket.close();
      });
    },
  };
}
