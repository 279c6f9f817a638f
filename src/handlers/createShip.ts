import type { WebSocket } from 'ws';
import type { CreateShipMessage } from '../types/messages.js';
import type { ServerSession } from '../types/server.js';
import type { ClientRecord } from '../types/socket.js';
import { createLogger } from '../logger.js';

const log = createLogger('net');

/**
 * Queues the creation; the simulation applies it at its next I/O stage.
 * A ship id that already exists is ignored there, not here.
 */
export function handleCreateShip(
  session: ServerSession,
  _socket: WebSocket,
  client: ClientRecord,
  msg: CreateShipMessage,
) {
  const { id, acceleration, position, velocity } = msg.payload;
  session.simulation.enqueue({
    type: 'create',
    info: { id, spawnPosition: position, spawnVelocity: velocity },
    acceleration,
  });
  log.debug(`client ${client.id} requested ship ${id}`);
}
