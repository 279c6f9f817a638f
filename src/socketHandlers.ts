import type { IncomingMessage as NodeIncomingMessage } from 'http';
import type { RawData, WebSocket } from 'ws';
import { randomUUID } from 'crypto';
import type { ToServerMessage } from './types/messages.js';
import type { ServerSession } from './types/server.js';
import type { ClientRecord } from './types/socket.js';
import { decodeToServer } from './codec.js';
import { clientIpFromRequest, sendJson } from './socketUtils.js';
import { handleCreateShip } from './handlers/createShip.js';
import { createLogger } from './logger.js';

const log = createLogger('net');

function dispatch(session: ServerSession, socket: WebSocket, client: ClientRecord, msg: ToServerMessage) {
  switch (msg.type) {
    case 'createShip':
      return handleCreateShip(session, socket, client, msg);
  }
}

/**
 * Wires connection lifecycle and inbound frames. Every new connection gets
 * `initialData` immediately; inbound frames are validated and turned into
 * simulation commands.
 */
export function attachSocketHandlers(session: ServerSession) {
  const { wss, simulation } = session;

  wss.on('connection', (socket: WebSocket, req: NodeIncomingMessage) => {
    const client: ClientRecord = {
      id: randomUUID(),
      ip: clientIpFromRequest(req),
      connectedAt: Date.now(),
    };
    log.info(`client connected: ${client.id}${client.ip ? ` (${client.ip})` : ''}`);
    sendJson(socket, {
      type: 'initialData',
      payload: { bodiesConfig: simulation.bodiesConfig, clockRunning: simulation.clock.running },
    });

    socket.on('message', (data: RawData) => {
      const decoded = decodeToServer(data.toString());
      if (!decoded.ok) {
        log.warn(`rejected frame from ${client.id}: ${decoded.error}`);
        return sendJson(socket, { type: 'error', payload: decoded.error });
      }
      try {
        dispatch(session, socket, client, decoded.message);
      } catch (err) {
        log.error('handler error for type', decoded.message.type, err);
        return sendJson(socket, { type: 'error', payload: 'internal handler error' });
      }
    });

    socket.on('close', () => {
      const seconds = (Date.now() - client.connectedAt) / 1000;
      log.info(`client disconnected: ${client.id} after ${seconds.toFixed(1)}s`);
    });
  });
}
