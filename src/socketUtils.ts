import { WebSocket } from 'ws';
import type { WebSocketServer } from 'ws';
import type { ToClientMessage, ToServerMessage } from './types/messages.js';
import type { IncomingMessage as NodeIncomingMessage } from 'http';
import { encodeMessage } from './codec.js';

/** Reliable channel: queued by the socket until delivered. */
export function sendJson(socket: WebSocket, msg: ToClientMessage | ToServerMessage) {
  if (socket.readyState !== WebSocket.OPEN) return;
  socket.send(encodeMessage(msg));
}

export function broadcast(wss: WebSocketServer, data: ToClientMessage, except?: WebSocket) {
  const encoded = encodeMessage(data);
  Array.from(wss.clients)
    .filter((c) => c.readyState === WebSocket.OPEN && c !== except)
    .forEach((c) => c.send(encoded));
}

/**
 * Unreliable channel: the frame is dropped (never queued, never retried)
 * when the socket is not open or already has more than `maxBufferedBytes`
 * waiting. Returns whether the frame was handed to the socket.
 */
export function sendUnreliable(socket: WebSocket, encoded: string, maxBufferedBytes: number): boolean {
  if (socket.readyState !== WebSocket.OPEN) return false;
  if (socket.bufferedAmount > maxBufferedBytes) return false;
  socket.send(encoded);
  return true;
}

/** Returns how many clients the frame was handed to. */
export function broadcastUnreliable(
  wss: WebSocketServer,
  data: ToClientMessage,
  maxBufferedBytes: number,
): number {
  const encoded = encodeMessage(data);
  let sent = 0;
  for (const client of wss.clients) {
    if (sendUnreliable(client, encoded, maxBufferedBytes)) sent++;
  }
  return sent;
}

/**
 * Extract a client IP address from an HTTP upgrade request.
 * - Prefers the first IP from X-Forwarded-For if present
 * - Falls back to X-Real-IP
 * - Otherwise uses req.socket.remoteAddress
 * - Normalizes ::ffff:127.0.0.1 -> 127.0.0.1 and ::1 -> 127.0.0.1
 */
export function clientIpFromRequest(req: NodeIncomingMessage): string | undefined {
  const xff = req.headers['x-forwarded-for'];
  const fromXff = Array.isArray(xff) ? xff[0] : xff?.split(',')[0]?.trim();
  const real = req.headers['x-real-ip'];
  const remote = req.socket?.remoteAddress;
  const ipRaw = (fromXff || (Array.isArray(real) ? real[0] : real) || remote || '')
    .toString()
    .trim()
    .replace(/^::ffff:/, '');
  if (!ipRaw) return undefined;
  if (ipRaw === '::1') return '127.0.0.1';
  return ipRaw;
}
