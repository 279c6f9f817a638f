import { WebSocket } from 'ws';
import { decodeToClient } from '../../src/codec.js';
import type { ToClientMessage } from '../../src/types/messages.js';

export interface TestClient {
  socket: WebSocket;
  /** Every decoded frame received so far, in arrival order. */
  received: ToClientMessage[];
  waitForMessage<T extends ToClientMessage>(
    predicate: (msg: ToClientMessage) => msg is T,
    timeoutMs?: number,
  ): Promise<T>;
  close(): Promise<void>;
}

export function isType<K extends ToClientMessage['type']>(type: K) {
  return (msg: ToClientMessage): msg is Extract<ToClientMessage, { type: K }> => msg.type === type;
}

function waitFor<T extends ToClientMessage>(
  received: ToClientMessage[],
  listeners: Set<() => void>,
  predicate: (msg: ToClientMessage) => msg is T,
  timeoutMs = 2000,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let seen = 0;
    const to = setTimeout(() => {
      listeners.delete(check);
      reject(new Error('timeout waiting for message'));
    }, timeoutMs);
    function check() {
      for (; seen < received.length; seen++) {
        const msg = received[seen];
        if (predicate(msg)) {
          clearTimeout(to);
          listeners.delete(check);
          resolve(msg);
          return;
        }
      }
    }
    listeners.add(check);
    check();
  });
}

/** Opens a ws client that records frames from the moment the socket exists. */
export async function connectTestClient(port: number): Promise<TestClient> {
  const socket = new WebSocket(`ws://127.0.0.1:${port}`);
  const received: ToClientMessage[] = [];
  const listeners = new Set<() => void>();
  socket.on('message', (raw) => {
    const decoded = decodeToClient(raw.toString());
    if (!decoded.ok) throw new Error(`undecodable frame: ${decoded.error}`);
    received.push(decoded.message);
    for (const listener of listeners) listener();
  });
  await new Promise<void>((resolve, reject) => {
    socket.once('open', () => resolve());
    socket.once('error', reject);
  });

  return {
    socket,
    received,
    waitForMessage: (predicate, timeoutMs) => waitFor(received, listeners, predicate, timeoutMs),
    close: async () => {
      if (socket.readyState === WebSocket.CLOSED) return;
      await new Promise<void>((resolve) => {
        socket.once('close', () => resolve());
        socket.close();
      });
    },
  };
}

/** Polls until `condition` holds. */
export async function waitUntil(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('timeout waiting for condition');
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
