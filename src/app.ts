import { WebSocketServer } from 'ws';
import fs from 'fs';
import https from 'https';
import type { BodiesConfig, BodyData } from './types/game.js';
import type { ServerSession, StartedServer } from './types/server.js';
import { CONFIG } from './config.js';
import { readMainBodies } from './game/bodies.js';
import { startGameLoop } from './game/loop.js';
import { Simulation } from './game/simulation.js';
import { attachSocketHandlers } from './socketHandlers.js';
import { broadcast, broadcastUnreliable } from './socketUtils.js';
import { createLogger } from './logger.js';

export type { StartedServer } from './types/server.js';

const log = createLogger('startup');

export interface ServerOptions {
  host?: string;
  catalog?: BodyData[];
  bodiesConfig?: BodiesConfig;
  stepSize?: number;
  running?: boolean;
  simHz?: number;
  broadcastHz?: number;
  unreliableMaxBufferedBytes?: number;
  tlsCertPath?: string;
  tlsKeyPath?: string;
  requireTls?: boolean;
}

/**
 * Starts the authoritative server: builds the simulation, binds the socket
 * (wss when a certificate and key are present), runs the fixed-step loop and
 * the periodic broadcast. Rejects when the endpoint cannot be bound.
 */
export async function startServer(port: number, options: ServerOptions = {}): Promise<StartedServer> {
  const host = options.host ?? CONFIG.HOST;
  const simulation = new Simulation(options.catalog ?? readMainBodies(), {
    bodiesConfig: options.bodiesConfig ?? CONFIG.BODIES_CONFIG,
    stepSize: options.stepSize ?? CONFIG.STEP_SIZE,
    running: options.running ?? CONFIG.START_RUNNING,
  });

  // TLS (wss) support: if cert & key exist we create an HTTPS server and attach the
  // WebSocketServer to it. Otherwise fall back to plain ws, unless TLS is required
  // explicitly or we're binding to port 443.
  const certPath = options.tlsCertPath ?? CONFIG.TLS_CERT_PATH;
  const keyPath = options.tlsKeyPath ?? CONFIG.TLS_KEY_PATH;
  const requireTls = (options.requireTls ?? CONFIG.REQUIRE_TLS) || port === 443;
  let server: https.Server | undefined;
  if (fs.existsSync(certPath) && fs.existsSync(keyPath)) {
    try {
      server = https.createServer({ cert: fs.readFileSync(certPath), key: fs.readFileSync(keyPath) });
    } catch (err) {
      log.warn('found TLS cert/key but failed to read, continuing without TLS', err);
    }
  }
  if (!server && requireTls) {
    const reason = `TLS required (port=${port}) but certificate/key not present at ${certPath} / ${keyPath}`;
    log.error('FATAL:', reason);
    throw new Error(reason);
  }
  const usingTls = server !== undefined;

  let wss: WebSocketServer;
  if (server) {
    const httpsServer = server;
    wss = new WebSocketServer({ server: httpsServer });
    await new Promise<void>((resolve, reject) => {
      httpsServer.once('error', reject);
      httpsServer.once('listening', () => resolve());
      httpsServer.listen(port, host);
    });
  } else {
    const plain = new WebSocketServer({ port, host });
    wss = plain;
    await new Promise<void>((resolve, reject) => {
      plain.once('error', reject);
      plain.once('listening', () => resolve());
    });
  }

  const session: ServerSession = {
    wss,
    simulation,
    toggleTime() {
      const running = simulation.clock.toggle();
      broadcast(wss, { type: 'toggleTime', payload: running });
      log.info(`time ${running ? 'running' : 'paused'}`);
      return running;
    },
    setBodiesConfig(config) {
      simulation.setBodiesConfig(config);
      broadcast(wss, { type: 'bodiesConfig', payload: config });
    },
  };
  attachSocketHandlers(session);

  const maxBuffered = options.unreliableMaxBufferedBytes ?? CONFIG.UNRELIABLE_MAX_BUFFERED_BYTES;
  const loop = startGameLoop(simulation, {
    simHz: options.simHz ?? CONFIG.SIM_HZ,
    broadcastHz: options.broadcastHz ?? CONFIG.BROADCAST_HZ,
    onBroadcast: (sim) => {
      broadcastUnreliable(wss, { type: 'periodicUpdate', payload: sim.snapshot() }, maxBuffered);
    },
  });

  // address retrieval differs if we used underlying server
  const addr = (server ?? wss).address();
  const actualPort = typeof addr === 'object' && addr ? addr.port : port;
  const scheme = usingTls ? 'wss' : 'ws';
  log.info(`🚀 WebSocket server listening on ${scheme}://${host}:${actualPort}`);
  if (!usingTls) {
    log.info('TLS not enabled (cert/key not found). To enable wss, provide cert at', certPath, 'and key at', keyPath);
  }

  wss.on('error', (err) => {
    log.error('WebSocket server error', err);
  });

  return {
    ...session,
    port: actualPort,
    usingTls,
    stop: async () => {
      loop.stop();
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
      if (server) {
        const httpsServer = server;
        await new Promise<void>((resolve, reject) => {
          httpsServer.close((err) => (err ? reject(err) : resolve()));
        });
      }
    },
  };
}
