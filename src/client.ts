#!/usr/bin/env node
import { CONFIG } from './config.js';
import { connectReplica } from './client/connection.js';
import { readMainBodies } from './game/bodies.js';
import { startLocalGame } from './client/local.js';
import type { LocalMode } from './client/local.js';
import { startGameLoop } from './game/loop.js';
import { isClientMode, isLoaded } from './game/modes.js';
import type { ClientMode } from './game/modes.js';
import { createLogger } from './logger.js';

const log = createLogger('startup');

type CliMode = Extract<ClientMode, 'multiplayer'> | LocalMode;

function modeFromArgs(): CliMode {
  const raw = process.argv[2] ?? 'multiplayer';
  if (isClientMode(raw) && isLoaded(raw) && raw !== 'server') return raw;
  throw new Error(`unknown mode "${raw}", expected singleplayer, multiplayer or explorer`);
}

async function start(mode: CliMode): Promise<() => Promise<void>> {
  if (mode === 'multiplayer') {
    const client = await connectReplica(CONFIG.SERVER_URL, { stepSize: CONFIG.STEP_SIZE });
    let synced = false;
    const loop = startGameLoop(client, {
      simHz: CONFIG.SIM_HZ,
      broadcastHz: CONFIG.BROADCAST_HZ,
      onStep: ({ replica }) => {
        if (!synced && replica.syncStatus === 'synced') {
          synced = true;
          log.info(`synced with server, bodies: ${replica.simulation.system.size}`);
        }
      },
    });
    return async () => {
      loop.stop();
      await client.close();
    };
  }

  const game = startLocalGame(mode, readMainBodies(), {
    simHz: CONFIG.SIM_HZ,
    simulation: { bodiesConfig: CONFIG.BODIES_CONFIG, stepSize: CONFIG.STEP_SIZE },
  });
  log.info(`${mode} started with ${game.simulation.system.size} bodies`);
  // nothing to prepare from the command line
  if (game.stage === 'preparation') game.enterStage('action');
  return async () => game.stop();
}

async function main() {
  const mode = modeFromArgs();
  const stop = await start(mode);
  const shutdown = () => {
    stop().catch((err) => {
      log.error('error while stopping', err);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  log.error('FATAL:', err);
  process.exitCode = 1;
});
