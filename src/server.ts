#!/usr/bin/env node
import readline from 'readline';
import { startServer } from './app.js';
import { CONFIG } from './config.js';
import { runCommand } from './console/commands.js';
import { createLogger } from './logger.js';

const log = createLogger('startup');

async function main() {
  const server = await startServer(CONFIG.PORT);

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  rl.on('line', (line) => {
    runCommand({ simulation: server.simulation, toggleTime: server.toggleTime, print: console.log }, line);
  });

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    log.info('shutting down');
    rl.close();
    server.stop().catch((err) => {
      log.error('error while stopping', err);
      process.exitCode = 1;
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  log.error('FATAL:', err);
  process.exitCode = 1;
});
