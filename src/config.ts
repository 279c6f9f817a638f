import type { BodiesConfig } from './types/game.js';
import { isBodyType } from './game/bodies.js';
import {
  DEFAULT_BROADCAST_HZ,
  DEFAULT_SIM_HZ,
  DEFAULT_STEP_SIZE,
  DEFAULT_UNRELIABLE_MAX_BUFFERED_BYTES,
} from './game/constants.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

function positiveNumber(name: string, fallback: number): number {
  const value = Number(process.env[name]);
  return value > 0 ? value : fallback;
}

function bodiesConfigFromEnv(): BodiesConfig {
  const raw = process.env.BODIES_SMALLEST_TYPE;
  if (!raw) return { kind: 'smallestBodyType', bodyType: 'planet' };
  if (isBodyType(raw)) return { kind: 'smallestBodyType', bodyType: raw };
  log.warn(`invalid BODIES_SMALLEST_TYPE "${raw}", defaulting to planet`);
  return { kind: 'smallestBodyType', bodyType: 'planet' };
}

const PORT = Number(process.env.PORT) || 6000;

export const CONFIG = Object.freeze({
  HOST: process.env.HOST || '127.0.0.1',
  PORT,
  SERVER_URL: process.env.SERVER_URL || `ws://127.0.0.1:${PORT}`,
  SIM_HZ: positiveNumber('SIM_HZ', DEFAULT_SIM_HZ),
  BROADCAST_HZ: positiveNumber('BROADCAST_HZ', DEFAULT_BROADCAST_HZ),
  STEP_SIZE: Math.floor(positiveNumber('STEP_SIZE', DEFAULT_STEP_SIZE)) || DEFAULT_STEP_SIZE,
  START_RUNNING: process.env.START_RUNNING === '1',
  BODIES_CONFIG: bodiesConfigFromEnv(),
  UNRELIABLE_MAX_BUFFERED_BYTES: positiveNumber(
    'UNRELIABLE_MAX_BUFFERED_BYTES',
    DEFAULT_UNRELIABLE_MAX_BUFFERED_BYTES,
  ),
  TLS_CERT_PATH: process.env.TLS_CERT_PATH || '/etc/orbit-relay/certs/fullchain.pem',
  TLS_KEY_PATH: process.env.TLS_KEY_PATH || '/etc/orbit-relay/certs/privkey.pem',
  REQUIRE_TLS: process.env.REQUIRE_TLS === '1',
});
