import type { BodiesConfig, ShipSnapshot, Vector3 } from './types/game.js';
import type {
  CreateShipPayload,
  DecodeResult,
  ToClientMessage,
  ToServerMessage,
} from './types/messages.js';
import { isBodyType, isValidId } from './game/bodies.js';

export function encodeMessage(msg: ToClientMessage | ToServerMessage): string {
  return JSON.stringify(msg);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

export function isVector3(v: unknown): v is Vector3 {
  if (!isRecord(v)) return false;
  return isFiniteNumber(v.x) && isFiniteNumber(v.y) && isFiniteNumber(v.z);
}

export function isBodiesConfig(v: unknown): v is BodiesConfig {
  if (!isRecord(v)) return false;
  if (v.kind === 'smallestBodyType') return isBodyType(v.bodyType);
  if (v.kind === 'ids') return Array.isArray(v.ids) && v.ids.every(isValidId);
  return false;
}

function isShipSnapshot(v: unknown): v is ShipSnapshot {
  return isRecord(v) && isValidId(v.id) && isVector3(v.position) && isVector3(v.velocity);
}

function isTick(v: unknown): v is number {
  return typeof v === 'number' && Number.isSafeInteger(v) && v >= 0;
}

function isCreateShipPayload(v: unknown): v is CreateShipPayload {
  return (
    isRecord(v) &&
    isValidId(v.id) &&
    isVector3(v.acceleration) &&
    isVector3(v.position) &&
    isVector3(v.velocity)
  );
}

function parseJson(text: string): DecodeResult<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, error: 'invalid JSON' };
  }
  if (!isRecord(parsed) || typeof parsed.type !== 'string') {
    return { ok: false, error: 'message must have a string "type" field' };
  }
  return { ok: true, message: parsed };
}

/** Server side: validates a frame received from a client. */
export function decodeToServer(text: string): DecodeResult<ToServerMessage> {
  const parsed = parseJson(text);
  if (!parsed.ok) return parsed;
  const { type, payload } = parsed.message;
  switch (type) {
    case 'createShip':
      if (!isCreateShipPayload(payload)) return { ok: false, error: 'invalid createShip payload' };
      return { ok: true, message: { type: 'createShip', payload } };
    default:
      return { ok: false, error: `unknown message type: ${String(type)}` };
  }
}

/** Client side: validates a frame received from the server. */
export function decodeToClient(text: string): DecodeResult<ToClientMessage> {
  const parsed = parseJson(text);
  if (!parsed.ok) return parsed;
  const { type, payload } = parsed.message;
  switch (type) {
    case 'initialData':
      if (
        isRecord(payload) &&
        isBodiesConfig(payload.bodiesConfig) &&
        typeof payload.clockRunning === 'boolean'
      ) {
        return {
          ok: true,
          message: {
            type: 'initialData',
            payload: { bodiesConfig: payload.bodiesConfig, clockRunning: payload.clockRunning },
          },
        };
      }
      break;
    case 'toggleTime':
      if (typeof payload === 'boolean') return { ok: true, message: { type: 'toggleTime', payload } };
      break;
    case 'bodiesConfig':
      if (isBodiesConfig(payload)) return { ok: true, message: { type: 'bodiesConfig', payload } };
      break;
    case 'periodicUpdate':
      if (
        isRecord(payload) &&
        isTick(payload.tick) &&
        Array.isArray(payload.ships) &&
        payload.ships.every(isShipSnapshot)
      ) {
        return {
          ok: true,
          message: { type: 'periodicUpdate', payload: { tick: payload.tick, ships: payload.ships } },
        };
      }
      break;
    case 'error':
      if (typeof payload === 'string') return { ok: true, message: { type: 'error', payload } };
      break;
    default:
      return { ok: false, error: `unknown message type: ${String(type)}` };
  }
  return { ok: false, error: `invalid ${String(type)} payload` };
}
