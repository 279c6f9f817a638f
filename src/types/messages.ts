// Wire messages: JSON envelopes `{ type, payload }`
import type { BodiesConfig, ShipId, Snapshot, Vector3 } from './game.js';

// --- Server -> Client ---

export interface InitialDataMessage {
  type: 'initialData';
  payload: { bodiesConfig: BodiesConfig; clockRunning: boolean };
}

export interface ToggleTimeMessage {
  type: 'toggleTime';
  payload: boolean;
}

export interface BodiesConfigMessage {
  type: 'bodiesConfig';
  payload: BodiesConfig;
}

/** Sent on the unreliable channel; the next one supersedes a lost one. */
export interface PeriodicUpdateMessage {
  type: 'periodicUpdate';
  payload: Snapshot;
}

export interface ErrorMessage {
  type: 'error';
  payload: string;
}

export type ToClientMessage =
  | InitialDataMessage
  | ToggleTimeMessage
  | BodiesConfigMessage
  | PeriodicUpdateMessage
  | ErrorMessage;

// --- Client -> Server ---

export interface CreateShipPayload {
  id: ShipId;
  acceleration: Vector3;
  position: Vector3;
  velocity: Vector3;
}

export interface CreateShipMessage {
  type: 'createShip';
  payload: CreateShipPayload;
}

export type ToServerMessage = CreateShipMessage;

export type DecodeResult<T> = { ok: true; message: T } | { ok: false; error: string };
