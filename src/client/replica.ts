import type { BodyData, ShipId, Vector3 } from '../types/game.js';
import type { CreateShipMessage, PeriodicUpdateMessage, ToClientMessage } from '../types/messages.js';
import { Simulation } from '../game/simulation.js';
import type { SimulationOptions, StepResult } from '../game/simulation.js';
import { resolveInfluence } from '../game/influence.js';
import { accelerationFrom } from '../game/leapfrog.js';
import { createLogger } from '../logger.js';

const log = createLogger('replica');

export type SyncStatus = 'notSynced' | 'synced';

/**
 * Local mirror of an authoritative simulation. Server frames are queued as
 * they arrive and applied once per local step, after the physics stages.
 */
export class Replica {
  readonly simulation: Simulation;
  private inbox: ToClientMessage[] = [];
  private _syncStatus: SyncStatus = 'notSynced';
  private _lastUpdateTick = -1;
  private _lastError: string | undefined;

  constructor(catalog: BodyData[], options: SimulationOptions = {}) {
    this.simulation = new Simulation(catalog, { ...options, running: false });
  }

  get syncStatus(): SyncStatus {
    return this._syncStatus;
  }

  /** Tick of the last periodic update applied, -1 before the first one. */
  get lastUpdateTick(): number {
    return this._lastUpdateTick;
  }

  get lastError(): string | undefined {
    return this._lastError;
  }

  get pending(): number {
    return this.inbox.length;
  }

  receive(message: ToClientMessage) {
    this.inbox.push(message);
  }

  /**
   * Spawns the ship locally on the next step and returns the frame that asks
   * the server for the same ship.
   */
  createShip(id: ShipId, position: Vector3, velocity: Vector3, acceleration?: Vector3): CreateShipMessage {
    this.simulation.enqueue({
      type: 'create',
      info: { id, spawnPosition: { ...position }, spawnVelocity: { ...velocity } },
      acceleration,
    });
    const { system } = this.simulation;
    const sent = acceleration ?? accelerationFrom(system, resolveInfluence(system, position).influencers, position);
    return { type: 'createShip', payload: { id, acceleration: sent, position, velocity } };
  }

  step(): StepResult {
    const result = this.simulation.step();
    for (const message of this.drain()) this.apply(message);
    return result;
  }

  private drain(): ToClientMessage[] {
    const drained = this.inbox;
    this.inbox = [];
    return drained;
  }

  /** Applies one server frame immediately. */
  apply(message: ToClientMessage) {
    const sim = this.simulation;
    switch (message.type) {
      case 'initialData':
        sim.setBodiesConfig(message.payload.bodiesConfig);
        sim.clock.running = message.payload.clockRunning;
        this._syncStatus = 'synced';
        break;
      case 'bodiesConfig':
        sim.setBodiesConfig(message.payload);
        this._syncStatus = 'synced';
        break;
      case 'toggleTime':
        sim.clock.running = message.payload;
        break;
      case 'periodicUpdate':
        this.applyUpdate(message);
        break;
      case 'error':
        this._lastError = message.payload;
        log.warn(`server rejected a frame: ${message.payload}`);
        break;
    }
  }

  private applyUpdate({ payload }: PeriodicUpdateMessage) {
    if (payload.tick < this._lastUpdateTick) {
      log.debug(`dropping out-of-order update ${payload.tick} (last ${this._lastUpdateTick})`);
      return;
    }
    this._lastUpdateTick = payload.tick;
    // a replica that stepped ahead of the server keeps its clock
    this.simulation.syncToTick(payload.tick);
    for (const ship of payload.ships) {
      this.simulation.setShipState(ship.id, ship.position, ship.velocity);
    }
  }
}
