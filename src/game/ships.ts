import type { ShipId, ShipInfo, ShipSnapshot, ShipState, Vector3 } from '../types/game.js';
import type { BodySystem } from './bodies.js';
import { resolveInfluence } from './influence.js';
import { accelerationFrom } from './leapfrog.js';

export type ShipCommand =
  | { type: 'create'; info: ShipInfo; acceleration?: Vector3 }
  | { type: 'remove'; id: ShipId };

/** FIFO of lifecycle commands, drained once per tick. */
export class CommandQueue {
  private pending: ShipCommand[] = [];

  push(command: ShipCommand) {
    this.pending.push(command);
  }

  drain(): ShipCommand[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  get size(): number {
    return this.pending.length;
  }
}

/** Ship records keyed by id, in creation order. */
export class ShipRegistry {
  private readonly ships = new Map<ShipId, ShipState>();

  get(id: ShipId): ShipState | undefined {
    return this.ships.get(id);
  }

  has(id: ShipId): boolean {
    return this.ships.has(id);
  }

  ids(): ShipId[] {
    return [...this.ships.keys()];
  }

  list(): ShipState[] {
    return [...this.ships.values()];
  }

  get size(): number {
    return this.ships.size;
  }

  /**
   * Inserts a ship at its spawn state. An existing id is kept untouched and
   * false is returned.
   */
  create(system: BodySystem, info: ShipInfo, acceleration?: Vector3): boolean {
    if (this.ships.has(info.id)) return false;
    const position = { ...info.spawnPosition };
    const influence = resolveInfluence(system, position);
    this.ships.set(info.id, {
      info,
      position,
      velocity: { ...info.spawnVelocity },
      acceleration: acceleration
        ? { ...acceleration }
        : accelerationFrom(system, influence.influencers, position),
      influence,
    });
    return true;
  }

  remove(id: ShipId): boolean {
    return this.ships.delete(id);
  }

  snapshots(): ShipSnapshot[] {
    return this.list().map((s) => ({
      id: s.info.id,
      position: { ...s.position },
      velocity: { ...s.velocity },
    }));
  }
}
