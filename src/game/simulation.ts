import type { BodiesConfig, BodyData, ShipId, Snapshot, Vector3 } from '../types/game.js';
import { createLogger } from '../logger.js';
import { BodySystem, DEFAULT_BODIES_CONFIG, loadSystem } from './bodies.js';
import { SimulationClock } from './clock.js';
import { resolveInfluence } from './influence.js';
import { accelerationFrom, leapfrogStep } from './leapfrog.js';
import { propagate } from './orbit.js';
import { CommandQueue, ShipRegistry } from './ships.js';
import type { ShipCommand } from './ships.js';

const log = createLogger('sim');

export interface SimulationOptions {
  bodiesConfig?: BodiesConfig;
  stepSize?: number;
  running?: boolean;
}

export interface StepResult {
  /** Whether the clock moved (false while paused). */
  advanced: boolean;
  created: ShipId[];
  removed: ShipId[];
}

/**
 * The whole mutable state of one simulation instance, passed explicitly to
 * every stage. Stages run in a fixed order inside `step()`.
 */
export class Simulation {
  readonly clock: SimulationClock;
  readonly ships = new ShipRegistry();
  private readonly commands = new CommandQueue();
  private readonly catalog: BodyData[];
  private _bodiesConfig: BodiesConfig;
  private _system: BodySystem;

  constructor(catalog: BodyData[], options: SimulationOptions = {}) {
    this.catalog = catalog;
    this.clock = new SimulationClock({ stepSize: options.stepSize, running: options.running });
    this._bodiesConfig = options.bodiesConfig ?? DEFAULT_BODIES_CONFIG;
    this._system = loadSystem(catalog, this._bodiesConfig);
    propagate(this._system, this.clock.time());
  }

  get system(): BodySystem {
    return this._system;
  }

  get bodiesConfig(): BodiesConfig {
    return this._bodiesConfig;
  }

  /** Queues a lifecycle command for the next tick's I/O stage. */
  enqueue(command: ShipCommand) {
    this.commands.push(command);
  }

  get pendingCommands(): number {
    return this.commands.size;
  }

  /**
   * One fixed step: clock -> orbits -> influence -> leapfrog -> commands.
   * Physics stages are skipped while the clock is paused; commands are
   * always drained.
   */
  step(): StepResult {
    const advanced = this.clock.advance();
    if (advanced) {
      propagate(this._system, this.clock.time());
      this.updateInfluences();
      const dt = this.clock.stepSize;
      for (const ship of this.ships.list()) leapfrogStep(ship, this._system, dt);
    }
    return { advanced, ...this.drainCommands() };
  }

  private updateInfluences() {
    for (const ship of this.ships.list()) {
      ship.influence = resolveInfluence(this._system, ship.position);
    }
  }

  private drainCommands(): { created: ShipId[]; removed: ShipId[] } {
    const created: ShipId[] = [];
    const removed: ShipId[] = [];
    for (const command of this.commands.drain()) {
      switch (command.type) {
        case 'create':
          if (this.ships.create(this._system, command.info, command.acceleration)) {
            created.push(command.info.id);
          } else {
            log.debug(`ship ${command.info.id} already exists, creation ignored`);
          }
          break;
        case 'remove':
          if (this.ships.remove(command.id)) removed.push(command.id);
          break;
      }
    }
    if (created.length) log.info(`created ship(s): ${created.join(', ')}`);
    if (removed.length) log.info(`removed ship(s): ${removed.join(', ')}`);
    return { created, removed };
  }

  /** Replaces the loaded bodies and re-resolves every ship against them. */
  setBodiesConfig(config: BodiesConfig) {
    const system = loadSystem(this.catalog, config);
    this._bodiesConfig = config;
    this._system = system;
    propagate(system, this.clock.time());
    this.updateInfluences();
  }

  /** Replica path: jump to an authoritative tick and reposition bodies. */
  syncToTick(tick: number): boolean {
    if (!this.clock.syncTo(tick)) return false;
    propagate(this._system, this.clock.time());
    return true;
  }

  /** Overwrites one ship's kinematics; unknown ids are a no-op. */
  setShipState(id: ShipId, position: Vector3, velocity?: Vector3): boolean {
    const ship = this.ships.get(id);
    if (!ship) return false;
    ship.position = { ...position };
    if (velocity) ship.velocity = { ...velocity };
    ship.influence = resolveInfluence(this._system, ship.position);
    ship.acceleration = accelerationFrom(this._system, ship.influence.influencers, ship.position);
    return true;
  }

  snapshot(): Snapshot {
    return { tick: this.clock.tick, ships: this.ships.snapshots() };
  }
}
