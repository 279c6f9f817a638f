import type { Vector3 } from '../types/game.js';
import type { Simulation } from '../game/simulation.js';

export interface ConsoleContext {
  simulation: Simulation;
  /** Flips the clock and tells the clients; returns the new running flag. */
  toggleTime(): boolean;
  print(line: string): void;
}

export interface ParsedCommand {
  name: string;
  args: string[];
}

export const HELP_TEXT = [
  'list of commands:',
  '  help : print the list of all available commands',
  '  toggle_time : start the simulation, or pause it if already started',
  '  time_scale [n] : set the step size (days per tick) to n, then print it',
  '  list_ships : print the ids of all ships',
  '  get_ship_data <id> : print the state of one ship',
  '  get_bodys_data : print the state of all bodies',
  '  test : print the position of every ship',
  '  test_set_pos <id> <x> <y> <z> : move a ship',
].join('\n');

/** Splits a console line on whitespace; a blank line is `help`. */
export function parseCommandLine(line: string): ParsedCommand {
  const [name = 'help', ...args] = line.trim().split(/\s+/).filter(Boolean);
  return { name, args };
}

export function formatVector(v: Vector3): string {
  return `(${v.x}, ${v.y}, ${v.z})`;
}

function parseCoordinate(token: string | undefined, print: (line: string) => void): number {
  if (token === undefined) {
    print('wrong pos');
    return 0;
  }
  const value = Number(token);
  if (!Number.isFinite(value)) {
    print(`err: "${token}" is not a number`);
    return 0;
  }
  return value;
}

function timeScale(ctx: ConsoleContext, args: string[]) {
  const { clock } = ctx.simulation;
  const [raw] = args;
  if (raw !== undefined && !clock.setStepSize(Number(raw))) {
    ctx.print(`time scale must be a positive integer, got "${raw}"`);
  }
  ctx.print(`current time scale = ${clock.stepSize}`);
}

function shipData(ctx: ConsoleContext, args: string[]) {
  const [id] = args;
  const ship = id === undefined ? undefined : ctx.simulation.ships.get(id);
  if (!ship) return ctx.print('wrong ID');
  ctx.print(
    `data: ${JSON.stringify({
      position: ship.position,
      velocity: ship.velocity,
      acceleration: ship.acceleration,
      influence: ship.influence,
    })}`,
  );
}

function bodiesData(ctx: ConsoleContext) {
  const { system } = ctx.simulation;
  system.bodies.forEach((body, i) => {
    ctx.print(
      `${i} - ${body.data.id} (${body.data.bodyType}) position=${formatVector(body.position)} hill=${body.hillRadius}`,
    );
  });
  ctx.print(`system size: ${system.systemSize()} km`);
}

function setPosition(ctx: ConsoleContext, args: string[]) {
  const [id, ...coords] = args;
  const x = parseCoordinate(coords[0], ctx.print);
  const y = parseCoordinate(coords[1], ctx.print);
  const z = parseCoordinate(coords[2], ctx.print);
  const position = { x, y, z };
  if (id === undefined || !ctx.simulation.setShipState(id, position)) return ctx.print('wrong ID');
  ctx.print(`ship ${id} moved to ${formatVector(position)}`);
}

/** Runs one console line against the simulation. Never throws on bad input. */
export function runCommand(ctx: ConsoleContext, line: string) {
  const { name, args } = parseCommandLine(line);
  const { simulation } = ctx;
  switch (name) {
    case 'help':
      return ctx.print(HELP_TEXT);
    case 'toggle_time':
      return ctx.print(`time ${ctx.toggleTime() ? 'running' : 'paused'}`);
    case 'time_scale':
      return timeScale(ctx, args);
    case 'list_ships':
      return ctx.print(`ships list: ${simulation.ships.ids().join(', ')}`);
    case 'get_ship_data':
      return shipData(ctx, args);
    case 'get_bodys_data':
      return bodiesData(ctx);
    case 'test':
      for (const ship of simulation.ships.list()) {
        ctx.print(`${ship.info.id}: ${formatVector(ship.position)}`);
      }
      return ctx.print('test');
    case 'test_set_pos':
      return setPosition(ctx, args);
    default:
      ctx.print(`unknown command: ${name}`);
      return ctx.print(HELP_TEXT);
  }
}
