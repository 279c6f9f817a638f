import type { BodyId, ShipState, Vector3 } from '../types/game.js';
import type { BodySystem } from './bodies.js';
import { G } from './constants.js';
import { resolveInfluence } from './influence.js';
import { addScaled, sub, vec3 } from './vector.js';

export interface Attractor {
  position: Vector3;
  /** kg */
  mass: number;
}

/** Sum of G*m*(p - x)/|p - x|^3 over the attractors, in km/day^2. */
export function getAcceleration(position: Vector3, attractors: Iterable<Attractor>): Vector3 {
  let acc = vec3();
  for (const { position: p, mass } of attractors) {
    const r = sub(p, position);
    const d = Math.hypot(r.x, r.y, r.z);
    if (d === 0) continue; // a body does not pull on its own center
    acc = addScaled(acc, r, (G * mass) / (d * d * d));
  }
  return acc;
}

function attractorsOf(system: BodySystem, influencers: BodyId[]): Attractor[] {
  const ids = influencers.length ? influencers : [system.primary.data.id];
  return ids.flatMap((id) => {
    const body = system.get(id);
    return body ? [{ position: body.position, mass: body.data.mass }] : [];
  });
}

/** Acceleration at `position` from the given influence set (primary body when empty). */
export function accelerationFrom(system: BodySystem, influencers: BodyId[], position: Vector3): Vector3 {
  return getAcceleration(position, attractorsOf(system, influencers));
}

/**
 * One kick-drift-kick leapfrog step of `dt` days.
 * The ship's influence must already be current for its position; the
 * influence is resolved again at the new position before the second kick.
 */
export function leapfrogStep(ship: ShipState, system: BodySystem, dt: number) {
  const a = accelerationFrom(system, ship.influence.influencers, ship.position);
  const vHalf = addScaled(ship.velocity, a, dt / 2);
  ship.position = addScaled(ship.position, vHalf, dt);
  ship.influence = resolveInfluence(system, ship.position);
  ship.acceleration = accelerationFrom(system, ship.influence.influencers, ship.position);
  ship.velocity = addScaled(vHalf, ship.acceleration, dt / 2);
}
