import type { Body, BodyData, BodyId, Influence, Vector3 } from '../types/game.js';
import type { BodySystem } from './bodies.js';
import { distance } from './vector.js';

/**
 * Radius of the sphere inside which a body's gravity dominates its host's:
 * a(1 - e) * cbrt(m / 3M). The primary body (no host) dominates everywhere.
 */
export function hillRadius(data: BodyData, hostMass: number | undefined): number {
  if (data.hostBody === undefined || hostMass === undefined || hostMass <= 0) return Infinity;
  const periapsis = data.semimajorAxis * (1 - data.eccentricity);
  return periapsis * Math.cbrt(data.mass / (3 * hostMass));
}

/**
 * Walks down from the primary body. At every level each child whose sphere
 * contains the point joins the influence set, and the walk continues into the
 * closest one. The last body reached is the main influencer.
 */
export function resolveInfluence(system: BodySystem, point: Vector3): Influence {
  let current = system.primary;
  const influencers = new Set<BodyId>([current.data.id]);
  for (;;) {
    let next: Body | undefined;
    let best = Infinity;
    for (const childId of current.orbitingBodies) {
      const child = system.get(childId);
      if (!child) continue;
      const d = distance(child.position, point);
      if (d >= child.hillRadius) continue;
      influencers.add(childId);
      if (d < best) {
        best = d;
        next = child;
      }
    }
    if (!next) break;
    current = next;
  }
  return { mainInfluencer: current.data.id, influencers: [...influencers] };
}
