import type { Body, OrbitalElements, OrbitState, Vector2, Vector3 } from '../types/game.js';
import type { BodySystem } from './bodies.js';
import { E_TOLERANCE, KEPLER_MAX_ITERATIONS } from './constants.js';
import { add, vec3, ZERO } from './vector.js';

// ---------------------------------------------------------------------------
// Orbital propagation
//  - per-body analytic solve (mean anomaly -> eccentric anomaly -> position)
//  - single top-down pass composing host frames into world space
// See https://ssd.jpl.nasa.gov/planets/approx_pos.html for the formulas.
// ---------------------------------------------------------------------------

const DEG = Math.PI / 180;

/** Wraps an angle in degrees into [-180, 180). */
export function mod180(degrees: number): number {
  return ((((degrees + 180) % 360) + 360) % 360) - 180;
}

export function meanAnomalyAt(elements: OrbitalElements, time: number): number {
  if (elements.revolutionPeriod === 0) return elements.initialMeanAnomaly;
  return mod180(elements.initialMeanAnomaly + (360 * time) / elements.revolutionPeriod);
}

/**
 * Solves Kepler's equation M = E - e*sin(E) for E, everything in degrees
 * (the eccentricity is scaled to degrees for the sine term).
 * Newton iterations are capped; the last estimate is returned without error
 * when the cap is hit.
 */
export function solveKepler(meanAnomaly: number, eccentricity: number): number {
  const M = meanAnomaly;
  const e = eccentricity;
  const ed = e / DEG;
  let E = M + ed * Math.sin(M * DEG);
  for (let i = 0; i < KEPLER_MAX_ITERATIONS; i++) {
    const dM = M - (E - ed * Math.sin(E * DEG));
    const dE = dM / (1 - e * Math.cos(E * DEG));
    E += dE;
    if (Math.abs(dE) <= E_TOLERANCE) break;
  }
  return E;
}

/** 3-1-3 rotation of an orbital-plane vector by periapsis argument, ascending node and inclination (radians). */
export function rotate(v: Vector2, argPeriapsis: number, longAscNode: number, inclination: number): Vector3 {
  const co = Math.cos(argPeriapsis);
  const so = Math.sin(argPeriapsis);
  const cO = Math.cos(longAscNode);
  const sO = Math.sin(longAscNode);
  const ci = Math.cos(inclination);
  const si = Math.sin(inclination);
  return {
    x: (cO * co - sO * so * ci) * v.x + (-cO * so - sO * co * ci) * v.y,
    y: (sO * co + cO * so * ci) * v.x + (-sO * so + cO * co * ci) * v.y,
    z: so * si * v.x + co * si * v.y,
  };
}

/** Pure analytic state of one orbit at `time` (days), in the host body's frame. */
export function computeOrbitState(elements: OrbitalElements, time: number): OrbitState {
  const meanAnomaly = meanAnomalyAt(elements, time);
  if (elements.revolutionPeriod === 0) {
    return {
      meanAnomaly,
      eccentricAnomaly: meanAnomaly,
      orbitalPosition: { x: 0, y: 0 },
      orbitalVelocity: { x: 0, y: 0 },
      localPosition: vec3(),
      localVelocity: vec3(),
    };
  }
  const e = elements.eccentricity;
  const a = elements.semimajorAxis;
  const eccentricAnomaly = solveKepler(meanAnomaly, e);
  const E = eccentricAnomaly * DEG;
  const b = Math.sqrt(1 - e * e);
  const orbitalPosition = { x: a * (Math.cos(E) - e), y: a * b * Math.sin(E) };

  const meanMotion = (2 * Math.PI) / elements.revolutionPeriod;
  const eDot = meanMotion / (1 - e * Math.cos(E));
  const orbitalVelocity = { x: -a * Math.sin(E) * eDot, y: a * Math.cos(E) * eDot * b };

  const o = elements.argPeriapsis * DEG;
  const O = elements.longAscNode * DEG;
  const I = elements.inclination * DEG;
  return {
    meanAnomaly,
    eccentricAnomaly,
    orbitalPosition,
    orbitalVelocity,
    localPosition: rotate(orbitalPosition, o, O, I),
    localVelocity: rotate(orbitalVelocity, o, O, I),
  };
}

/** Independent per-body solve; no body reads another, so this is a plain map over the arena. */
export function updateLocal(bodies: Body[], time: number) {
  const states = bodies.map((body) => computeOrbitState(body.data, time));
  states.forEach((state, i) => (bodies[i].orbit = state));
}

/** Breadth-first composition from the primary body, parents always before children. */
export function updateGlobal(system: BodySystem) {
  const queue: { id: string; parentPosition: Vector3; parentVelocity: Vector3 }[] = [
    { id: system.primary.data.id, parentPosition: ZERO, parentVelocity: ZERO },
  ];
  for (let i = 0; i < queue.length; i++) {
    const { id, parentPosition, parentVelocity } = queue[i];
    const body = system.get(id);
    if (!body) continue;
    body.position = add(parentPosition, body.orbit.localPosition);
    body.velocity = add(parentVelocity, body.orbit.localVelocity);
    for (const child of body.orbitingBodies) {
      queue.push({ id: child, parentPosition: body.position, parentVelocity: body.velocity });
    }
  }
}

/** Repositions every body of the system for the given simulated time (days). */
export function propagate(system: BodySystem, time: number) {
  updateLocal(system.bodies, time);
  updateGlobal(system);
}
