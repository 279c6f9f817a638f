import type { BodiesConfig, BodyData } from '../../src/types/game.js';

// Circular, flat orbits: at t = 0 every body sits on its host's x axis
// (p2 on the negative side, half a revolution in).
const flat = { eccentricity: 0, inclination: 0, longAscNode: 0, argPeriapsis: 0, radius: 1 };

export const SMALL_CATALOG: BodyData[] = [
  {
    ...flat,
    id: 'sol',
    name: 'Sol',
    bodyType: 'star',
    mass: 1e30,
    semimajorAxis: 0,
    initialMeanAnomaly: 0,
    revolutionPeriod: 0,
  },
  {
    ...flat,
    id: 'p1',
    name: 'Planet One',
    bodyType: 'planet',
    hostBody: 'sol',
    mass: 1e25,
    semimajorAxis: 1e8,
    initialMeanAnomaly: 0,
    revolutionPeriod: 100,
  },
  {
    ...flat,
    id: 'm1',
    name: 'Moon One',
    bodyType: 'moon',
    hostBody: 'p1',
    mass: 1e22,
    semimajorAxis: 1e5,
    initialMeanAnomaly: 0,
    revolutionPeriod: 10,
  },
  {
    ...flat,
    id: 'p2',
    name: 'Planet Two',
    bodyType: 'planet',
    hostBody: 'sol',
    mass: 1e25,
    semimajorAxis: 2e8,
    initialMeanAnomaly: 180,
    revolutionPeriod: 200,
  },
];

export const ALL_BODIES: BodiesConfig = { kind: 'smallestBodyType', bodyType: 'moon' };
