import { describe, expect, it } from 'vitest';
import type { BodyData } from '../../src/types/game.js';
import {
  CatalogError,
  DEFAULT_BODIES_CONFIG,
  buildSystem,
  filterBodies,
  loadSystem,
  parseCatalog,
  readMainBodies,
} from '../../src/game/bodies.js';
import { propagate } from '../../src/game/orbit.js';
import { ALL_BODIES, SMALL_CATALOG } from '../fixtures/catalog.js';

const [sol, p1, m1] = SMALL_CATALOG;

describe('main body catalog', () => {
  it('loads the sun and the planets by default', () => {
    const system = loadSystem(readMainBodies(), DEFAULT_BODIES_CONFIG);
    expect(system.primary.data.id).toBe('sun');
    expect(system.size).toBe(9);
    expect(system.bodies.every((b) => b.data.bodyType === 'star' || b.data.bodyType === 'planet')).toBe(true);
  });

  it('loads moons when asked for them', () => {
    const system = loadSystem(readMainBodies(), { kind: 'smallestBodyType', bodyType: 'moon' });
    expect(system.size).toBe(19);
    expect(system.get('earth')?.orbitingBodies).toEqual(['moon']);
    expect(system.get('moon')?.depth).toBe(2);
  });

  it('measures the system out to the farthest planet', () => {
    const system = loadSystem(readMainBodies(), DEFAULT_BODIES_CONFIG);
    propagate(system, 0);
    const size = system.systemSize();
    expect(size).toBeGreaterThan(4.4e9);
    expect(size).toBeLessThan(4.6e9);
  });
});

describe('filterBodies', () => {
  it('keeps an explicit id list', () => {
    const kept = filterBodies(SMALL_CATALOG, { kind: 'ids', ids: ['sol', 'p1', 'm1'] });
    expect(kept.map((b) => b.id)).toEqual(['sol', 'p1', 'm1']);
  });

  it('drops bodies whose host was filtered out', () => {
    const kept = filterBodies(SMALL_CATALOG, { kind: 'ids', ids: ['sol', 'm1', 'p2'] });
    expect(kept.map((b) => b.id)).toEqual(['sol', 'p2']);
  });

  it('orders body types from largest to smallest', () => {
    const kept = filterBodies(SMALL_CATALOG, { kind: 'smallestBodyType', bodyType: 'planet' });
    expect(kept.map((b) => b.id)).toEqual(['sol', 'p1', 'p2']);
    expect(filterBodies(SMALL_CATALOG, ALL_BODIES)).toHaveLength(4);
  });
});

describe('buildSystem', () => {
  it('derives children, depth and hill radius', () => {
    const system = buildSystem(SMALL_CATALOG);
    expect(system.primary.hillRadius).toBe(Infinity);
    expect(system.get('sol')?.orbitingBodies).toEqual(['p1', 'p2']);
    expect(system.get('p1')?.orbitingBodies).toEqual(['m1']);
    expect(system.get('m1')?.depth).toBe(2);
    expect(system.get('nope')).toBeUndefined();
  });

  it('needs exactly one primary body', () => {
    expect(() => buildSystem([p1, m1])).toThrow(/no primary body/);
    expect(() => buildSystem([sol, { ...sol, id: 'sol2' }])).toThrow(/several primary bodies/);
  });

  it('rejects duplicate ids and unknown hosts', () => {
    expect(() => buildSystem([sol, p1, p1])).toThrow('duplicate body id p1');
    expect(() => buildSystem([sol, m1])).toThrow('body m1 orbits unknown body p1');
  });

  it('rejects bodies that cannot be reached from the primary body', () => {
    const a: BodyData = { ...p1, id: 'a', hostBody: 'b' };
    const b: BodyData = { ...p1, id: 'b', hostBody: 'a' };
    expect(() => buildSystem([sol, a, b])).toThrow(CatalogError);
    expect(() => buildSystem([sol, a, b])).toThrow('bodies unreachable from sol: a, b');
  });
});

describe('parseCatalog', () => {
  it('accepts valid records', () => {
    expect(parseCatalog(JSON.parse(JSON.stringify(SMALL_CATALOG)))).toEqual(SMALL_CATALOG);
  });

  it('rejects a document that is not an array', () => {
    expect(() => parseCatalog({ bodies: [] })).toThrow('body catalog must be a JSON array');
  });

  it('reports the index of the first bad record', () => {
    expect(() => parseCatalog([sol, { ...p1, eccentricity: 1 }])).toThrow('invalid body record at index 1');
    expect(() => parseCatalog([{ ...sol, id: 'a-very-long-body-id' }])).toThrow('invalid body record at index 0');
    expect(() => parseCatalog([{ ...sol, bodyType: 'nebula' }])).toThrow(CatalogError);
  });
});
