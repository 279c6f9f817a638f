import fs from 'fs';
import type { BodiesConfig, Body, BodyData, BodyId, BodyType } from '../types/game.js';
import { BODY_TYPES } from '../types/game.js';
import { createLogger } from '../logger.js';
import { MAX_ID_LENGTH } from './constants.js';
import { hillRadius } from './influence.js';
import { computeOrbitState } from './orbit.js';
import { vec3 } from './vector.js';

const log = createLogger('bodies');

export const MAIN_BODIES_PATH = new URL('../../data/main_bodies.json', import.meta.url);

export const DEFAULT_BODIES_CONFIG: BodiesConfig = { kind: 'smallestBodyType', bodyType: 'planet' };

/** Fatal catalog problem (raised at load time, never during a tick). */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

export function isBodyType(v: unknown): v is BodyType {
  return typeof v === 'string' && (BODY_TYPES as readonly string[]).includes(v);
}

/** Ids are bounded in UTF-8 bytes, not characters. */
export function isValidId(v: unknown): v is string {
  return typeof v === 'string' && v.length > 0 && Buffer.byteLength(v, 'utf8') <= MAX_ID_LENGTH;
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

const NUMERIC_FIELDS = [
  'mass',
  'radius',
  'eccentricity',
  'semimajorAxis',
  'inclination',
  'longAscNode',
  'argPeriapsis',
  'initialMeanAnomaly',
  'revolutionPeriod',
] as const;

function isBodyData(v: unknown): v is BodyData {
  if (!v || typeof v !== 'object') return false;
  const rec = v as Record<string, unknown>;
  if (!isValidId(rec.id) || typeof rec.name !== 'string' || !isBodyType(rec.bodyType)) return false;
  if (rec.hostBody !== undefined && !isValidId(rec.hostBody)) return false;
  if (!NUMERIC_FIELDS.every((field) => isFiniteNumber(rec[field]))) return false;
  const { eccentricity, revolutionPeriod } = rec;
  return (
    isFiniteNumber(eccentricity) &&
    eccentricity >= 0 &&
    eccentricity < 1 &&
    isFiniteNumber(revolutionPeriod) &&
    revolutionPeriod >= 0
  );
}

/** Validates raw catalog JSON. */
export function parseCatalog(raw: unknown): BodyData[] {
  if (!Array.isArray(raw)) throw new CatalogError('body catalog must be a JSON array');
  return raw.map((entry, i) => {
    if (!isBodyData(entry)) throw new CatalogError(`invalid body record at index ${i}`);
    return entry;
  });
}

export function readMainBodies(path: URL | string = MAIN_BODIES_PATH): BodyData[] {
  const text = fs.readFileSync(path, 'utf8');
  return parseCatalog(JSON.parse(text));
}

export function bodiesConfigFilter(config: BodiesConfig): (data: BodyData) => boolean {
  switch (config.kind) {
    case 'smallestBodyType': {
      const rank = BODY_TYPES.indexOf(config.bodyType);
      return (data) => BODY_TYPES.indexOf(data.bodyType) <= rank;
    }
    case 'ids': {
      const ids = new Set(config.ids);
      return (data) => ids.has(data.id);
    }
  }
}

/**
 * Applies the config filter, then drops bodies whose host was filtered out
 * (repeatedly, so a moon of a dropped planet goes too).
 */
export function filterBodies(catalog: BodyData[], config: BodiesConfig): BodyData[] {
  let kept = catalog.filter(bodiesConfigFilter(config));
  for (;;) {
    const ids = new Set(kept.map((d) => d.id));
    const next = kept.filter((d) => d.hostBody === undefined || ids.has(d.hostBody));
    if (next.length === kept.length) return kept;
    log.debug(`dropping ${kept.length - next.length} body(ies) whose host is not loaded`);
    kept = next;
  }
}

/** Arena of bodies plus an id -> index registry. */
export class BodySystem {
  readonly bodies: Body[];
  readonly primary: Body;
  private readonly index = new Map<BodyId, number>();

  constructor(bodies: Body[], primaryId: BodyId) {
    this.bodies = bodies;
    bodies.forEach((body, i) => this.index.set(body.data.id, i));
    const primary = this.get(primaryId);
    if (!primary) throw new CatalogError(`primary body ${primaryId} is not in the system`);
    this.primary = primary;
  }

  get(id: BodyId): Body | undefined {
    const i = this.index.get(id);
    return i === undefined ? undefined : this.bodies[i];
  }

  get size(): number {
    return this.bodies.length;
  }

  /** Distance from the primary body of the farthest body. */
  systemSize(): number {
    return Math.max(0, ...this.bodies.map((b) => Math.hypot(b.position.x, b.position.y, b.position.z)));
  }
}

/**
 * Builds the runtime system from catalog records.
 * Throws CatalogError when there is no single primary body, a host is unknown,
 * an id is duplicated, or a body cannot be reached from the primary body.
 */
export function buildSystem(records: BodyData[]): BodySystem {
  const byId = new Map<BodyId, BodyData>();
  for (const data of records) {
    if (byId.has(data.id)) throw new CatalogError(`duplicate body id ${data.id}`);
    byId.set(data.id, data);
  }
  const primaries = records.filter((d) => d.hostBody === undefined);
  if (primaries.length === 0) throw new CatalogError('no primary body found');
  if (primaries.length > 1) {
    throw new CatalogError(`several primary bodies found: ${primaries.map((d) => d.id).join(', ')}`);
  }
  const primaryId = primaries[0].id;

  const children = new Map<BodyId, BodyId[]>();
  for (const data of records) {
    if (data.hostBody === undefined) continue;
    if (!byId.has(data.hostBody)) {
      throw new CatalogError(`body ${data.id} orbits unknown body ${data.hostBody}`);
    }
    const list = children.get(data.hostBody) ?? [];
    list.push(data.id);
    children.set(data.hostBody, list);
  }

  const depths = new Map<BodyId, number>([[primaryId, 0]]);
  const queue = [primaryId];
  for (let i = 0; i < queue.length; i++) {
    const id = queue[i];
    for (const child of children.get(id) ?? []) {
      depths.set(child, (depths.get(id) ?? 0) + 1);
      queue.push(child);
    }
  }
  const unreachable = records.filter((d) => !depths.has(d.id)).map((d) => d.id);
  if (unreachable.length) {
    throw new CatalogError(`bodies unreachable from ${primaryId}: ${unreachable.join(', ')}`);
  }

  const bodies: Body[] = records.map((data) => {
    const host = data.hostBody === undefined ? undefined : byId.get(data.hostBody);
    return {
      data,
      orbitingBodies: children.get(data.id) ?? [],
      depth: depths.get(data.id) ?? 0,
      hillRadius: hillRadius(data, host?.mass),
      orbit: computeOrbitState(data, 0),
      position: vec3(),
      velocity: vec3(),
    };
  });
  log.info(`built system of ${bodies.length} bodies around ${primaryId}`);
  return new BodySystem(bodies, primaryId);
}

export function loadSystem(catalog: BodyData[], config: BodiesConfig): BodySystem {
  return buildSystem(filterBodies(catalog, config));
}
