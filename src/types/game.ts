export type BodyId = string;
export type ShipId = string;

export interface Vector2 {
  x: number;
  y: number;
}

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** Body classes ordered from largest to smallest; the catalog filter relies on this order. */
export const BODY_TYPES = ['star', 'planet', 'dwarfPlanet', 'moon', 'asteroid', 'comet'] as const;
export type BodyType = (typeof BODY_TYPES)[number];

export interface OrbitalElements {
  eccentricity: number;
  /** km */
  semimajorAxis: number;
  /** degrees */
  inclination: number;
  /** degrees */
  longAscNode: number;
  /** degrees */
  argPeriapsis: number;
  /** degrees */
  initialMeanAnomaly: number;
  /** days; 0 for the primary body */
  revolutionPeriod: number;
}

/** One record of the static body catalog. */
export interface BodyData extends OrbitalElements {
  id: BodyId;
  name: string;
  bodyType: BodyType;
  /** kg */
  mass: number;
  /** km */
  radius: number;
  hostBody?: BodyId;
}

export interface OrbitState {
  meanAnomaly: number;
  eccentricAnomaly: number;
  /** 2D position in the orbital plane around the host body */
  orbitalPosition: Vector2;
  orbitalVelocity: Vector2;
  /** 3D position relative to the host body (km) */
  localPosition: Vector3;
  /** 3D velocity relative to the host body (km/day) */
  localVelocity: Vector3;
}

export interface Body {
  data: BodyData;
  /** Filled when the system is built, from the catalog's host links. */
  orbitingBodies: BodyId[];
  /** Distance from the primary body in the hierarchy (primary = 0). */
  depth: number;
  hillRadius: number;
  orbit: OrbitState;
  /** World-space, relative to the primary body. */
  position: Vector3;
  velocity: Vector3;
}

export type BodiesConfig =
  | { kind: 'smallestBodyType'; bodyType: BodyType }
  | { kind: 'ids'; ids: BodyId[] };

export interface ShipInfo {
  id: ShipId;
  spawnPosition: Vector3;
  spawnVelocity: Vector3;
}

export interface Influence {
  /** Innermost body whose sphere of influence contains the ship. */
  mainInfluencer: BodyId;
  /** Bodies whose gravity is summed for the ship, primary first. */
  influencers: BodyId[];
}

export interface ShipState {
  info: ShipInfo;
  position: Vector3;
  velocity: Vector3;
  acceleration: Vector3;
  influence: Influence;
}

export interface ShipSnapshot {
  id: ShipId;
  position: Vector3;
  velocity: Vector3;
}

export interface Snapshot {
  tick: number;
  ships: ShipSnapshot[];
}
