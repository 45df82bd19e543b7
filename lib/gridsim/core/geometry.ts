// lib/gridsim/core/geometry.ts
// Grid coordinates, the six facings, and the turn rules shared by all agents.

export type Vec3 = { x: number; y: number; z: number };

export type Orientation = '+X' | '-X' | '+Y' | '-Y' | '+Z' | '-Z';

export type TurnSense = '+90' | '-90';

// Canonical scan order. Reflex moves and neighbourhood scans both rely on it.
export const ORIENTATIONS: readonly Orientation[] = ['+X', '-X', '+Y', '-Y', '+Z', '-Z'];

export const ORIENTATION_VECTORS: Readonly<Record<Orientation, Vec3>> = {
  '+X': { x: 1, y: 0, z: 0 },
  '-X': { x: -1, y: 0, z: 0 },
  '+Y': { x: 0, y: 1, z: 0 },
  '-Y': { x: 0, y: -1, z: 0 },
  '+Z': { x: 0, y: 0, z: 1 },
  '-Z': { x: 0, y: 0, z: -1 },
};

const OPPOSITES: Readonly<Record<Orientation, Orientation>> = {
  '+X': '-X',
  '-X': '+X',
  '+Y': '-Y',
  '-Y': '+Y',
  '+Z': '-Z',
  '-Z': '+Z',
};

// Relative turns stay in the horizontal plane; only absolute alignment reaches ±Z.
export const HORIZONTAL_CYCLE: readonly Orientation[] = ['+X', '+Y', '-X', '-Y'];

export function isOrientation(v: unknown): v is Orientation {
  return ORIENTATIONS.some((o) => o === v);
}

export function opposite(o: Orientation): Orientation {
  return OPPOSITES[o];
}

export function turn(o: Orientation, sense: TurnSense): Orientation {
  // Vertical facings snap to +X before rotating.
  const i = Math.max(0, HORIZONTAL_CYCLE.indexOf(o));
  const delta = sense === '+90' ? 1 : HORIZONTAL_CYCLE.length - 1;
  return HORIZONTAL_CYCLE[(i + delta) % HORIZONTAL_CYCLE.length];
}

export function add(p: Vec3, d: Vec3): Vec3 {
  return { x: p.x + d.x, y: p.y + d.y, z: p.z + d.z };
}

export function step(p: Vec3, o: Orientation): Vec3 {
  return add(p, ORIENTATION_VECTORS[o]);
}

export function samePos(a: Vec3, b: Vec3): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function posKey(p: Vec3): string {
  return `${p.x},${p.y},${p.z}`;
}
