// lib/gridsim/agents/rational/sensors.ts
// Five percept channels, read fresh from the world every tick.

import type { Environment } from '../../core/environment';
import type { Orientation, Vec3 } from '../../core/geometry';
import { ORIENTATIONS, opposite, samePos, step } from '../../core/geometry';

export type EnergyPosition = 'ahead' | 'side';

export type EnergyReading =
  | { detected: false }
  | { detected: true; position: EnergyPosition; direction: Orientation };

export type Percept = {
  facing: Orientation;
  energyInCell: boolean;
  materialAhead: boolean;
  energyNearby: EnergyReading;
  // Memory-derived: set by the previous advance, not a live lookahead.
  collidedLastMove: boolean;
};

export type SensorInput = {
  selfId: number;
  pos: Vec3;
  facing: Orientation;
  collidedLastMove: boolean;
};

export function senseEnergyInCell(env: Environment, pos: Vec3): boolean {
  return env.reflexAt(pos) !== undefined;
}

export function senseMaterialAhead(env: Environment, selfId: number, pos: Vec3, facing: Orientation): boolean {
  const front = step(pos, facing);
  return env.rationalAgents().some((r) => r.id !== selfId && samePos(r.pos, front));
}

// Scans the five non-rear neighbours, forward cell first.
export function senseEnergyNearby(env: Environment, pos: Vec3, facing: Orientation): EnergyReading {
  const rear = opposite(facing);
  const order: Orientation[] = [facing, ...ORIENTATIONS.filter((o) => o !== facing && o !== rear)];
  for (const dir of order) {
    if (env.reflexAt(step(pos, dir))) {
      return { detected: true, position: dir === facing ? 'ahead' : 'side', direction: dir };
    }
  }
  return { detected: false };
}

export function perceive(env: Environment, input: SensorInput): Percept {
  return {
    facing: input.facing,
    energyInCell: senseEnergyInCell(env, input.pos),
    materialAhead: senseMaterialAhead(env, input.selfId, input.pos, input.facing),
    energyNearby: senseEnergyNearby(env, input.pos, input.facing),
    collidedLastMove: input.collidedLastMove,
  };
}
