// lib/gridsim/agents/rational/effectors.ts
// Advance, Reorient, Destroy. Effectors mutate only the actor's own state;
// the environment is changed through its remove/vacate calls.

import type { Environment } from '../../core/environment';
import type { Orientation, Vec3 } from '../../core/geometry';
import { step, turn as turnFrom } from '../../core/geometry';
import type { MetricsSink } from '../../metrics/metrics';
import type { AgentMemory } from './memory';
import type { Turn } from './policy';

// The slice of a rational agent an effector may touch.
export type EffectorBody = {
  readonly id: number;
  pos: Vec3;
  orientation: Orientation;
  readonly memory: AgentMemory;
};

export type AdvanceOutcome = {
  effector: 'advance';
  success: boolean;
  reason: 'advanced' | 'collision' | 'blocked_by_agent';
  from: Vec3;
  target: Vec3;
};

export type ReorientOutcome = {
  effector: 'reorient';
  success: true;
  reason: 'direct_alignment' | 'lateral_turn';
  from: Orientation;
  to: Orientation;
};

export type DestroyOutcome = {
  effector: 'destroy';
  success: boolean;
  reason: 'energy_destroyed' | 'no_target';
  removedEnergyIds: number[];
  cell: Vec3;
};

export type EffectorOutcome = AdvanceOutcome | ReorientOutcome | DestroyOutcome;

export function advance(body: EffectorBody, env: Environment, metrics: MetricsSink): AdvanceOutcome {
  const from = { ...body.pos };
  const target = step(body.pos, body.orientation);
  metrics.count('advances');

  if (env.cellType(target) === 'blocked') {
    body.memory.markCollision();
    metrics.count('collisions');
    return { effector: 'advance', success: false, reason: 'collision', from, target };
  }

  const occupant = env.rationalAt(target);
  if (occupant && occupant.id !== body.id) {
    return { effector: 'advance', success: false, reason: 'blocked_by_agent', from, target };
  }

  body.pos = target;
  body.memory.clearCollision();
  return { effector: 'advance', success: true, reason: 'advanced', from, target };
}

export function reorient(body: EffectorBody, t: Turn, metrics: MetricsSink): ReorientOutcome {
  const from = body.orientation;
  metrics.count('rotations');
  if (t.mode === 'absolute') {
    body.orientation = t.target;
    return { effector: 'reorient', success: true, reason: 'direct_alignment', from, to: t.target };
  }
  body.orientation = turnFrom(from, t.sense);
  return { effector: 'reorient', success: true, reason: 'lateral_turn', from, to: body.orientation };
}

// One-shot: the actor leaves play whether or not anything was caught.
export function destroy(body: EffectorBody, env: Environment, metrics: MetricsSink): DestroyOutcome {
  const cell = { ...body.pos };
  const removedEnergyIds: number[] = [];
  for (const m of env.reflexAllAt(cell)) {
    if (env.remove(m.id, 'reflex')) removedEnergyIds.push(m.id);
  }
  env.vacate(cell);
  env.remove(body.id, 'rational');

  metrics.count('destroys');
  metrics.count('energyDestroyed', removedEnergyIds.length);

  const success = removedEnergyIds.length > 0;
  return {
    effector: 'destroy',
    success,
    reason: success ? 'energy_destroyed' : 'no_target',
    removedEnergyIds,
    cell,
  };
}
