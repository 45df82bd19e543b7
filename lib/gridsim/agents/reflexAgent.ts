// lib/gridsim/agents/reflexAgent.ts
// Energy entity: schedule-gated, probability-gated random walker with no memory.

import type { Environment } from '../core/environment';
import type { Orientation, Vec3 } from '../core/geometry';
import { ORIENTATIONS, step } from '../core/geometry';
import { assertIntAtLeast, assertProbability } from '../core/config';
import type { Rng } from '../core/rng';
import { pickOne } from '../core/rng';

export type ReflexIdleReason = 'not_scheduled' | 'probability_not_met' | 'no_valid_moves';

export type ReflexTickEvent = {
  agentId: number;
  kind: 'reflex';
  tick: number;
  action: 'move' | 'idle';
  success: boolean;
  reason: ReflexIdleReason | 'random_move';
  direction: Orientation | null;
  from: Vec3;
  position: Vec3;
};

export type ReflexAgentOptions = {
  id: number;
  pos: Vec3;
  moveProbability?: number;
  period?: number;
};

export class ReflexAgent {
  public readonly kind = 'reflex' as const;
  public readonly id: number;
  public pos: Vec3;
  public readonly moveProbability: number;
  public readonly period: number;
  public actionsTaken = 0;

  constructor(opts: ReflexAgentOptions) {
    const p = opts.moveProbability ?? 0.7;
    const k = opts.period ?? 1;
    assertProbability('moveProbability', p);
    assertIntAtLeast('period', k, 1);
    this.id = opts.id;
    this.pos = { ...opts.pos };
    this.moveProbability = p;
    this.period = k;
  }

  // Free orthogonal neighbours in canonical order. Other agents never block.
  validMoves(env: Environment): Orientation[] {
    return ORIENTATIONS.filter((o) => env.cellType(step(this.pos, o)) === 'free');
  }

  tick(t: number, env: Environment, rng: Rng): ReflexTickEvent {
    const from = { ...this.pos };

    if (t % this.period !== 0) return this.idle(t, from, 'not_scheduled');
    if (rng() > this.moveProbability) return this.idle(t, from, 'probability_not_met');

    const dir = pickOne(rng, this.validMoves(env));
    if (!dir) return this.idle(t, from, 'no_valid_moves');

    this.pos = step(this.pos, dir);
    this.actionsTaken += 1;
    return {
      agentId: this.id,
      kind: 'reflex',
      tick: t,
      action: 'move',
      success: true,
      reason: 'random_move',
      direction: dir,
      from,
      position: { ...this.pos },
    };
  }

  private idle(t: number, from: Vec3, reason: ReflexIdleReason): ReflexTickEvent {
    return {
      agentId: this.id,
      kind: 'reflex',
      tick: t,
      action: 'idle',
      success: false,
      reason,
      direction: null,
      from,
      position: { ...this.pos },
    };
  }
}
