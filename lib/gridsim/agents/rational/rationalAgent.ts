// lib/gridsim/agents/rational/rationalAgent.ts
// Material agent: perceive -> decide -> act -> remember, with loop evasion.

import type { Environment } from '../../core/environment';
import type { LoopDetectionConfig } from '../../core/config';
import { DEFAULT_LOOP_CONFIG, GridSimConfigError, assertIntAtLeast, assertProbability, validateLoopConfig } from '../../core/config';
import type { Orientation, TurnSense, Vec3 } from '../../core/geometry';
import { isOrientation } from '../../core/geometry';
import type { Rng } from '../../core/rng';
import type { MetricsSink } from '../../metrics/metrics';
import { NOOP_METRICS } from '../../metrics/metrics';
import { DecisionTable } from './decisionTable';
import type { AdvanceOutcome, EffectorOutcome } from './effectors';
import { advance, destroy, reorient } from './effectors';
import type { LoopReport } from './memory';
import { AgentMemory, chooseEvasionHeading, summarizePercept } from './memory';
import type { Command, Decision, DecisionRule, DecisionTier, EffectorKind, PolicyOptions } from './policy';
import { decide } from './policy';
import type { Percept } from './sensors';
import { perceive } from './sensors';

export type RationalStatus = 'active' | 'destroyed';

export type EvasionRecord = {
  heading: Orientation;
  advance: AdvanceOutcome | null;
};

export type RationalTickEvent = {
  agentId: number;
  kind: 'rational';
  tick: number;
  action: EffectorKind | 'none';
  success: boolean;
  reason: EffectorOutcome['reason'] | 'inactive';
  tier: DecisionTier | null;
  rule: DecisionRule | null;
  percept: Percept | null;
  position: Vec3;
  orientation: Orientation;
  destroyed: boolean;
  outcome: EffectorOutcome | null;
  loop: LoopReport | null;
  evasion: EvasionRecord | null;
};

export type RationalAgentOptions = {
  id: number;
  pos: Vec3;
  orientation?: Orientation;
  table?: DecisionTable;
  collisionTurn?: TurnSense;
  yieldTurn?: TurnSense;
  historyLimit?: number;
  loop?: Partial<LoopDetectionConfig>;
  evasionAdvanceProbability?: number;
  metrics?: MetricsSink;
};

export class RationalAgent {
  public readonly kind = 'rational' as const;
  public readonly id: number;
  public pos: Vec3;
  public orientation: Orientation;
  public status: RationalStatus = 'active';
  public readonly memory: AgentMemory;
  public lastDecision: Decision | null = null;

  private readonly policy: PolicyOptions;
  private readonly loopCfg: LoopDetectionConfig;
  private readonly evasionAdvanceProbability: number;
  private readonly metrics: MetricsSink;

  constructor(opts: RationalAgentOptions) {
    const orientation = opts.orientation ?? '+X';
    if (!isOrientation(orientation)) throw new GridSimConfigError(`unknown orientation ${String(orientation)}`);
    const historyLimit = opts.historyLimit ?? 200;
    assertIntAtLeast('historyLimit', historyLimit, 0);
    const evasionP = opts.evasionAdvanceProbability ?? 0.4;
    assertProbability('evasionAdvanceProbability', evasionP);
    const loopCfg = { ...DEFAULT_LOOP_CONFIG, ...(opts.loop ?? {}) };
    validateLoopConfig(loopCfg);

    this.id = opts.id;
    this.pos = { ...opts.pos };
    this.orientation = orientation;
    this.memory = new AgentMemory(historyLimit);
    this.policy = {
      table: opts.table ?? DecisionTable.base(),
      collisionTurn: opts.collisionTurn ?? '+90',
      yieldTurn: opts.yieldTurn ?? '+90',
    };
    this.loopCfg = loopCfg;
    this.evasionAdvanceProbability = evasionP;
    this.metrics = opts.metrics ?? NOOP_METRICS;
  }

  get active(): boolean {
    return this.status === 'active';
  }

  perceive(env: Environment, collidedLastMove = this.memory.collisionFlag): Percept {
    return perceive(env, {
      selfId: this.id,
      pos: this.pos,
      facing: this.orientation,
      collidedLastMove,
    });
  }

  decide(p: Percept): Decision {
    return decide(p, this.policy);
  }

  tick(t: number, env: Environment, rng: Rng): RationalTickEvent {
    if (!this.active || !env.isActive(this.id, 'rational')) return this.inert(t);

    const percept = this.perceive(env, this.memory.consumeCollision());
    const decision = this.decide(percept);
    this.lastDecision = decision;
    this.metrics.ruleFired(decision.table ? `table:${decision.table.reason}` : decision.rule);

    this.memory.record({
      tick: t,
      percept: summarizePercept(percept, this.pos),
      action: decision.command.effector,
      facing: this.orientation,
    });

    const outcome = this.execute(decision.command, env);
    if (outcome.effector === 'destroy') this.status = 'destroyed';

    let loop: LoopReport | null = null;
    let evasion: EvasionRecord | null = null;
    if (this.active) {
      loop = this.memory.detectLoop(this.loopCfg);
      if (loop) {
        this.metrics.count('loopsDetected');
        evasion = this.evade(env, rng);
      }
    }

    return {
      agentId: this.id,
      kind: 'rational',
      tick: t,
      action: decision.command.effector,
      success: outcome.success,
      reason: outcome.reason,
      tier: decision.tier,
      rule: decision.rule,
      percept,
      position: { ...this.pos },
      orientation: this.orientation,
      destroyed: this.status === 'destroyed',
      outcome,
      loop,
      evasion,
    };
  }

  execute(cmd: Command, env: Environment): EffectorOutcome {
    switch (cmd.effector) {
      case 'advance':
        return advance(this, env, this.metrics);
      case 'reorient':
        return reorient(this, cmd.turn, this.metrics);
      case 'destroy':
        return destroy(this, env, this.metrics);
    }
  }

  private evade(env: Environment, rng: Rng): EvasionRecord | null {
    const heading = chooseEvasionHeading(this.orientation, this.memory.history, rng);
    if (!heading) return null;
    this.metrics.count('evasions');
    reorient(this, { mode: 'absolute', target: heading }, this.metrics);
    const moved = rng() < this.evasionAdvanceProbability ? advance(this, env, this.metrics) : null;
    return { heading, advance: moved };
  }

  private inert(t: number): RationalTickEvent {
    return {
      agentId: this.id,
      kind: 'rational',
      tick: t,
      action: 'none',
      success: false,
      reason: 'inactive',
      tier: null,
      rule: null,
      percept: null,
      position: { ...this.pos },
      orientation: this.orientation,
      destroyed: this.status === 'destroyed',
      outcome: null,
      loop: null,
      evasion: null,
    };
  }
}
