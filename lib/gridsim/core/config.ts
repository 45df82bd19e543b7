// lib/gridsim/core/config.ts
// Simulation parameters, their defaults, and construction-time validation.

import type { TurnSense } from './geometry';

export class GridSimConfigError extends Error {
  constructor(message: string) {
    super(`GridSim: ${message}`);
    this.name = 'GridSimConfigError';
  }
}

export type LoopDetectionConfig = {
  minPatternLength: number;
  minRepetitions: number;
  // Consecutive repeats needed before a loop is reported.
  threshold: number;
};

export type SimConfig = {
  scenarioId: string;
  seed: number;

  size: number;
  blockedFraction: number;
  // Optional complement of blockedFraction; both must sum to 1 when given.
  freeFraction?: number;
  keepCenterFree: boolean;

  rationalCount: number;
  reflexCount: number;

  reflexPeriod: number;           // K: reflex agents act when tick % K == 0
  reflexMoveProbability: number;  // p

  collisionTurn: TurnSense;
  yieldTurn: TurnSense;
  historyLimit: number;           // 0 = unbounded
  loop: LoopDetectionConfig;
  evasionAdvanceProbability: number;

  maxTicks: number;
  placementAttempts: number;
  maxRecords?: number;
};

export const DEFAULT_LOOP_CONFIG: LoopDetectionConfig = {
  minPatternLength: 2,
  minRepetitions: 2,
  threshold: 2,
};

export const DEFAULT_SIM_CONFIG: SimConfig = {
  scenarioId: 'scenario:gridsim:default',
  seed: 1,
  size: 6,
  blockedFraction: 0.2,
  keepCenterFree: true,
  rationalCount: 2,
  reflexCount: 2,
  reflexPeriod: 3,
  reflexMoveProbability: 0.7,
  collisionTurn: '+90',
  yieldTurn: '+90',
  historyLimit: 200,
  loop: DEFAULT_LOOP_CONFIG,
  evasionAdvanceProbability: 0.4,
  maxTicks: 15,
  placementAttempts: 100,
};

export function assertIntAtLeast(name: string, v: number, min: number): void {
  if (!Number.isInteger(v) || v < min) {
    throw new GridSimConfigError(`${name} must be an integer >= ${min}, got ${v}`);
  }
}

export function assertProbability(name: string, v: number): void {
  if (!Number.isFinite(v) || v < 0 || v > 1) {
    throw new GridSimConfigError(`${name} must be within [0, 1], got ${v}`);
  }
}

export function validateLoopConfig(cfg: LoopDetectionConfig): void {
  assertIntAtLeast('loop.minPatternLength', cfg.minPatternLength, 1);
  assertIntAtLeast('loop.minRepetitions', cfg.minRepetitions, 1);
  assertIntAtLeast('loop.threshold', cfg.threshold, 1);
}

function isTurnSense(v: unknown): v is TurnSense {
  return v === '+90' || v === '-90';
}

export type SimConfigInput = Partial<Omit<SimConfig, 'loop'>> & { loop?: Partial<LoopDetectionConfig> };

// Fill every missing field from the defaults, then validate the whole thing.
export function resolveSimConfig(raw: SimConfigInput = {}): SimConfig {
  const d = DEFAULT_SIM_CONFIG;
  const cfg: SimConfig = {
    scenarioId: raw.scenarioId ?? d.scenarioId,
    seed: raw.seed ?? d.seed,
    size: raw.size ?? d.size,
    blockedFraction: raw.blockedFraction ?? (raw.freeFraction !== undefined ? 1 - raw.freeFraction : d.blockedFraction),
    freeFraction: raw.freeFraction,
    keepCenterFree: raw.keepCenterFree ?? d.keepCenterFree,
    rationalCount: raw.rationalCount ?? d.rationalCount,
    reflexCount: raw.reflexCount ?? d.reflexCount,
    reflexPeriod: raw.reflexPeriod ?? d.reflexPeriod,
    reflexMoveProbability: raw.reflexMoveProbability ?? d.reflexMoveProbability,
    collisionTurn: raw.collisionTurn ?? d.collisionTurn,
    yieldTurn: raw.yieldTurn ?? d.yieldTurn,
    historyLimit: raw.historyLimit ?? d.historyLimit,
    loop: { ...DEFAULT_LOOP_CONFIG, ...(raw.loop ?? {}) },
    evasionAdvanceProbability: raw.evasionAdvanceProbability ?? d.evasionAdvanceProbability,
    maxTicks: raw.maxTicks ?? d.maxTicks,
    placementAttempts: raw.placementAttempts ?? d.placementAttempts,
    maxRecords: raw.maxRecords,
  };

  if (!Number.isFinite(cfg.seed)) throw new GridSimConfigError(`seed must be a finite number, got ${cfg.seed}`);
  assertIntAtLeast('size', cfg.size, 1);
  assertProbability('blockedFraction', cfg.blockedFraction);
  if (cfg.freeFraction !== undefined) {
    assertProbability('freeFraction', cfg.freeFraction);
    if (Math.abs(cfg.freeFraction + cfg.blockedFraction - 1) > 1e-9) {
      throw new GridSimConfigError(
        `freeFraction (${cfg.freeFraction}) and blockedFraction (${cfg.blockedFraction}) must sum to 1`
      );
    }
  }
  assertIntAtLeast('rationalCount', cfg.rationalCount, 0);
  assertIntAtLeast('reflexCount', cfg.reflexCount, 0);
  assertIntAtLeast('reflexPeriod', cfg.reflexPeriod, 1);
  assertProbability('reflexMoveProbability', cfg.reflexMoveProbability);
  if (!isTurnSense(cfg.collisionTurn)) throw new GridSimConfigError(`collisionTurn must be +90 or -90`);
  if (!isTurnSense(cfg.yieldTurn)) throw new GridSimConfigError(`yieldTurn must be +90 or -90`);
  assertIntAtLeast('historyLimit', cfg.historyLimit, 0);
  validateLoopConfig(cfg.loop);
  assertProbability('evasionAdvanceProbability', cfg.evasionAdvanceProbability);
  assertIntAtLeast('maxTicks', cfg.maxTicks, 0);
  assertIntAtLeast('placementAttempts', cfg.placementAttempts, 1);
  if (cfg.maxRecords !== undefined) assertIntAtLeast('maxRecords', cfg.maxRecords, 1);

  return cfg;
}
