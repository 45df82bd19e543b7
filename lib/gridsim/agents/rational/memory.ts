// lib/gridsim/agents/rational/memory.ts
// Episodic memory: (tick, percept summary, action) log, collision flag,
// trailing-pattern loop detection and the evasion heading it suggests.

import type { LoopDetectionConfig } from '../../core/config';
import { DEFAULT_LOOP_CONFIG } from '../../core/config';
import type { Orientation, Vec3 } from '../../core/geometry';
import { ORIENTATIONS, opposite, posKey } from '../../core/geometry';
import type { Rng } from '../../core/rng';
import { pickOne } from '../../core/rng';
import type { EffectorKind } from './policy';
import type { Percept } from './sensors';

export type MemoryEntry = {
  tick: number;
  percept: string;
  action: EffectorKind;
  facing: Orientation;
};

export type LoopReport = { length: number; repetitions: number };

// Facings looked back over when choosing an evasion heading.
export const EVASION_LOOKBACK = 6;

export function summarizePercept(p: Percept, pos: Vec3): string {
  const m = p.energyNearby.detected ? p.energyNearby.position : 'none';
  const b = (v: boolean) => (v ? 1 : 0);
  return `${p.facing}|${posKey(pos)}|E${b(p.energyInCell)}|R${b(p.materialAhead)}|M:${m}|V${b(p.collidedLastMove)}`;
}

const sameEntry = (a: MemoryEntry, b: MemoryEntry) => a.percept === b.percept && a.action === b.action;

export function detectLoop(
  history: readonly MemoryEntry[],
  cfg: LoopDetectionConfig = DEFAULT_LOOP_CONFIG
): LoopReport | null {
  const n = history.length;
  if (n < cfg.minPatternLength * cfg.minRepetitions) return null;

  const maxLen = Math.floor(n / cfg.minRepetitions);
  for (let len = cfg.minPatternLength; len <= maxLen; len++) {
    let repetitions = 1;
    // Window k covers history[n - (k+1)*len, n - k*len).
    for (let k = 1; (k + 1) * len <= n; k++) {
      let equal = true;
      for (let j = 0; j < len; j++) {
        if (!sameEntry(history[n - len + j], history[n - (k + 1) * len + j])) {
          equal = false;
          break;
        }
      }
      if (!equal) break;
      repetitions++;
    }
    if (repetitions >= cfg.threshold) return { length: len, repetitions };
  }
  return null;
}

// Best-effort cycle breaker: a heading that is neither current, reverse, nor recently used.
export function chooseEvasionHeading(
  current: Orientation,
  history: readonly MemoryEntry[],
  rng: Rng
): Orientation | null {
  const recent = new Set(history.slice(-EVASION_LOOKBACK).map((h) => h.facing));
  const reverse = opposite(current);
  const allowed = ORIENTATIONS.filter((o) => o !== current && o !== reverse);
  const fresh = allowed.filter((o) => !recent.has(o));
  return pickOne(rng, fresh.length ? fresh : allowed);
}

export class AgentMemory {
  private entries: MemoryEntry[] = [];
  private collided = false;
  private readonly limit: number;

  // limit 0 keeps everything.
  constructor(limit = 200) {
    this.limit = limit;
  }

  get history(): readonly MemoryEntry[] {
    return this.entries;
  }

  record(entry: MemoryEntry): void {
    this.entries.push(entry);
    if (this.limit > 0 && this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
  }

  get collisionFlag(): boolean {
    return this.collided;
  }

  markCollision(): void {
    this.collided = true;
  }

  clearCollision(): void {
    this.collided = false;
  }

  // Read-and-reset: the flag only survives one decision unless re-triggered.
  consumeCollision(): boolean {
    const v = this.collided;
    this.collided = false;
    return v;
  }

  detectLoop(cfg?: LoopDetectionConfig): LoopReport | null {
    return detectLoop(this.entries, cfg);
  }
}
