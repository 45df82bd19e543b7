// lib/gridsim/agents/rational/decisionTable.ts
// Percept key -> action entry. Total over the key domain through an explicit default.

import type { TurnSense } from '../../core/geometry';
import type { Percept } from './sensors';

type Bit = '0' | '1';
export type EnergyClass = 'none' | 'ahead' | 'side';

// energy-in-cell, material-ahead, nearby energy class, collided-last-move
export type PerceptKey = `E${Bit}:R${Bit}:M-${EnergyClass}:V${Bit}`;

export type TableReason =
  | 'energy_in_cell'
  | 'obstacle_detected'
  | 'agent_ahead'
  | 'energy_ahead'
  | 'align_with_energy'
  | 'default_action';

export type TableAction =
  | { effector: 'advance' }
  | { effector: 'destroy' }
  | { effector: 'reorient'; turn: TurnSense | 'toward_energy' };

export type TableEntry = TableAction & { reason: TableReason };

export const DEFAULT_ENTRY: TableEntry = { effector: 'advance', reason: 'default_action' };

const bit = (b: boolean): Bit => (b ? '1' : '0');

export function makePerceptKey(args: {
  energyInCell: boolean;
  materialAhead: boolean;
  energy: EnergyClass;
  collided: boolean;
}): PerceptKey {
  return `E${bit(args.energyInCell)}:R${bit(args.materialAhead)}:M-${args.energy}:V${bit(args.collided)}`;
}

export function perceptKey(p: Percept): PerceptKey {
  return makePerceptKey({
    energyInCell: p.energyInCell,
    materialAhead: p.materialAhead,
    energy: p.energyNearby.detected ? p.energyNearby.position : 'none',
    collided: p.collidedLastMove,
  });
}

export function allPerceptKeys(): PerceptKey[] {
  const out: PerceptKey[] = [];
  const bools = [true, false];
  const classes: EnergyClass[] = ['ahead', 'side', 'none'];
  for (const energyInCell of bools) {
    for (const materialAhead of bools) {
      for (const energy of classes) {
        for (const collided of bools) {
          out.push(makePerceptKey({ energyInCell, materialAhead, energy, collided }));
        }
      }
    }
  }
  return out;
}

// Same precedence the policy applies, spelled out per key.
function baseEntryFor(key: PerceptKey): TableEntry {
  if (key.startsWith('E1')) return { effector: 'destroy', reason: 'energy_in_cell' };
  if (key.endsWith('V1')) return { effector: 'reorient', turn: '+90', reason: 'obstacle_detected' };
  if (key.includes('R1')) return { effector: 'reorient', turn: '+90', reason: 'agent_ahead' };
  if (key.includes('M-ahead')) return { effector: 'advance', reason: 'energy_ahead' };
  if (key.includes('M-side')) return { effector: 'reorient', turn: 'toward_energy', reason: 'align_with_energy' };
  return DEFAULT_ENTRY;
}

export class DecisionTable {
  private readonly entries: ReadonlyMap<PerceptKey, TableEntry>;
  public readonly fallback: TableEntry;

  constructor(entries: Iterable<readonly [PerceptKey, TableEntry]>, fallback: TableEntry = DEFAULT_ENTRY) {
    this.entries = new Map(entries);
    this.fallback = fallback;
  }

  static base(): DecisionTable {
    return new DecisionTable(allPerceptKeys().map((k) => [k, baseEntryFor(k)] as const));
  }

  has(key: PerceptKey): boolean {
    return this.entries.has(key);
  }

  lookup(key: PerceptKey): { entry: TableEntry; matched: boolean } {
    const entry = this.entries.get(key);
    return entry ? { entry, matched: true } : { entry: this.fallback, matched: false };
  }

  // Copy with one entry replaced; tables stay immutable for the session.
  with(key: PerceptKey, entry: TableEntry): DecisionTable {
    const next = new Map(this.entries);
    next.set(key, entry);
    return new DecisionTable(next, this.fallback);
  }

  get size(): number {
    return this.entries.size;
  }
}
