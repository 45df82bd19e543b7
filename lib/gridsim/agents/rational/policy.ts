// lib/gridsim/agents/rational/policy.ts
// Priority-ordered percept -> command selection. First matching tier wins.

import type { Orientation, TurnSense } from '../../core/geometry';
import type { Percept } from './sensors';
import { DecisionTable, perceptKey, type PerceptKey, type TableEntry, type TableReason } from './decisionTable';

export type Turn =
  | { mode: 'relative'; sense: TurnSense }
  | { mode: 'absolute'; target: Orientation };

export type Command =
  | { effector: 'advance' }
  | { effector: 'destroy' }
  | { effector: 'reorient'; turn: Turn };

export type EffectorKind = Command['effector'];

export type DecisionTier = 1 | 2 | 3 | 4 | 5;

export type DecisionRule =
  | 'energy_in_cell'
  | 'collision_avoidance'
  | 'yield_to_agent'
  | 'energy_ahead'
  | 'align_with_energy'
  | 'table';

export type Decision = {
  tier: DecisionTier;
  rule: DecisionRule;
  command: Command;
  // Only set for tier 5.
  table?: { key: PerceptKey; matched: boolean; reason: TableReason };
};

export type PolicyOptions = {
  table: DecisionTable;
  collisionTurn: TurnSense;
  yieldTurn: TurnSense;
};

export const DEFAULT_POLICY: PolicyOptions = {
  table: DecisionTable.base(),
  collisionTurn: '+90',
  yieldTurn: '+90',
};

export function decide(p: Percept, opts: PolicyOptions = DEFAULT_POLICY): Decision {
  if (p.energyInCell) {
    return { tier: 1, rule: 'energy_in_cell', command: { effector: 'destroy' } };
  }

  // Collision avoidance outranks yielding and hunting.
  if (p.collidedLastMove) {
    return {
      tier: 2,
      rule: 'collision_avoidance',
      command: { effector: 'reorient', turn: { mode: 'relative', sense: opts.collisionTurn } },
    };
  }

  if (p.materialAhead) {
    return {
      tier: 3,
      rule: 'yield_to_agent',
      command: { effector: 'reorient', turn: { mode: 'relative', sense: opts.yieldTurn } },
    };
  }

  const e = p.energyNearby;
  if (e.detected) {
    if (e.position === 'ahead') {
      return { tier: 4, rule: 'energy_ahead', command: { effector: 'advance' } };
    }
    return {
      tier: 4,
      rule: 'align_with_energy',
      command: { effector: 'reorient', turn: { mode: 'absolute', target: e.direction } },
    };
  }

  const key = perceptKey(p);
  const { entry, matched } = opts.table.lookup(key);
  return {
    tier: 5,
    rule: 'table',
    command: commandFromEntry(entry, p),
    table: { key, matched, reason: entry.reason },
  };
}

function commandFromEntry(entry: TableEntry, p: Percept): Command {
  switch (entry.effector) {
    case 'advance':
      return { effector: 'advance' };
    case 'destroy':
      return { effector: 'destroy' };
    case 'reorient': {
      if (entry.turn !== 'toward_energy') {
        return { effector: 'reorient', turn: { mode: 'relative', sense: entry.turn } };
      }
      const e = p.energyNearby;
      return e.detected
        ? { effector: 'reorient', turn: { mode: 'absolute', target: e.direction } }
        : { effector: 'reorient', turn: { mode: 'relative', sense: '+90' } };
    }
  }
}
