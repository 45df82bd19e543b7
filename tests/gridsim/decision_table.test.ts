import { describe, expect, it } from 'vitest';

import { DEFAULT_ENTRY, DecisionTable, allPerceptKeys } from '@/lib/gridsim/agents/rational/decisionTable';

describe('decision table', () => {
  it('covers every percept key', () => {
    const keys = allPerceptKeys();
    expect(keys).toHaveLength(24);
    expect(new Set(keys).size).toBe(24);
    expect(DecisionTable.base().size).toBe(24);
  });

  it('encodes the same precedence as the policy', () => {
    const t = DecisionTable.base();
    expect(t.lookup('E1:R1:M-side:V1').entry).toEqual({ effector: 'destroy', reason: 'energy_in_cell' });
    expect(t.lookup('E0:R1:M-ahead:V1').entry).toEqual({
      effector: 'reorient',
      turn: '+90',
      reason: 'obstacle_detected',
    });
    expect(t.lookup('E0:R1:M-ahead:V0').entry.reason).toBe('agent_ahead');
    expect(t.lookup('E0:R0:M-ahead:V0').entry).toEqual({ effector: 'advance', reason: 'energy_ahead' });
    expect(t.lookup('E0:R0:M-side:V0').entry.reason).toBe('align_with_energy');
  });

  it('returns a fresh table from with()', () => {
    const base = DecisionTable.base();
    const next = base.with('E0:R0:M-none:V0', { effector: 'reorient', turn: '-90', reason: 'default_action' });
    expect(base.lookup('E0:R0:M-none:V0').entry).toEqual(DEFAULT_ENTRY);
    expect(next.lookup('E0:R0:M-none:V0').entry).toEqual({
      effector: 'reorient',
      turn: '-90',
      reason: 'default_action',
    });
  });

  it('resolves missing keys to the fallback', () => {
    const t = new DecisionTable([], { effector: 'reorient', turn: '-90', reason: 'default_action' });
    expect(t.has('E0:R0:M-none:V0')).toBe(false);
    expect(t.lookup('E0:R0:M-none:V0')).toEqual({
      entry: { effector: 'reorient', turn: '-90', reason: 'default_action' },
      matched: false,
    });
  });
});
