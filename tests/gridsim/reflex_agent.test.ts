import { describe, expect, it } from 'vitest';

import { ReflexAgent } from '@/lib/gridsim/agents/reflexAgent';
import { GridSimConfigError } from '@/lib/gridsim/core/config';
import { addReflex, openEnv, scriptedRng } from './fixtures';

describe('reflex agent', () => {
  it('idles off-schedule without drawing', () => {
    const env = openEnv();
    const m = addReflex(env, { id: 1, pos: { x: 1, y: 1, z: 1 }, period: 3 });
    let draws = 0;
    const rng = () => {
      draws += 1;
      return 0;
    };

    for (const t of [1, 2, 4, 5]) {
      const ev = m.tick(t, env, rng);
      expect(ev.action).toBe('idle');
      expect(ev.reason).toBe('not_scheduled');
    }
    expect(draws).toBe(0);
    expect(m.pos).toEqual({ x: 1, y: 1, z: 1 });
  });

  it('idles when the draw exceeds the move probability', () => {
    const env = openEnv();
    const m = addReflex(env, { id: 1, pos: { x: 1, y: 1, z: 1 }, moveProbability: 0.7 });
    const ev = m.tick(0, env, scriptedRng([0.9]));
    expect(ev.reason).toBe('probability_not_met');
    expect(ev.success).toBe(false);
    expect(ev.direction).toBeNull();
  });

  it('moves to a free neighbour picked from the canonical order', () => {
    const env = openEnv();
    const m = addReflex(env, { id: 1, pos: { x: 1, y: 1, z: 1 } });
    expect(m.validMoves(env)).toEqual(['+X', '+Y', '+Z']);

    const ev = m.tick(0, env, scriptedRng([0.1, 0.5]));
    expect(ev).toEqual({
      agentId: 1,
      kind: 'reflex',
      tick: 0,
      action: 'move',
      success: true,
      reason: 'random_move',
      direction: '+Y',
      from: { x: 1, y: 1, z: 1 },
      position: { x: 1, y: 2, z: 1 },
    });
    expect(m.actionsTaken).toBe(1);
  });

  it('ignores other agents when moving', () => {
    const env = openEnv();
    addReflex(env, { id: 2, pos: { x: 2, y: 1, z: 1 } });
    const m = addReflex(env, { id: 1, pos: { x: 1, y: 1, z: 1 } });
    const ev = m.tick(0, env, scriptedRng([0, 0]));
    expect(ev.direction).toBe('+X');
    expect(m.pos).toEqual({ x: 2, y: 1, z: 1 });
  });

  it('idles when boxed in', () => {
    const env = openEnv(3);
    const m = addReflex(env, { id: 1, pos: { x: 1, y: 1, z: 1 } });
    expect(m.tick(0, env, scriptedRng([0])).reason).toBe('no_valid_moves');
  });

  it('rejects bad parameters at construction', () => {
    expect(() => new ReflexAgent({ id: 1, pos: { x: 1, y: 1, z: 1 }, period: 0 })).toThrow(GridSimConfigError);
    expect(() => new ReflexAgent({ id: 1, pos: { x: 1, y: 1, z: 1 }, moveProbability: -0.1 })).toThrow(
      GridSimConfigError
    );
  });
});
