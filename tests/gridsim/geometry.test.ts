import { describe, expect, it } from 'vitest';

import { opposite, posKey, step, turn } from '@/lib/gridsim/core/geometry';

describe('geometry', () => {
  it('turns within the horizontal plane', () => {
    expect(turn('+X', '+90')).toBe('+Y');
    expect(turn('+X', '-90')).toBe('-Y');
    expect(turn('-Y', '+90')).toBe('+X');
    expect(turn('-X', '-90')).toBe('+Y');
  });

  it('snaps vertical facings to +X before a relative turn', () => {
    expect(turn('+Z', '+90')).toBe('+Y');
    expect(turn('-Z', '-90')).toBe('-Y');
  });

  it('steps and keys positions', () => {
    expect(step({ x: 1, y: 1, z: 1 }, '-Z')).toEqual({ x: 1, y: 1, z: 0 });
    expect(opposite('+Y')).toBe('-Y');
    expect(posKey({ x: 3, y: 0, z: 2 })).toBe('3,0,2');
  });
});
