import { describe, expect, it } from 'vitest';

import { Grid } from '@/lib/gridsim/core/grid';
import { GridSimConfigError } from '@/lib/gridsim/core/config';

describe('grid generation', () => {
  it('blocks the shell and nothing else when blockedFraction is 0', () => {
    const g = Grid.generate({ size: 6, blockedFraction: 0, seed: 1 });
    expect(g.countBlocked()).toBe(216 - 64);
    expect(g.freeCells()).toHaveLength(64);
    expect(g.cellType({ x: 0, y: 2, z: 2 })).toBe('blocked');
    expect(g.cellType({ x: 5, y: 2, z: 2 })).toBe('blocked');
    expect(g.cellType({ x: 1, y: 4, z: 2 })).toBe('free');
  });

  it('keeps the centre free even when every interior cell is drawn blocked', () => {
    const g = Grid.generate({ size: 6, blockedFraction: 1, seed: 1 });
    expect(g.countBlocked()).toBe(215);
    expect(g.cellType({ x: 3, y: 3, z: 3 })).toBe('free');

    const closed = Grid.generate({ size: 6, blockedFraction: 1, seed: 1, keepCenterFree: false });
    expect(closed.countBlocked()).toBe(216);
  });

  it('leaves a centre that lies on the shell blocked', () => {
    const g = Grid.generate({ size: 2, blockedFraction: 0, seed: 1 });
    expect(g.countBlocked()).toBe(8);
    expect(g.freeCells()).toEqual([]);
  });

  it('is deterministic for a given seed', () => {
    const a = Grid.generate({ size: 8, blockedFraction: 0.3, seed: 7 });
    const b = Grid.generate({ size: 8, blockedFraction: 0.3, seed: 7 });
    expect(a.equals(b)).toBe(true);
    expect(a.freeCells()).toEqual(b.freeCells());
  });

  it('treats out-of-bounds coordinates as blocked', () => {
    const g = Grid.generate({ size: 4, blockedFraction: 0, seed: 1 });
    expect(g.cellType({ x: -1, y: 1, z: 1 })).toBe('blocked');
    expect(g.cellType({ x: 1, y: 4, z: 1 })).toBe('blocked');
    expect(g.block({ x: 9, y: 0, z: 0 })).toBe(false);
  });

  it('treats fractional coordinates as blocked', () => {
    const g = Grid.generate({ size: 4, blockedFraction: 0, seed: 1 });
    expect(g.inBounds({ x: 1.5, y: 1, z: 1 })).toBe(false);
    expect(g.cellType({ x: 0.5, y: 1, z: 1 })).toBe('blocked');
    expect(g.cellType({ x: 1, y: 1, z: 2.25 })).toBe('blocked');
    expect(g.block({ x: 1, y: 1.5, z: 1 })).toBe(false);
    expect(g.countBlocked()).toBe(56);
  });

  it('burns a cell permanently', () => {
    const g = Grid.generate({ size: 4, blockedFraction: 0, seed: 1 });
    expect(g.block({ x: 1, y: 2, z: 1 })).toBe(true);
    expect(g.cellType({ x: 1, y: 2, z: 1 })).toBe('blocked');
    expect(g.countBlocked()).toBe(64 - 8 + 1);
  });

  it('rejects invalid sizes and fractions', () => {
    expect(() => Grid.generate({ size: 0, blockedFraction: 0, seed: 1 })).toThrow(GridSimConfigError);
    expect(() => Grid.generate({ size: 0, blockedFraction: 0, seed: 1 })).toThrow(
      'GridSim: size must be an integer >= 1, got 0'
    );
    expect(() => Grid.generate({ size: 4, blockedFraction: 1.5, seed: 1 })).toThrow(GridSimConfigError);
  });
});
