import { describe, expect, it } from 'vitest';

import {
  AgentMemory,
  chooseEvasionHeading,
  detectLoop,
  summarizePercept,
  type MemoryEntry,
} from '@/lib/gridsim/agents/rational/memory';
import type { Orientation } from '@/lib/gridsim/core/geometry';
import type { EffectorKind } from '@/lib/gridsim/agents/rational/policy';

function mk(tick: number, percept: string, action: EffectorKind = 'advance', facing: Orientation = '+X'): MemoryEntry {
  return { tick, percept, action, facing };
}

function seq(labels: string[]): MemoryEntry[] {
  return labels.map((l, i) => mk(i, `p:${l}`, l === 'B' ? 'reorient' : 'advance'));
}

describe('loop detection', () => {
  it('needs enough history', () => {
    expect(detectLoop(seq(['A', 'B', 'A']))).toBeNull();
  });

  it('finds a repeated trailing pair', () => {
    expect(detectLoop(seq(['A', 'B', 'A', 'B']))).toEqual({ length: 2, repetitions: 2 });
    expect(detectLoop(seq(['A', 'A', 'A', 'A']))).toEqual({ length: 2, repetitions: 2 });
  });

  it('counts consecutive repetitions back from the end', () => {
    expect(detectLoop(seq(['C', 'A', 'B', 'A', 'B', 'A', 'B']))).toEqual({ length: 2, repetitions: 3 });
  });

  it('ignores a broken tail', () => {
    expect(detectLoop(seq(['A', 'B', 'A', 'C']))).toBeNull();
  });

  it('compares the action as well as the percept', () => {
    const h = [mk(0, 'p'), mk(1, 'q'), mk(2, 'p'), mk(3, 'q', 'reorient')];
    expect(detectLoop(h)).toBeNull();
  });

  it('honours a higher threshold', () => {
    const cfg = { minPatternLength: 2, minRepetitions: 2, threshold: 3 };
    expect(detectLoop(seq(['A', 'B', 'A', 'B']), cfg)).toBeNull();
    expect(detectLoop(seq(['A', 'B', 'A', 'B', 'A', 'B']), cfg)).toEqual({ length: 2, repetitions: 3 });
  });
});

describe('evasion heading', () => {
  it('skips current, reverse and recent facings', () => {
    const h = [mk(0, 'p', 'advance', '+Y'), mk(1, 'p', 'advance', '+Z')];
    expect(chooseEvasionHeading('+X', h, () => 0)).toBe('-Y');
    expect(chooseEvasionHeading('+X', h, () => 0.99)).toBe('-Z');
  });

  it('relaxes to current and reverse when every heading was used', () => {
    const h = (['+Y', '-Y', '+Z', '-Z'] as const).map((f, i) => mk(i, 'p', 'advance', f));
    expect(chooseEvasionHeading('+X', h, () => 0)).toBe('+Y');
  });

  it('only looks back six entries', () => {
    const h = [mk(0, 'p', 'advance', '-Y'), ...[1, 2, 3, 4, 5, 6].map((t) => mk(t, 'p', 'advance', '+Y'))];
    expect(chooseEvasionHeading('+X', h, () => 0)).toBe('-Y');
  });
});

describe('agent memory', () => {
  it('drops the oldest entries past the limit', () => {
    const m = new AgentMemory(3);
    for (let t = 0; t < 5; t++) m.record(mk(t, 'p'));
    expect(m.history.map((e) => e.tick)).toEqual([2, 3, 4]);
  });

  it('keeps everything with limit 0', () => {
    const m = new AgentMemory(0);
    for (let t = 0; t < 250; t++) m.record(mk(t, 'p'));
    expect(m.history).toHaveLength(250);
  });

  it('consumes the collision flag once', () => {
    const m = new AgentMemory();
    m.markCollision();
    expect(m.consumeCollision()).toBe(true);
    expect(m.consumeCollision()).toBe(false);
  });

  it('summarises a percept with position', () => {
    const s = summarizePercept(
      {
        facing: '-Z',
        energyInCell: false,
        materialAhead: true,
        energyNearby: { detected: true, position: 'side', direction: '+X' },
        collidedLastMove: false,
      },
      { x: 1, y: 2, z: 3 }
    );
    expect(s).toBe('-Z|1,2,3|E0|R1|M:side|V0');
  });
});
