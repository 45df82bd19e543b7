// lib/gridsim/core/grid.ts
// Cubic cell grid: seeded generation, bounds-safe queries, burned cells.

import type { Vec3 } from './geometry';
import { makeRng } from './rng';
import { assertIntAtLeast, assertProbability } from './config';

export type CellType = 'free' | 'blocked';

const FREE = 0;
const BLOCKED = 1;

export type GridGenerationOptions = {
  size: number;
  blockedFraction: number;
  seed: number | string;
  // Force the centre cell free when it is not on the shell.
  keepCenterFree?: boolean;
};

export class Grid {
  public readonly size: number;
  private readonly cells: Uint8Array;

  private constructor(size: number, cells: Uint8Array) {
    this.size = size;
    this.cells = cells;
  }

  static generate(opts: GridGenerationOptions): Grid {
    assertIntAtLeast('size', opts.size, 1);
    assertProbability('blockedFraction', opts.blockedFraction);

    const n = opts.size;
    const rng = makeRng(opts.seed);
    const cells = new Uint8Array(n * n * n);
    const grid = new Grid(n, cells);

    for (let x = 0; x < n; x++) {
      for (let y = 0; y < n; y++) {
        for (let z = 0; z < n; z++) {
          cells[grid.index({ x, y, z })] = rng() < opts.blockedFraction ? BLOCKED : FREE;
        }
      }
    }

    for (let i = 0; i < cells.length; i++) {
      if (grid.isShell(grid.coordOf(i))) cells[i] = BLOCKED;
    }

    if (opts.keepCenterFree ?? true) {
      const c = Math.floor(n / 2);
      const center = { x: c, y: c, z: c };
      if (!grid.isShell(center)) cells[grid.index(center)] = FREE;
    }

    return grid;
  }

  // Lattice points only; fractional coordinates are not cells.
  inBounds(p: Vec3): boolean {
    const n = this.size;
    if (!Number.isInteger(p.x) || !Number.isInteger(p.y) || !Number.isInteger(p.z)) return false;
    return p.x >= 0 && p.x < n && p.y >= 0 && p.y < n && p.z >= 0 && p.z < n;
  }

  isShell(p: Vec3): boolean {
    const last = this.size - 1;
    return p.x === 0 || p.y === 0 || p.z === 0 || p.x === last || p.y === last || p.z === last;
  }

  cellType(p: Vec3): CellType {
    if (!this.inBounds(p)) return 'blocked';
    return this.cells[this.index(p)] === BLOCKED ? 'blocked' : 'free';
  }

  // Burns the cell for the rest of the run. Returns false when out of bounds.
  block(p: Vec3): boolean {
    if (!this.inBounds(p)) return false;
    this.cells[this.index(p)] = BLOCKED;
    return true;
  }

  countBlocked(): number {
    let n = 0;
    for (const c of this.cells) if (c === BLOCKED) n++;
    return n;
  }

  freeCells(): Vec3[] {
    const out: Vec3[] = [];
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === FREE) out.push(this.coordOf(i));
    }
    return out;
  }

  equals(other: Grid): boolean {
    if (other.size !== this.size) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (other.cells[i] !== this.cells[i]) return false;
    }
    return true;
  }

  private index(p: Vec3): number {
    const n = this.size;
    return p.x + n * (p.y + n * p.z);
  }

  private coordOf(i: number): Vec3 {
    const n = this.size;
    return { x: i % n, y: Math.floor(i / n) % n, z: Math.floor(i / (n * n)) };
  }
}
