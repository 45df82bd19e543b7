// lib/gridsim/core/environment.ts
// The world agents live in: grid, per-kind registries, occupancy rules.

import type { RationalAgent } from '../agents/rational/rationalAgent';
import type { ReflexAgent } from '../agents/reflexAgent';
import type { Orientation, Vec3 } from './geometry';
import { samePos } from './geometry';
import { Grid, type CellType, type GridGenerationOptions } from './grid';
import { AgentArena } from './arena';

export type AgentKind = 'rational' | 'reflex';

export type RegistrationRejection = 'blocked_cell' | 'occupied_by_same_kind' | 'duplicate_id';

export type RegistrationResult =
  | { ok: true; id: number }
  | { ok: false; reason: RegistrationRejection };

export type AgentSnapshot = {
  id: number;
  kind: AgentKind;
  pos: Vec3;
  orientation: Orientation | null;
  active: boolean;
};

export class Environment {
  public readonly grid: Grid;
  private readonly rational = new AgentArena<RationalAgent>();
  private readonly reflex = new AgentArena<ReflexAgent>();

  constructor(grid: Grid) {
    this.grid = grid;
  }

  static generate(opts: GridGenerationOptions): Environment {
    return new Environment(Grid.generate(opts));
  }

  get size(): number {
    return this.grid.size;
  }

  cellType(p: Vec3): CellType {
    return this.grid.cellType(p);
  }

  register(agent: RationalAgent | ReflexAgent): RegistrationResult {
    return agent.kind === 'rational' ? this.registerRational(agent) : this.registerReflex(agent);
  }

  registerRational(agent: RationalAgent): RegistrationResult {
    const reason = this.checkPlacement(this.rational, agent);
    if (reason) return { ok: false, reason };
    this.rational.insert(agent);
    return { ok: true, id: agent.id };
  }

  registerReflex(agent: ReflexAgent): RegistrationResult {
    const reason = this.checkPlacement(this.reflex, agent);
    if (reason) return { ok: false, reason };
    this.reflex.insert(agent);
    return { ok: true, id: agent.id };
  }

  remove(id: number, kind: AgentKind): boolean {
    return kind === 'rational' ? this.rational.deactivate(id) : this.reflex.deactivate(id);
  }

  // Permanently burns the cell; later registrations there fail with blocked_cell.
  vacate(p: Vec3): void {
    this.grid.block(p);
  }

  isActive(id: number, kind: AgentKind): boolean {
    return kind === 'rational' ? this.rational.has(id) : this.reflex.has(id);
  }

  getRational(id: number): RationalAgent {
    const a = this.rational.get(id);
    if (!a) throw new Error(`GridSim: missing rational agent ${id}`);
    return a;
  }

  getReflex(id: number): ReflexAgent {
    const a = this.reflex.get(id);
    if (!a) throw new Error(`GridSim: missing reflex agent ${id}`);
    return a;
  }

  rationalAgents(): RationalAgent[] {
    return this.rational.active();
  }

  reflexAgents(): ReflexAgent[] {
    return this.reflex.active();
  }

  rationalAt(p: Vec3): RationalAgent | undefined {
    return this.rational.find((a) => samePos(a.pos, p));
  }

  reflexAt(p: Vec3): ReflexAgent | undefined {
    return this.reflex.find((a) => samePos(a.pos, p));
  }

  reflexAllAt(p: Vec3): ReflexAgent[] {
    return this.reflex.active().filter((a) => samePos(a.pos, p));
  }

  agentSnapshots(): AgentSnapshot[] {
    const out: AgentSnapshot[] = [];
    for (const a of this.rational.active()) {
      out.push({ id: a.id, kind: 'rational', pos: { ...a.pos }, orientation: a.orientation, active: true });
    }
    for (const m of this.reflex.active()) {
      out.push({ id: m.id, kind: 'reflex', pos: { ...m.pos }, orientation: null, active: true });
    }
    return out;
  }

  // One z layer as text, y rows top to bottom.
  renderLayer(z: number): string[] {
    const n = this.size;
    if (!Number.isInteger(z) || z < 0 || z >= n) {
      throw new Error(`GridSim: layer z=${z} out of range [0, ${n})`);
    }
    const rows: string[] = [];
    for (let y = 0; y < n; y++) {
      let row = '';
      for (let x = 0; x < n; x++) {
        const p = { x, y, z };
        const r = this.rationalAt(p) !== undefined;
        const e = this.reflexAt(p) !== undefined;
        if (r && e) row += '[X]';
        else if (r) row += '[R]';
        else if (e) row += '[E]';
        else row += this.cellType(p) === 'blocked' ? '[#]' : '[ ]';
      }
      rows.push(row);
    }
    return rows;
  }

  private checkPlacement<T extends { readonly id: number; readonly pos: Vec3 }>(
    arena: AgentArena<T>,
    agent: T
  ): RegistrationRejection | null {
    if (this.cellType(agent.pos) === 'blocked') return 'blocked_cell';
    if (arena.find((a) => samePos(a.pos, agent.pos))) return 'occupied_by_same_kind';
    if (arena.has(agent.id)) return 'duplicate_id';
    return null;
  }
}
