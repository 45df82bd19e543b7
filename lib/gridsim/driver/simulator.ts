// lib/gridsim/driver/simulator.ts
// Driver: seeded placement, per-tick ordering, stop conditions, records, plugins.

import type { SimConfig, SimConfigInput } from '../core/config';
import { resolveSimConfig } from '../core/config';
import type { AgentKind, AgentSnapshot, RegistrationResult } from '../core/environment';
import { Environment } from '../core/environment';
import type { Vec3 } from '../core/geometry';
import { ORIENTATIONS } from '../core/geometry';
import type { Rng } from '../core/rng';
import { makeRng, pickOne, randInt } from '../core/rng';
import { ReflexAgent, type ReflexTickEvent } from '../agents/reflexAgent';
import { RationalAgent, type RationalTickEvent } from '../agents/rational/rationalAgent';
import type { DecisionTable } from '../agents/rational/decisionTable';
import { SimMetrics, type MetricsSummary } from '../metrics/metrics';
import { buildExport, type GridSimExport } from './export';

export type TickEvent = ReflexTickEvent | RationalTickEvent;

export type PlacementRecord = {
  kind: AgentKind;
  id: number;
  attempts: Array<{ pos: Vec3; result: RegistrationResult }>;
  placed: boolean;
};

export type TickRecord = {
  tick: number;
  events: TickEvent[];
  snapshot: AgentSnapshot[];
  notes: string[];
  plugins: Record<string, unknown>;
};

export type FinishReason = 'no_energy_left' | 'no_rational_left' | 'max_ticks';

export type SimPlugin = {
  id: string;
  // Return value is stored under record.plugins[id].
  afterTick?: (args: { env: Environment; record: TickRecord; metrics: SimMetrics }) => unknown;
};

export type SimLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export type SimulatorOptions = {
  config?: SimConfigInput;
  table?: DecisionTable;
  plugins?: SimPlugin[];
  logger?: SimLogger;
  verbose?: boolean;
};

type Session = {
  env: Environment;
  rng: Rng;
  metrics: SimMetrics;
  placements: PlacementRecord[];
};

export class GridSimulator {
  public cfg: SimConfig;
  public records: TickRecord[] = [];
  public tickIndex = 0;

  private session: Session;

  private readonly table: DecisionTable | undefined;
  private readonly plugins: SimPlugin[];
  private readonly logger: SimLogger;
  private readonly verbose: boolean;

  constructor(opts: SimulatorOptions = {}) {
    this.cfg = resolveSimConfig(opts.config);
    this.table = opts.table;
    this.plugins = opts.plugins ?? [];
    this.logger = opts.logger ?? console;
    this.verbose = opts.verbose ?? false;
    this.session = this.createSession();
    this.logSession();
  }

  get env(): Environment {
    return this.session.env;
  }

  get rng(): Rng {
    return this.session.rng;
  }

  get metrics(): SimMetrics {
    return this.session.metrics;
  }

  get placements(): PlacementRecord[] {
    return this.session.placements;
  }

  reset(seed?: number): void {
    if (seed !== undefined) this.cfg = resolveSimConfig({ ...this.cfg, seed });
    this.records = [];
    this.tickIndex = 0;
    this.session = this.createSession();
    this.logSession();
  }

  private createSession(): Session {
    const cfg = this.cfg;
    const session: Session = {
      env: Environment.generate({
        size: cfg.size,
        blockedFraction: cfg.blockedFraction,
        seed: cfg.seed,
        keepCenterFree: cfg.keepCenterFree,
      }),
      // Separate stream so placement and agent draws never shift the grid layout.
      rng: makeRng(`${cfg.seed}:agents`),
      metrics: new SimMetrics(),
      placements: [],
    };
    this.placeAgents(session);
    return session;
  }

  private logSession(): void {
    const cfg = this.cfg;
    if (this.verbose) {
      const blocked = this.env.grid.countBlocked();
      const total = cfg.size ** 3;
      this.logger.info(
        `[GridSim] environment ${cfg.size}^3: ${blocked} blocked (${((100 * blocked) / total).toFixed(1)}%), ` +
          `${this.env.rationalAgents().length} rational, ${this.env.reflexAgents().length} energy`
      );
    }
  }

  finishReason(): FinishReason | null {
    if (this.cfg.reflexCount > 0 && this.env.reflexAgents().length === 0) return 'no_energy_left';
    if (this.cfg.rationalCount > 0 && this.env.rationalAgents().length === 0) return 'no_rational_left';
    if (this.tickIndex >= this.cfg.maxTicks) return 'max_ticks';
    return null;
  }

  isFinished(): boolean {
    return this.finishReason() !== null;
  }

  step(): TickRecord {
    const t = this.tickIndex;
    const events: TickEvent[] = [];
    const notes: string[] = [];

    // Snapshots taken up front; destroy removes agents mid-tick.
    for (const m of this.env.reflexAgents()) {
      if (!this.env.isActive(m.id, 'reflex')) continue;
      events.push(m.tick(t, this.env, this.rng));
    }

    for (const r of this.env.rationalAgents()) {
      if (!this.env.isActive(r.id, 'rational')) continue;
      const ev = r.tick(t, this.env, this.rng);
      events.push(ev);
      if (ev.destroyed) {
        notes.push(`rational ${r.id} destroyed at ${ev.position.x},${ev.position.y},${ev.position.z} (${ev.reason})`);
      }
      if (ev.evasion) notes.push(`rational ${r.id} evaded loop len=${ev.loop?.length ?? 0} → ${ev.evasion.heading}`);
    }

    const record: TickRecord = {
      tick: t,
      events,
      snapshot: this.env.agentSnapshots(),
      notes,
      plugins: {},
    };

    for (const p of this.plugins) {
      if (!p.afterTick) continue;
      try {
        record.plugins[p.id] = p.afterTick({ env: this.env, record, metrics: this.metrics });
      } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        record.plugins[p.id] = { error: message };
        this.logger.error(`[GridSim] plugin ${p.id} failed at tick ${t}`, e);
      }
    }

    this.records.push(record);
    if (this.cfg.maxRecords && this.records.length > this.cfg.maxRecords) {
      this.records = this.records.slice(-this.cfg.maxRecords);
    }

    if (this.verbose) {
      for (const line of notes) this.logger.info(`[GridSim] t${t} ${line}`);
    }

    this.tickIndex += 1;
    return record;
  }

  run(n: number = this.cfg.maxTicks): TickRecord[] {
    const out: TickRecord[] = [];
    for (let i = 0; i < n; i++) {
      if (this.isFinished()) break;
      out.push(this.step());
    }
    if (this.verbose) {
      this.logger.info(`[GridSim] run stopped at tick ${this.tickIndex} (${this.finishReason() ?? 'tick_budget'})`);
    }
    return out;
  }

  buildExport(): GridSimExport {
    return buildExport({
      scenarioId: this.cfg.scenarioId,
      seed: this.cfg.seed,
      config: { ...this.cfg, loop: { ...this.cfg.loop } },
      placements: [...this.placements],
      records: [...this.records],
      metrics: this.metricsSummary(),
    });
  }

  metricsSummary(): MetricsSummary {
    return this.metrics.summary();
  }

  private placeAgents(s: Session): void {
    const cfg = this.cfg;

    for (let id = 1; id <= cfg.rationalCount; id++) {
      this.place(s, 'rational', id, (pos) =>
        s.env.register(
          new RationalAgent({
            id,
            pos,
            orientation: pickOne(s.rng, ORIENTATIONS) ?? '+X',
            table: this.table,
            collisionTurn: cfg.collisionTurn,
            yieldTurn: cfg.yieldTurn,
            historyLimit: cfg.historyLimit,
            loop: cfg.loop,
            evasionAdvanceProbability: cfg.evasionAdvanceProbability,
            metrics: s.metrics,
          })
        )
      );
    }

    for (let id = 1; id <= cfg.reflexCount; id++) {
      this.place(s, 'reflex', id, (pos) =>
        s.env.register(
          new ReflexAgent({ id, pos, moveProbability: cfg.reflexMoveProbability, period: cfg.reflexPeriod })
        )
      );
    }
  }

  // The core rejects conflicts; retrying elsewhere is the driver's job.
  private place(s: Session, kind: AgentKind, id: number, tryAt: (pos: Vec3) => RegistrationResult): void {
    const rec: PlacementRecord = { kind, id, attempts: [], placed: false };
    const max = this.cfg.size - 1;
    for (let i = 0; i < this.cfg.placementAttempts; i++) {
      const pos = { x: randInt(s.rng, 0, max), y: randInt(s.rng, 0, max), z: randInt(s.rng, 0, max) };
      const result = tryAt(pos);
      rec.attempts.push({ pos, result });
      if (result.ok) {
        rec.placed = true;
        break;
      }
    }
    if (!rec.placed) {
      this.logger.warn(`[GridSim] could not place ${kind} ${id} after ${this.cfg.placementAttempts} attempts`);
    }
    s.placements.push(rec);
  }
}
