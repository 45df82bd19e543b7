// lib/gridsim/metrics/metrics.ts
// Metrics capability handed to agents instead of a back-pointer to the simulator.

export type MetricName =
  | 'advances'
  | 'rotations'
  | 'destroys'
  | 'collisions'
  | 'energyDestroyed'
  | 'loopsDetected'
  | 'evasions';

export interface MetricsSink {
  count(metric: MetricName, by?: number): void;
  ruleFired(rule: string): void;
}

export const NOOP_METRICS: MetricsSink = {
  count: () => {},
  ruleFired: () => {},
};

export type MetricsSummary = Record<MetricName, number> & {
  collisionsBeforeFirstKill: number;
  firstKillRecorded: boolean;
  rulesFired: string[];
};

export class SimMetrics implements MetricsSink {
  private counters: Record<MetricName, number> = {
    advances: 0,
    rotations: 0,
    destroys: 0,
    collisions: 0,
    energyDestroyed: 0,
    loopsDetected: 0,
    evasions: 0,
  };
  private collisionsBeforeFirstKill = 0;
  private firstKill = false;
  private rules = new Set<string>();

  count(metric: MetricName, by = 1): void {
    this.counters[metric] += by;
    if (metric === 'collisions' && !this.firstKill) this.collisionsBeforeFirstKill += by;
    if (metric === 'energyDestroyed' && by > 0) this.firstKill = true;
  }

  ruleFired(rule: string): void {
    this.rules.add(rule);
  }

  get(metric: MetricName): number {
    return this.counters[metric];
  }

  summary(): MetricsSummary {
    return {
      ...this.counters,
      collisionsBeforeFirstKill: this.collisionsBeforeFirstKill,
      firstKillRecorded: this.firstKill,
      rulesFired: Array.from(this.rules).sort(),
    };
  }
}
