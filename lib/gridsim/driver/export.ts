// lib/gridsim/driver/export.ts
// In-memory session export (no files are written).

import type { SimConfig } from '../core/config';
import type { MetricsSummary } from '../metrics/metrics';
import type { PlacementRecord, TickRecord } from './simulator';

export type GridSimExport = {
  schema: 'GridSimExportV1';
  createdAt: string;
  seed: number;
  scenarioId: string;
  config: SimConfig;
  placements: PlacementRecord[];
  records: TickRecord[];
  metrics: MetricsSummary;
};

const nowIso = () => new Date().toISOString();

export function buildExport(args: {
  scenarioId: string;
  seed: number;
  config: SimConfig;
  placements: PlacementRecord[];
  records: TickRecord[];
  metrics: MetricsSummary;
}): GridSimExport {
  return {
    schema: 'GridSimExportV1',
    createdAt: nowIso(),
    seed: args.seed,
    scenarioId: args.scenarioId,
    config: args.config,
    placements: args.placements,
    records: args.records,
    metrics: args.metrics,
  };
}
