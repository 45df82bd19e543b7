// lib/gridsim/index.ts
// Public surface.

export * from './core/geometry';
export * from './core/rng';
export * from './core/config';
export * from './core/grid';
export * from './core/arena';
export * from './core/environment';
export * from './agents/reflexAgent';
export * from './agents/rational/sensors';
export * from './agents/rational/decisionTable';
export * from './agents/rational/policy';
export * from './agents/rational/effectors';
export * from './agents/rational/memory';
export * from './agents/rational/rationalAgent';
export * from './metrics/metrics';
export * from './driver/simulator';
export * from './driver/export';
export * from './scenarios/basicScenario';
