// lib/gridsim/scenarios/basicScenario.ts
// Basic scenario: small cube, two hunters, two energy entities.

import type { SimConfigInput } from '../core/config';

export const basicScenarioId = 'scenario:gridsim:basic:v1';

export function makeBasicScenario(): SimConfigInput {
  return {
    scenarioId: basicScenarioId,
    seed: 42,
    size: 6,
    blockedFraction: 0.2,
    freeFraction: 0.8,
    rationalCount: 2,
    reflexCount: 2,
    reflexPeriod: 3,
    reflexMoveProbability: 0.7,
    maxTicks: 15,
  };
}
