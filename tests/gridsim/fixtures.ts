import { Environment } from '@/lib/gridsim/core/environment';
import type { Rng } from '@/lib/gridsim/core/rng';
import { RationalAgent, type RationalAgentOptions } from '@/lib/gridsim/agents/rational/rationalAgent';
import { ReflexAgent, type ReflexAgentOptions } from '@/lib/gridsim/agents/reflexAgent';

// Interior fully free, shell blocked.
export function openEnv(size = 6): Environment {
  return Environment.generate({ size, blockedFraction: 0, seed: 'test-grid' });
}

// Cycles through the given draws.
export function scriptedRng(values: number[]): Rng {
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i += 1;
    return v;
  };
}

export function addRational(env: Environment, opts: RationalAgentOptions): RationalAgent {
  const a = new RationalAgent(opts);
  const res = env.register(a);
  if (!res.ok) throw new Error(`fixture: rational ${opts.id} rejected (${res.reason})`);
  return a;
}

export function addReflex(env: Environment, opts: ReflexAgentOptions): ReflexAgent {
  const m = new ReflexAgent(opts);
  const res = env.register(m);
  if (!res.ok) throw new Error(`fixture: reflex ${opts.id} rejected (${res.reason})`);
  return m;
}
