// Random lane traffic for stress runs and profiling

import type { Scenario } from './Scenarios.js';
import type { VesselInit } from './Vessel.js';

export interface TrafficOptions {
  /** Side of the square sea area, nautical miles. */
  areaNm: number;
  eastbound: number;
  westbound: number;
  northbound: number;
  /** Nominal speed in knots, varied by ±10 % per vessel. */
  baseSpeed: number;
  rng: () => number;
}

export const DEFAULT_TRAFFIC: TrafficOptions = {
  areaNm: 12,
  eastbound: 6,
  westbound: 6,
  northbound: 3,
  baseSpeed: 13,
  rng: Math.random,
};

function randInRange(rng: () => number, min: number, max: number): number {
  return min + rng() * (max - min);
}

export function buildTrafficScenario(options: Partial<TrafficOptions> = {}): Scenario {
  const opts: TrafficOptions = { ...DEFAULT_TRAFFIC, ...options };
  const { areaNm, rng } = opts;
  const margin = areaNm * 0.1;
  const vessels: VesselInit[] = [];
  let id = 0;
  const speed = () => opts.baseSpeed * randInRange(rng, 0.9, 1.1);

  // east-bound lane
  for (let i = 0; i < opts.eastbound; i++) {
    const y = randInRange(rng, margin, areaNm / 2 - margin / 2);
    const s = speed();
    vessels.push({ id: id++, source: [0, y], destination: [areaNm, y], maxSpeed: s });
  }

  // west-bound lane
  for (let i = 0; i < opts.westbound; i++) {
    const y = randInRange(rng, areaNm / 2 + margin / 2, areaNm - margin);
    const s = speed();
    vessels.push({ id: id++, source: [areaNm, y], destination: [0, y], maxSpeed: s });
  }

  // crossing feeders
  for (let i = 0; i < opts.northbound; i++) {
    const x = randInRange(rng, margin, areaNm - margin);
    const s = speed();
    vessels.push({ id: id++, source: [x, 0], destination: [x, areaNm], maxSpeed: s });
  }

  return { name: 'traffic', vessels };
}

export default buildTrafficScenario;
