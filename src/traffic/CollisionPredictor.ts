import { distanceNm, predictFuturePosition } from './Kinematics.js';
import type { Status, Vessel } from './Vessel.js';
import { collisionDistanceNm } from './config.js';
import type { SimulationConfig } from './config.js';

export interface FutureCheck {
  collides: boolean;
  /** First sampled step (1-based) closer than the threshold, or null. */
  step: number | null;
}

export interface PairAssessment {
  ids: [number, number];
  severity: Status;
  distanceNm: number;
  /** True when the pair was beyond the horizon and skipped. */
  gated: boolean;
  futureStep: number | null;
}

const SEVERITY: Record<Status, number> = {
  green: 0,
  orange: 1,
  red: 2,
};

export function worstStatus(cur: Status, next: Status): Status {
  return SEVERITY[next] > SEVERITY[cur] ? next : cur;
}

export function checkImmediate(a: Vessel, b: Vessel, collisionDistNm: number): boolean {
  return distanceNm(a.position, b.position) < collisionDistNm;
}

/**
 * Sample both vessels' predicted positions at `k * stepSeconds` for
 * k = 1..horizonSteps. The current position (k = 0) belongs to the
 * immediate check.
 */
export function checkFuture(
  a: Vessel,
  b: Vessel,
  collisionDistNm: number,
  horizonSteps: number,
  stepSeconds: number
): FutureCheck {
  for (let k = 1; k <= horizonSteps; k++) {
    const t = k * stepSeconds;
    const pa = predictFuturePosition(a, t);
    const pb = predictFuturePosition(b, t);
    if (distanceNm(pa, pb) < collisionDistNm) {
      return { collides: true, step: k };
    }
  }
  return { collides: false, step: null };
}

export function assessPair(a: Vessel, b: Vessel, config: SimulationConfig): PairAssessment {
  const dist = distanceNm(a.position, b.position);
  const base = { ids: [a.id, b.id] as [number, number], distanceNm: dist };
  if (dist > config.horizonNm) {
    return { ...base, severity: 'green', gated: true, futureStep: null };
  }
  const threshold = collisionDistanceNm(config);
  if (checkImmediate(a, b, threshold)) {
    return { ...base, severity: 'red', gated: false, futureStep: null };
  }
  const future = checkFuture(a, b, threshold, config.horizonSteps, config.stepSeconds);
  return {
    ...base,
    severity: future.collides ? 'orange' : 'green',
    gated: false,
    futureStep: future.step,
  };
}

export interface TrafficAssessment {
  pairs: PairAssessment[];
  statuses: Map<number, Status>;
}

/**
 * Assess every pair, then fold the results into per-vessel statuses. Nothing
 * is written to the vessels here, so pair order cannot change the outcome.
 */
export function assessTraffic(
  vessels: readonly Vessel[],
  config: SimulationConfig
): TrafficAssessment {
  const pairs: PairAssessment[] = [];
  for (let i = 0; i < vessels.length; i++) {
    for (let j = i + 1; j < vessels.length; j++) {
      pairs.push(assessPair(vessels[i], vessels[j], config));
    }
  }

  const statuses = new Map<number, Status>();
  for (const v of vessels) statuses.set(v.id, 'green');
  for (const p of pairs) {
    for (const id of p.ids) {
      statuses.set(id, worstStatus(statuses.get(id) ?? 'green', p.severity));
    }
  }
  return { pairs, statuses };
}
