import type { ClassifierMode } from '../config/env.js';
import { bearingDeg } from './Kinematics.js';
import type { Vessel } from './Vessel.js';

export type Encounter = 'headOn' | 'crossing' | 'overtaking' | 'unknown';

const HEAD_ON_BEARING_DEG = 5;
const HEAD_ON_HEADING_DIFF_DEG = 150;
const CROSSING_HEADING_DIFF_DEG = 45;
/** 22.5° abaft the beam: anything further aft is the stern sector. */
const STERN_SECTOR_DEG = 112.5;
const OVERTAKING_HEADING_DIFF_DEG = 20;

function foldBearing(deg: number): number {
  let r = ((deg % 360) + 360) % 360;
  if (r > 180) r -= 360;
  return r;
}

/**
 * Bearing of `to` relative to `from`'s bow, clockwise (starboard) positive,
 * in (-180, 180].
 */
export function relativeBearing(from: Vessel, to: Vessel): number {
  return foldBearing(from.heading - bearingDeg(from.position, to.position));
}

/** Absolute heading difference folded into [0, 180]. */
export function headingDifference(a: Vessel, b: Vessel): number {
  const d = Math.abs(a.heading - b.heading) % 360;
  return d > 180 ? 360 - d : d;
}

function isMotionless(v: Vessel): boolean {
  const [dx, dy] = v.direction;
  return v.speed <= 0 || (dx === 0 && dy === 0);
}

/**
 * True when `o` is coming up on `t` from t's stern sector, faster and on a
 * similar heading.
 */
export function isOvertaking(o: Vessel, t: Vessel): boolean {
  const brg = Math.abs(relativeBearing(t, o));
  return (
    o.speed > t.speed &&
    brg > STERN_SECTOR_DEG &&
    headingDifference(o, t) < OVERTAKING_HEADING_DIFF_DEG
  );
}

/**
 * The vessel doing the overtaking. Falls back to the faster vessel, and on
 * equal speed to the one that has the other ahead of it.
 */
export function findOvertaker(a: Vessel, b: Vessel): Vessel {
  if (isOvertaking(a, b)) return a;
  if (isOvertaking(b, a)) return b;
  if (a.speed !== b.speed) return a.speed > b.speed ? a : b;
  return Math.abs(relativeBearing(b, a)) > Math.abs(relativeBearing(a, b)) ? a : b;
}

function classifyByBearing(a: Vessel, b: Vessel): Encounter {
  const relAB = relativeBearing(a, b);
  const relBA = relativeBearing(b, a);
  const diff = headingDifference(a, b);

  if (
    (Math.abs(relAB) <= HEAD_ON_BEARING_DEG || Math.abs(relBA) <= HEAD_ON_BEARING_DEG) &&
    diff > HEAD_ON_HEADING_DIFF_DEG
  ) {
    return 'headOn';
  }
  if (Math.abs(relAB) > STERN_SECTOR_DEG || Math.abs(relBA) > STERN_SECTOR_DEG) {
    return 'overtaking';
  }
  // b dead ahead on a non-reciprocal course is a crossing from b's point of view
  return 'crossing';
}

function classifyByHeading(a: Vessel, b: Vessel): Encounter {
  const diff = headingDifference(a, b);
  if (diff > HEAD_ON_HEADING_DIFF_DEG) return 'headOn';
  if (diff > CROSSING_HEADING_DIFF_DEG) return 'crossing';
  return 'overtaking';
}

/**
 * Classify the COLREGS encounter between two vessels.
 *
 * `relativeBearing` follows the rule sectors literally; `headingDifference`
 * only compares courses.
 */
export function classifyEncounter(
  a: Vessel,
  b: Vessel,
  mode: ClassifierMode = 'relativeBearing'
): Encounter {
  if (isMotionless(a) && isMotionless(b)) return 'unknown';
  const enc = mode === 'headingDifference' ? classifyByHeading(a, b) : classifyByBearing(a, b);
  return Number.isFinite(a.heading) && Number.isFinite(b.heading) ? enc : 'unknown';
}
