import type { Vec2, Vessel } from './Vessel.js';

export const SECONDS_PER_HOUR = 3600;
export const METERS_PER_NM = 1852;
/** Arrival tolerance used to decide a transit is complete. */
export const DESTINATION_TOLERANCE_NM = 0.1;

export function normalizeHeading(deg: number): number {
  const h = ((deg % 360) + 360) % 360;
  return h === 360 ? 0 : h;
}

/** Shortest signed turn from `fromDeg` to `toDeg`, in [-180, 180). */
export function signedHeadingDelta(fromDeg: number, toDeg: number): number {
  return ((((toDeg - fromDeg) % 360) + 540) % 360) - 180;
}

export function distanceNm(a: Vec2, b: Vec2): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

/** Absolute bearing from `from` to `to` in the atan2 convention, [0, 360). */
export function bearingDeg(from: Vec2, to: Vec2): number {
  return normalizeHeading((Math.atan2(to[1] - from[1], to[0] - from[0]) * 180) / Math.PI);
}

export function knotsToNmPerSecond(knots: number): number {
  return knots / SECONDS_PER_HOUR;
}

/**
 * Move the vessel along its direction for `elapsedSeconds`, snapping onto the
 * destination instead of overshooting it. The snap only applies while the
 * destination lies ahead; a vessel turned away keeps moving along its heading.
 */
export function advance(vessel: Vessel, elapsedSeconds: number): void {
  const remaining = vessel.distanceToDestination;
  if (vessel.hasArrived) return;
  const stepDist = knotsToNmPerSecond(vessel.speed) * elapsedSeconds;
  const [dx, dy] = vessel.direction;
  const ahead =
    dx * (vessel.destination[0] - vessel.position[0]) +
      dy * (vessel.destination[1] - vessel.position[1]) >
    0;
  if (remaining < stepDist && ahead) {
    vessel.position = [...vessel.destination];
    return;
  }
  vessel.position = [
    vessel.position[0] + dx * stepDist,
    vessel.position[1] + dy * stepDist,
  ];
}

export function reachedDestination(vessel: Vessel): boolean {
  return vessel.distanceToDestination <= DESTINATION_TOLERANCE_NM;
}

/**
 * Where the vessel would be after `secondsAhead` at its current heading and
 * speed. Does not touch the vessel.
 */
export function predictFuturePosition(vessel: Vessel, secondsAhead: number): Vec2 {
  if (vessel.hasArrived) return [...vessel.position];
  const dist = knotsToNmPerSecond(vessel.speed) * secondsAhead;
  const [dx, dy] = vessel.direction;
  return [vessel.position[0] + dx * dist, vessel.position[1] + dy * dist];
}

export function changeHeading(vessel: Vessel, deltaDeg: number): void {
  vessel.heading = vessel.heading + deltaDeg;
}

export function changeSpeed(vessel: Vessel, deltaKnots: number): void {
  vessel.speed = vessel.speed + deltaKnots;
}

/** Limit a speed delta so the resulting speed stays within [0, maxSpeed]. */
export function clampSpeedChange(vessel: Vessel, deltaKnots: number): number {
  return Math.min(Math.max(deltaKnots, -vessel.speed), vessel.maxSpeed - vessel.speed);
}
