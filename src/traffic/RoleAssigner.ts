import { findOvertaker, relativeBearing } from './ColregsClassifier.js';
import type { Encounter } from './ColregsClassifier.js';
import type { Vessel } from './Vessel.js';

export type Role = 'giveWay' | 'standOn' | 'unknown';

/** True when `other` lies on `own`'s starboard side, dead ahead included. */
export function hasOnStarboard(own: Vessel, other: Vessel): boolean {
  const brg = relativeBearing(own, other);
  return brg >= 0 && brg < 180;
}

export function assignRoles(a: Vessel, b: Vessel, scenario: Encounter): [Role, Role] {
  switch (scenario) {
    case 'headOn':
      return ['giveWay', 'giveWay'];
    case 'overtaking':
      return findOvertaker(a, b) === a ? ['giveWay', 'standOn'] : ['standOn', 'giveWay'];
    case 'crossing':
      return hasOnStarboard(a, b) ? ['giveWay', 'standOn'] : ['standOn', 'giveWay'];
    default:
      return ['unknown', 'unknown'];
  }
}
