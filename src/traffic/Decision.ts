import type { StrategyName } from '../config/env.js';
import { classifyEncounter } from './ColregsClassifier.js';
import type { Encounter } from './ColregsClassifier.js';
import { assessTraffic, worstStatus } from './CollisionPredictor.js';
import { bearingDeg, signedHeadingDelta } from './Kinematics.js';
import { assignRoles } from './RoleAssigner.js';
import type { Role } from './RoleAssigner.js';
import type { Status, Vessel } from './Vessel.js';
import type { SimulationConfig } from './config.js';

/** One-shot command for a vessel, applied by the driver before the next advance. */
export interface Action {
  vesselId: number;
  headingChange: number; // degrees, counter-clockwise positive
  speedChange: number; // knots
}

export interface FlagUpdate {
  vesselId: number;
  isAvoiding: boolean;
}

export interface EncounterReport {
  ids: [number, number];
  severity: Exclude<Status, 'green'>;
  scenario: Encounter;
  roles: [Role, Role];
  distanceNm: number;
  futureStep: number | null;
}

export interface VesselLabel {
  scenario: Encounter;
  role: Role;
}

export interface Decision {
  statuses: Map<number, Status>;
  /** Scenario and role per at-risk vessel, taken from its most severe pair. */
  labels: Map<number, VesselLabel>;
  encounters: EncounterReport[];
  actions: Action[];
  flagUpdates: FlagUpdate[];
}

export interface AvoidanceStrategy {
  readonly name: StrategyName;
  decide(vessels: readonly Vessel[], config: SimulationConfig, timeStep: number): Decision;
}

export function emptyDecision(): Decision {
  return {
    statuses: new Map(),
    labels: new Map(),
    encounters: [],
    actions: [],
    flagUpdates: [],
  };
}

export interface EncounterEvaluation {
  statuses: Map<number, Status>;
  labels: Map<number, VesselLabel>;
  encounters: EncounterReport[];
}

/** Run the predictor, then classify and assign roles for every at-risk pair. */
export function evaluateEncounters(
  vessels: readonly Vessel[],
  config: SimulationConfig
): EncounterEvaluation {
  const byId = new Map(vessels.map((v) => [v.id, v]));
  const { pairs, statuses } = assessTraffic(vessels, config);
  const encounters: EncounterReport[] = [];
  const labels = new Map<number, VesselLabel>();
  const labelSeverity = new Map<number, Status>();

  for (const pair of pairs) {
    const severity = pair.severity;
    if (severity === 'green') continue;
    const a = byId.get(pair.ids[0]);
    const b = byId.get(pair.ids[1]);
    if (!a || !b) continue;
    const scenario = classifyEncounter(a, b, config.classifier);
    const roles = assignRoles(a, b, scenario);
    encounters.push({
      ids: pair.ids,
      severity,
      scenario,
      roles,
      distanceNm: pair.distanceNm,
      futureStep: pair.futureStep,
    });

    pair.ids.forEach((id, k) => {
      const cur = labelSeverity.get(id) ?? 'green';
      if (worstStatus(cur, severity) !== cur) {
        labelSeverity.set(id, severity);
        labels.set(id, { scenario, role: roles[k] });
      }
    });
  }

  return { statuses, labels, encounters };
}

/**
 * Steer back onto the direct line to the destination at full speed.
 * Returns null when the vessel is already there within `threshold`.
 */
export function revertAction(vessel: Vessel, threshold: number): Action | null {
  const headingChange = vessel.hasArrived
    ? 0
    : signedHeadingDelta(vessel.heading, bearingDeg(vessel.position, vessel.destination));
  const speedChange = vessel.maxSpeed - vessel.speed;
  if (Math.abs(headingChange) <= threshold && Math.abs(speedChange) <= threshold) {
    return null;
  }
  return { vesselId: vessel.id, headingChange, speedChange };
}
