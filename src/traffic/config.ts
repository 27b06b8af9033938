import { env } from '../config/env.js';
import type { ClassifierMode } from '../config/env.js';
import { METERS_PER_NM, SECONDS_PER_HOUR } from './Kinematics.js';

export interface ManeuverSettings {
  /** Starboard turn for both vessels of a red pair, degrees. */
  redTurnDeg: number;
  /** Speed change for both vessels of a red pair, knots. */
  redSpeedChange: number;
  /** Starboard turn for give-way vessels of an orange pair, degrees. */
  orangeTurnDeg: number;
  /** Deltas at or below this are not worth a revert action. */
  revertThreshold: number;
}

export interface ActionSpaceSettings {
  speedStepKnots: number;
  headingStepDeg: number;
}

export interface SimulationConfig {
  safetyZoneRadiusM: number;
  horizonNm: number;
  /** Number of forward samples taken by the predictor. */
  horizonSteps: number;
  /** Simulated seconds per discrete step. */
  stepSeconds: number;
  classifier: ClassifierMode;
  maneuvers: ManeuverSettings;
  actionSpace: ActionSpaceSettings;
}

export const DEFAULT_MANEUVERS: ManeuverSettings = {
  redTurnDeg: 20,
  redSpeedChange: -3,
  orangeTurnDeg: 15,
  revertThreshold: 1e-3,
};

export const DEFAULT_ACTION_SPACE: ActionSpaceSettings = {
  speedStepKnots: 2,
  headingStepDeg: 15,
};

/**
 * Enough discrete steps to cover `horizonNm` at full speed.
 * Zero when the fleet cannot move.
 */
export function deriveHorizonSteps(
  horizonNm: number,
  maxSpeedKnots: number,
  stepSeconds: number
): number {
  if (maxSpeedKnots <= 0 || stepSeconds <= 0) return 0;
  return Math.ceil((horizonNm * SECONDS_PER_HOUR) / (maxSpeedKnots * stepSeconds));
}

export interface ConfigOverrides {
  safetyZoneRadiusM?: number;
  horizonNm?: number;
  horizonSteps?: number;
  stepSeconds?: number;
  maxSpeedKnots?: number;
  classifier?: ClassifierMode;
  maneuvers?: Partial<ManeuverSettings>;
  actionSpace?: Partial<ActionSpaceSettings>;
}

export function buildConfig(overrides: ConfigOverrides = {}): SimulationConfig {
  const horizonNm = overrides.horizonNm ?? env.horizonNm;
  const stepSeconds = overrides.stepSeconds ?? env.stepSeconds;
  const maxSpeedKnots = overrides.maxSpeedKnots ?? env.maxSpeedKnots;
  return {
    safetyZoneRadiusM: overrides.safetyZoneRadiusM ?? env.safetyZoneRadiusM,
    horizonNm,
    horizonSteps:
      overrides.horizonSteps ?? deriveHorizonSteps(horizonNm, maxSpeedKnots, stepSeconds),
    stepSeconds,
    classifier: overrides.classifier ?? env.classifier,
    maneuvers: { ...DEFAULT_MANEUVERS, ...overrides.maneuvers },
    actionSpace: { ...DEFAULT_ACTION_SPACE, ...overrides.actionSpace },
  };
}

/** Two safety zones touch at twice the radius. */
export function collisionDistanceNm(config: SimulationConfig): number {
  return (2 * config.safetyZoneRadiusM) / METERS_PER_NM;
}
