import { config } from 'dotenv';

config();

export type StrategyName = 'reactive' | 'backtracking';
export type ClassifierMode = 'relativeBearing' | 'headingDifference';

export const toNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const toBool = (value: string | undefined, fallback = false): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
};

export const toStrategy = (value: string | undefined): StrategyName =>
  value?.trim().toLowerCase() === 'backtracking' ? 'backtracking' : 'reactive';

export const toClassifierMode = (value: string | undefined): ClassifierMode =>
  value?.trim() === 'headingDifference' ? 'headingDifference' : 'relativeBearing';

const rawEnv = process.env;

export const env = {
  safetyZoneRadiusM: toNumber(rawEnv.SAFETY_ZONE_M, 200),
  horizonNm: toNumber(rawEnv.HORIZON_NM, 5),
  stepSeconds: toNumber(rawEnv.STEP_SECONDS, 30),
  maxSpeedKnots: toNumber(rawEnv.MAX_SPEED_KNOTS, 20),
  strategy: toStrategy(rawEnv.AVOIDANCE_STRATEGY),
  classifier: toClassifierMode(rawEnv.CLASSIFIER_MODE),
  debugLogs: toBool(rawEnv.DEBUG_LOGS, false),
} as const;

export type Env = typeof env;
