export * from './traffic/Vessel.js';
export * from './traffic/Kinematics.js';
export * from './traffic/CollisionPredictor.js';
export * from './traffic/ColregsClassifier.js';
export * from './traffic/RoleAssigner.js';
export * from './traffic/Decision.js';
export * from './traffic/AvoidanceStateMachine.js';
export * from './traffic/BacktrackingPlanner.js';
export * from './traffic/config.js';
export * from './traffic/Scenarios.js';
export { buildTrafficScenario, DEFAULT_TRAFFIC } from './traffic/buildScenario.js';
export type { TrafficOptions } from './traffic/buildScenario.js';
export { World } from './traffic/World.js';
export type { StepReport, VesselSnapshot } from './traffic/World.js';
export { env } from './config/env.js';
export type { ClassifierMode, StrategyName } from './config/env.js';
