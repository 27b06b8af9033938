import { createDebugLog } from '../lib/debugLog.js';
import { ReactiveAvoidance } from './AvoidanceStateMachine.js';
import type { Encounter } from './ColregsClassifier.js';
import type { Action, AvoidanceStrategy, Decision, EncounterReport } from './Decision.js';
import {
  advance,
  changeHeading,
  changeSpeed,
  clampSpeedChange,
  distanceNm,
  reachedDestination,
} from './Kinematics.js';
import type { Role } from './RoleAssigner.js';
import { Vessel } from './Vessel.js';
import type { Status, Vec2, VesselInit } from './Vessel.js';
import { buildConfig } from './config.js';
import type { SimulationConfig } from './config.js';

const debugLog = createDebugLog('World');

/** Below this a heading or speed delta is not applied. */
const APPLY_EPSILON = 1e-6;

export interface StepReport {
  timeStep: number;
  statuses: Map<number, Status>;
  encounters: EncounterReport[];
  actions: Action[];
}

export interface VesselSnapshot {
  id: number;
  position: Vec2;
  heading: number;
  speed: number;
  status: Status;
  destination: Vec2;
  role: Role | null;
  scenario: Encounter | null;
  isAvoiding: boolean;
}

/**
 * Owns the fleet and drives it one discrete step at a time. Only the world
 * moves vessels; strategies decide and the world applies their actions at
 * the start of the following step.
 */
export class World {
  readonly config: SimulationConfig;
  private readonly strategy: AvoidanceStrategy;
  private vessels: Vessel[] = [];
  private pending: Action[] = [];
  private currentStep = 0;
  private cpaMap = new Map<string, number>();

  constructor(config: SimulationConfig = buildConfig(), strategy: AvoidanceStrategy = new ReactiveAvoidance()) {
    this.config = config;
    this.strategy = strategy;
  }

  get timeStep(): number {
    return this.currentStep;
  }

  get strategyName(): string {
    return this.strategy.name;
  }

  addVessel(init: VesselInit): Vessel {
    if (this.vessels.some((v) => v.id === init.id)) {
      throw new Error(`[World] duplicate vessel id ${init.id}`);
    }
    const vessel = new Vessel(init);
    this.vessels.push(vessel);
    return vessel;
  }

  getVessel(id: number): Vessel | undefined {
    return this.vessels.find((v) => v.id === id);
  }

  getVessels(): readonly Vessel[] {
    return this.vessels;
  }

  /** Actions decided last step, applied at the start of the next one. */
  getPendingActions(): readonly Action[] {
    return this.pending;
  }

  applyAction(action: Action): void {
    const vessel = this.getVessel(action.vesselId);
    if (!vessel) return;
    if (Math.abs(action.headingChange) > APPLY_EPSILON) {
      changeHeading(vessel, action.headingChange);
    }
    const speedChange = clampSpeedChange(vessel, action.speedChange);
    if (Math.abs(speedChange) > APPLY_EPSILON) {
      changeSpeed(vessel, speedChange);
    }
  }

  step(): StepReport {
    for (const action of this.pending) this.applyAction(action);
    this.pending = [];

    for (const v of this.vessels) advance(v, this.config.stepSeconds);
    this.currentStep += 1;

    const decision = this.strategy.decide(this.vessels, this.config, this.currentStep);
    this.commit(decision);
    this.pending = decision.actions;
    this.updateCpaMap();

    if (decision.actions.length > 0) {
      debugLog('actions', { timeStep: this.currentStep, actions: decision.actions });
    }

    return {
      timeStep: this.currentStep,
      statuses: decision.statuses,
      encounters: decision.encounters,
      actions: decision.actions,
    };
  }

  isFinished(): boolean {
    return this.vessels.every((v) => reachedDestination(v));
  }

  getSnapshot(): VesselSnapshot[] {
    return this.vessels.map((v) => ({
      id: v.id,
      position: [...v.position],
      heading: v.heading,
      speed: v.speed,
      status: v.status,
      destination: [...v.destination],
      role: v.role,
      scenario: v.scenario,
      isAvoiding: v.isAvoiding,
    }));
  }

  /** Closest separation seen so far for every pair, in nautical miles. */
  getEncounterLog(): { ids: [number, number]; cpaNm: number }[] {
    const result: { ids: [number, number]; cpaNm: number }[] = [];
    for (const [key, val] of this.cpaMap.entries()) {
      const [a, b] = key.split('|').map(Number);
      result.push({ ids: [a, b], cpaNm: val });
    }
    return result;
  }

  private commit(decision: Decision): void {
    for (const v of this.vessels) {
      const status = decision.statuses.get(v.id);
      if (status === undefined) continue;
      v.status = status;
      const label = decision.labels.get(v.id);
      v.scenario = label?.scenario ?? null;
      v.role = label?.role ?? null;
    }
    for (const update of decision.flagUpdates) {
      const vessel = this.getVessel(update.vesselId);
      if (vessel) vessel.isAvoiding = update.isAvoiding;
    }
  }

  private updateCpaMap(): void {
    const list = this.vessels;
    for (let i = 0; i < list.length; i++) {
      for (let j = i + 1; j < list.length; j++) {
        this.recordCpa(list[i].id, list[j].id, distanceNm(list[i].position, list[j].position));
      }
    }
  }

  private recordCpa(id1: number, id2: number, dist: number): void {
    const key = id1 < id2 ? `${id1}|${id2}` : `${id2}|${id1}`;
    const cur = this.cpaMap.get(key);
    if (cur === undefined || dist < cur) {
      this.cpaMap.set(key, dist);
    }
  }
}

export default World;
