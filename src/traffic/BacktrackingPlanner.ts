import { createDebugLog } from '../lib/debugLog.js';
import { checkFuture, checkImmediate } from './CollisionPredictor.js';
import { emptyDecision, evaluateEncounters, revertAction } from './Decision.js';
import type { Action, AvoidanceStrategy, Decision, FlagUpdate } from './Decision.js';
import { advance, changeHeading, changeSpeed, clampSpeedChange, distanceNm } from './Kinematics.js';
import type { Vessel } from './Vessel.js';
import { DEFAULT_ACTION_SPACE, collisionDistanceNm } from './config.js';
import type { ActionSpaceSettings, SimulationConfig } from './config.js';

const debugLog = createDebugLog('Planner');

/** Below this a simulated vessel counts as stopped. */
const MIN_PLAN_SPEED_KNOTS = 0.01;

export interface ManeuverDelta {
  speedChange: number;
  headingChange: number;
}

/**
 * Nine discrete single-ship actions: {decrease, maintain, increase} speed
 * crossed with {port, maintain, starboard} heading, indexed
 * `speed * 3 + heading`.
 */
export class ActionSpace {
  static readonly SIZE = 9;
  readonly maintainIndex = 4;

  constructor(private readonly settings: ActionSpaceSettings = DEFAULT_ACTION_SPACE) {}

  get size(): number {
    return ActionSpace.SIZE;
  }

  decode(index: number): ManeuverDelta {
    const speedSign = Math.floor(index / 3) - 1;
    // port is counter-clockwise, i.e. a positive heading change
    const headingSign = 1 - (index % 3);
    return {
      speedChange: speedSign * this.settings.speedStepKnots,
      headingChange: headingSign * this.settings.headingStepDeg,
    };
  }
}

/** vesselId -> time step -> action index */
type PlanBook = Map<number, Map<number, number>>;

function copyPlans(plans: PlanBook): PlanBook {
  return new Map(Array.from(plans, ([id, steps]) => [id, new Map(steps)]));
}

/**
 * Search-based alternative to the reactive controller. When an orange
 * give-way vessel is found, try a single override action at each earlier
 * step (latest first) and keep the first one whose simulated trajectory
 * stays clear up to the predicted collision. Not optimal, only bounded.
 */
export class BacktrackingPlanner implements AvoidanceStrategy {
  readonly name = 'backtracking' as const;
  private plans: PlanBook = new Map();

  constructor(private readonly actionSpace?: ActionSpace) {}

  getPlan(vesselId: number): ReadonlyMap<number, number> {
    return this.plans.get(vesselId) ?? new Map<number, number>();
  }

  decide(vessels: readonly Vessel[], config: SimulationConfig, timeStep: number): Decision {
    if (vessels.length < 2) return emptyDecision();

    const space = this.actionSpace ?? new ActionSpace(config.actionSpace);
    const { statuses, labels, encounters } = evaluateEncounters(vessels, config);
    this.prune(timeStep);

    vessels.forEach((v, idx) => {
      if (statuses.get(v.id) !== 'orange') return;
      if (labels.get(v.id)?.role !== 'giveWay') return;
      if (v.isAvoiding) return;
      if (this.hasPendingPlan(v.id, timeStep)) return;
      this.plan(vessels, idx, config, timeStep, space);
    });

    const actions: Action[] = [];
    const flagUpdates: FlagUpdate[] = [];
    for (const v of vessels) {
      const steps = this.plans.get(v.id);
      const planned = steps?.get(timeStep);
      if (planned !== undefined) {
        steps?.delete(timeStep);
        const delta = space.decode(planned);
        actions.push({
          vesselId: v.id,
          headingChange: delta.headingChange,
          speedChange: clampSpeedChange(v, delta.speedChange),
        });
        if (!v.isAvoiding) flagUpdates.push({ vesselId: v.id, isAvoiding: true });
        continue;
      }
      if (v.isAvoiding && statuses.get(v.id) === 'green' && !this.hasPendingPlan(v.id, timeStep)) {
        const revert = revertAction(v, config.maneuvers.revertThreshold);
        if (revert) actions.push(revert);
        flagUpdates.push({ vesselId: v.id, isAvoiding: false });
      }
    }

    return { statuses, labels, encounters, actions, flagUpdates };
  }

  private hasPendingPlan(vesselId: number, timeStep: number): boolean {
    const steps = this.plans.get(vesselId);
    if (!steps) return false;
    for (const step of steps.keys()) {
      if (step >= timeStep) return true;
    }
    return false;
  }

  private prune(timeStep: number): void {
    for (const [id, steps] of this.plans) {
      for (const step of Array.from(steps.keys())) {
        if (step < timeStep) steps.delete(step);
      }
      if (steps.size === 0) this.plans.delete(id);
    }
  }

  /**
   * Absolute time step of the vessel's earliest predicted collision with any
   * vessel inside the horizon, or null.
   */
  private earliestCollision(
    vessels: readonly Vessel[],
    idx: number,
    config: SimulationConfig,
    timeStep: number
  ): number | null {
    const threshold = collisionDistanceNm(config);
    let earliest: number | null = null;
    for (let j = 0; j < vessels.length; j++) {
      if (j === idx) continue;
      if (distanceNm(vessels[idx].position, vessels[j].position) > config.horizonNm) continue;
      const future = checkFuture(
        vessels[idx],
        vessels[j],
        threshold,
        config.horizonSteps,
        config.stepSeconds
      );
      if (future.step !== null && (earliest === null || future.step < earliest)) {
        earliest = future.step;
      }
    }
    return earliest === null ? null : timeStep + earliest;
  }

  private plan(
    vessels: readonly Vessel[],
    idx: number,
    config: SimulationConfig,
    timeStep: number,
    space: ActionSpace
  ): boolean {
    const vesselId = vessels[idx].id;
    const collisionStep = this.earliestCollision(vessels, idx, config, timeStep);
    if (collisionStep === null) return false;

    for (let back = collisionStep - 1; back >= timeStep; back--) {
      for (let action = 0; action < space.size; action++) {
        const candidate = copyPlans(this.plans);
        const steps = candidate.get(vesselId) ?? new Map<number, number>();
        steps.set(back, action);
        candidate.set(vesselId, steps);
        if (this.simulate(vessels, vesselId, candidate, timeStep, collisionStep, config, space)) {
          this.plans = candidate;
          debugLog('plan committed', { timeStep, vesselId, back, action, collisionStep });
          return true;
        }
      }
    }
    debugLog('no plan found', { timeStep, vesselId, collisionStep });
    return false;
  }

  /** Run a scratch copy of the fleet under `plans`; true if nothing comes too close. */
  private simulate(
    vessels: readonly Vessel[],
    vesselId: number,
    plans: PlanBook,
    fromStep: number,
    toStep: number,
    config: SimulationConfig,
    space: ActionSpace
  ): boolean {
    const scratch = vessels.map((v) => v.clone());
    const threshold = collisionDistanceNm(config);

    for (let t = fromStep; t < toStep; t++) {
      for (const s of scratch) {
        const index = plans.get(s.id)?.get(t) ?? space.maintainIndex;
        if (index === space.maintainIndex) continue;
        const delta = space.decode(index);
        if (s.id === vesselId && s.speed + delta.speedChange <= 0) return false;
        changeSpeed(s, delta.speedChange);
        changeHeading(s, delta.headingChange);
      }
      const planned = scratch.find((s) => s.id === vesselId);
      if (!planned || planned.speed <= MIN_PLAN_SPEED_KNOTS) return false;

      for (const s of scratch) advance(s, config.stepSeconds);

      for (let i = 0; i < scratch.length; i++) {
        for (let j = i + 1; j < scratch.length; j++) {
          if (checkImmediate(scratch[i], scratch[j], threshold)) return false;
        }
      }
    }
    return true;
  }
}
