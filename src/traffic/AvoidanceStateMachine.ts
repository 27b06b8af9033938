import { createDebugLog } from '../lib/debugLog.js';
import { emptyDecision, evaluateEncounters, revertAction } from './Decision.js';
import type { Action, AvoidanceStrategy, Decision, FlagUpdate } from './Decision.js';
import { clampSpeedChange } from './Kinematics.js';
import type { Vessel } from './Vessel.js';
import type { SimulationConfig } from './config.js';

export type AvoidanceState = 'clear' | 'avoiding';

const debugLog = createDebugLog('Avoidance');

export function avoidanceState(vessel: Vessel): AvoidanceState {
  return vessel.isAvoiding ? 'avoiding' : 'clear';
}

/**
 * Reactive COLREGS controller. Each vessel is either clear or avoiding:
 *
 * - clear -> avoiding: a red or orange pair with neither vessel avoiding. Red
 *   turns both vessels to starboard and slows them; orange turns only the
 *   give-way vessel(s).
 * - avoiding -> avoiding: no further maneuvers for the same incident.
 * - avoiding -> clear: once the whole horizon is clear for every pair the
 *   vessel is steered back to its destination at full speed.
 *
 * Reverts are evaluated before new maneuvers, and red pairs before orange
 * ones so a shared vessel always takes the red maneuver.
 */
export class ReactiveAvoidance implements AvoidanceStrategy {
  readonly name = 'reactive' as const;

  decide(vessels: readonly Vessel[], config: SimulationConfig, timeStep: number): Decision {
    if (vessels.length < 2) return emptyDecision();

    const { statuses, labels, encounters } = evaluateEncounters(vessels, config);
    const byId = new Map(vessels.map((v) => [v.id, v]));
    const avoiding = new Map(vessels.map((v) => [v.id, avoidanceState(v)]));
    const actions: Action[] = [];
    const flagUpdates: FlagUpdate[] = [];
    const { maneuvers } = config;

    const setState = (id: number, state: AvoidanceState) => {
      avoiding.set(id, state);
      flagUpdates.push({ vesselId: id, isAvoiding: state === 'avoiding' });
    };

    for (const v of vessels) {
      if (avoiding.get(v.id) !== 'avoiding' || statuses.get(v.id) !== 'green') continue;
      const revert = revertAction(v, maneuvers.revertThreshold);
      if (revert) actions.push(revert);
      setState(v.id, 'clear');
      debugLog('revert', { timeStep, vesselId: v.id, revert });
    }

    const ordered = [
      ...encounters.filter((enc) => enc.severity === 'red'),
      ...encounters.filter((enc) => enc.severity !== 'red'),
    ];
    for (const enc of ordered) {
      const [idA, idB] = enc.ids;
      if (avoiding.get(idA) === 'avoiding' || avoiding.get(idB) === 'avoiding') continue;

      if (enc.severity === 'red') {
        for (const id of enc.ids) {
          const v = byId.get(id);
          if (!v) continue;
          actions.push({
            vesselId: id,
            headingChange: -maneuvers.redTurnDeg,
            speedChange: clampSpeedChange(v, maneuvers.redSpeedChange),
          });
          setState(id, 'avoiding');
        }
      } else {
        enc.ids.forEach((id, k) => {
          if (enc.roles[k] !== 'giveWay') return;
          actions.push({ vesselId: id, headingChange: -maneuvers.orangeTurnDeg, speedChange: 0 });
          setState(id, 'avoiding');
        });
      }
      debugLog('maneuver', { timeStep, ids: enc.ids, severity: enc.severity, scenario: enc.scenario });
    }

    return { statuses, labels, encounters, actions, flagUpdates };
  }
}
