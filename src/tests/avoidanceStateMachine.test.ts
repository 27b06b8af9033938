import { describe, test, expect } from 'vitest';
import { Vessel } from '../traffic/Vessel.js';
import { ReactiveAvoidance, avoidanceState } from '../traffic/AvoidanceStateMachine.js';
import { buildConfig } from '../traffic/config.js';

const config = buildConfig({
    safetyZoneRadiusM: 185.2,
    horizonNm: 5,
    stepSeconds: 30,
    maxSpeedKnots: 20,
    classifier: 'relativeBearing',
});

const vessel = (
    id: number,
    source: [number, number],
    destination: [number, number],
    opts: { maxSpeed?: number; speed?: number } = {}
) => new Vessel({ id, source, destination, maxSpeed: opts.maxSpeed ?? 20, speed: opts.speed });

const headOnPair = () => [vessel(0, [0, 0], [10, 0]), vessel(1, [2, 0], [-8, 0])];

describe('ReactiveAvoidance', () => {
    test('orange head-on turns both vessels to starboard', () => {
        const strategy = new ReactiveAvoidance();
        const decision = strategy.decide(headOnPair(), config, 0);

        expect(decision.statuses.get(0)).toBe('orange');
        expect(decision.statuses.get(1)).toBe('orange');
        expect(decision.encounters).toHaveLength(1);
        expect(decision.encounters[0].scenario).toBe('headOn');
        expect(decision.encounters[0].roles).toEqual(['giveWay', 'giveWay']);
        expect(decision.actions).toEqual([
            { vesselId: 0, headingChange: -15, speedChange: 0 },
            { vesselId: 1, headingChange: -15, speedChange: 0 },
        ]);
        expect(decision.flagUpdates).toEqual([
            { vesselId: 0, isAvoiding: true },
            { vesselId: 1, isAvoiding: true },
        ]);
        expect(decision.labels.get(0)).toEqual({ scenario: 'headOn', role: 'giveWay' });
    });

    test('orange crossing turns only the give-way vessel', () => {
        const a = vessel(0, [0, 0], [10, 0]);
        const b = vessel(1, [3, -3], [3, 7]);
        const decision = new ReactiveAvoidance().decide([a, b], config, 0);

        expect(decision.encounters[0].severity).toBe('orange');
        expect(decision.encounters[0].futureStep).toBe(18);
        expect(decision.actions).toEqual([{ vesselId: 0, headingChange: -15, speedChange: 0 }]);
        expect(decision.flagUpdates).toEqual([{ vesselId: 0, isAvoiding: true }]);
        expect(decision.labels.get(1)).toEqual({ scenario: 'crossing', role: 'standOn' });
    });

    test('red turns and slows both vessels whatever the scenario', () => {
        const a = vessel(0, [0, 0], [10, 0], { maxSpeed: 15 });
        const b = vessel(1, [0.1, 0], [0.1, 0], { maxSpeed: 15, speed: 0 });
        const decision = new ReactiveAvoidance().decide([a, b], config, 0);

        expect(decision.statuses.get(0)).toBe('red');
        expect(decision.statuses.get(1)).toBe('red');
        expect(decision.actions).toHaveLength(2);
        expect(decision.actions[0]).toEqual({ vesselId: 0, headingChange: -20, speedChange: -3 });
        expect(decision.actions[1].vesselId).toBe(1);
        expect(decision.actions[1].headingChange).toBe(-20);
        expect(decision.actions[1].speedChange).toBeCloseTo(0);
    });

    test('no new maneuver while either vessel is already avoiding', () => {
        const [a, b] = headOnPair();
        a.isAvoiding = true;
        const decision = new ReactiveAvoidance().decide([a, b], config, 0);

        expect(decision.statuses.get(0)).toBe('orange');
        expect(decision.actions).toEqual([]);
        expect(decision.flagUpdates).toEqual([]);
    });

    test('avoiding vessel with a clear horizon steers back to its destination', () => {
        const a = vessel(0, [0, 0], [10, 0]);
        a.heading = 345;
        a.speed = 17;
        a.isAvoiding = true;
        const far = vessel(1, [50, 50], [60, 50]);
        const decision = new ReactiveAvoidance().decide([a, far], config, 0);

        expect(decision.statuses.get(0)).toBe('green');
        expect(decision.actions).toEqual([{ vesselId: 0, headingChange: 15, speedChange: 3 }]);
        expect(decision.flagUpdates).toEqual([{ vesselId: 0, isAvoiding: false }]);
    });

    test('red pair takes precedence over an orange pair sharing a vessel', () => {
        const a = vessel(0, [0, 0], [10, 0]);
        const b = vessel(1, [3, -3], [3, 7]);
        const c = vessel(2, [0.1, 0.05], [0.1, 0.05], { speed: 0 });
        const decision = new ReactiveAvoidance().decide([a, b, c], config, 0);

        expect(decision.statuses.get(0)).toBe('red');
        expect(decision.statuses.get(1)).toBe('orange');
        expect(decision.statuses.get(2)).toBe('red');
        expect(decision.encounters.map((e) => [e.ids, e.severity])).toEqual([
            [[0, 1], 'orange'],
            [[0, 2], 'red'],
        ]);
        expect(decision.actions).toHaveLength(2);
        expect(decision.actions[0]).toEqual({ vesselId: 0, headingChange: -20, speedChange: -3 });
        expect(decision.actions[1].vesselId).toBe(2);
        expect(decision.actions[1].headingChange).toBe(-20);
        expect(decision.actions[1].speedChange).toBeCloseTo(0);
        expect(decision.flagUpdates).toEqual([
            { vesselId: 0, isAvoiding: true },
            { vesselId: 2, isAvoiding: true },
        ]);
    });

    test('stays avoiding while any of its pairs is still orange', () => {
        const [a, b] = headOnPair();
        a.isAvoiding = true;
        const far = vessel(2, [50, 50], [60, 50]);
        const decision = new ReactiveAvoidance().decide([a, b, far], config, 0);

        expect(decision.statuses.get(0)).toBe('orange');
        expect(decision.statuses.get(2)).toBe('green');
        expect(decision.actions).toEqual([]);
        expect(decision.flagUpdates).toEqual([]);
    });

    test('revert clears the flag even when no correction is needed', () => {
        const a = vessel(0, [0, 0], [10, 0]);
        a.isAvoiding = true;
        const far = vessel(1, [50, 50], [60, 50]);
        const decision = new ReactiveAvoidance().decide([a, far], config, 0);

        expect(decision.actions).toEqual([]);
        expect(decision.flagUpdates).toEqual([{ vesselId: 0, isAvoiding: false }]);
    });

    test('one maneuver per vessel per step across several pairs', () => {
        const a = vessel(0, [0, 0], [10, 0]);
        const b = vessel(1, [2, 0], [-8, 0]);
        const c = vessel(2, [0.5, -2], [0.5, 8]);
        const decision = new ReactiveAvoidance().decide([a, b, c], config, 0);
        const forA = decision.actions.filter((act) => act.vesselId === 0);
        expect(forA).toHaveLength(1);
    });

    test('fewer than two vessels is a no-op', () => {
        const decision = new ReactiveAvoidance().decide([vessel(0, [0, 0], [10, 0])], config, 0);
        expect(decision.statuses.size).toBe(0);
        expect(decision.actions).toEqual([]);
        expect(decision.encounters).toEqual([]);
    });

    test('does not move or flag the live vessels', () => {
        const vessels = headOnPair();
        new ReactiveAvoidance().decide(vessels, config, 0);
        expect(vessels[0].heading).toBe(0);
        expect(vessels[0].isAvoiding).toBe(false);
        expect(avoidanceState(vessels[1])).toBe('clear');
    });
});
