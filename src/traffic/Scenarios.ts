import type { StrategyName } from '../config/env.js';
import { ReactiveAvoidance } from './AvoidanceStateMachine.js';
import { BacktrackingPlanner } from './BacktrackingPlanner.js';
import type { AvoidanceStrategy } from './Decision.js';
import type { Vec2, VesselInit } from './Vessel.js';
import { World } from './World.js';
import { buildConfig } from './config.js';
import type { ConfigOverrides } from './config.js';

export interface Scenario {
  name: string;
  vessels: VesselInit[];
  settings?: ConfigOverrides;
}

/**
 * Collection of small encounters used by the scenario tests and the
 * simulate script. Coordinates are in nautical miles and speeds in knots.
 */
export class Scenarios {
  /** Two vessels 10 NM apart on reciprocal courses. */
  static headOn: Scenario = {
    name: 'headOn',
    vessels: [
      { id: 0, source: [0, 0], destination: [10, 0], maxSpeed: 20 },
      { id: 1, source: [10, 0], destination: [0, 0], maxSpeed: 20 },
    ],
    settings: { safetyZoneRadiusM: 185.2, horizonNm: 5 },
  };

  /** Northbound vessel crossing ahead of an eastbound one from its starboard side. */
  static crossing: Scenario = {
    name: 'crossing',
    vessels: [
      { id: 0, source: [0, 5], destination: [10, 5], maxSpeed: 20 },
      { id: 1, source: [5, 0], destination: [5, 10], maxSpeed: 20 },
    ],
  };

  /** Faster vessel coming up astern of a slower one. */
  static overtake: Scenario = {
    name: 'overtake',
    vessels: [
      { id: 0, source: [2, 0], destination: [10, 0], maxSpeed: 8 },
      { id: 1, source: [0, 0.05], destination: [14, 0.05], maxSpeed: 20 },
    ],
  };

  /** Moving vessel with a vessel lying stopped on its track. */
  static stationaryObstacle: Scenario = {
    name: 'stationaryObstacle',
    vessels: [
      { id: 0, source: [0, 0], destination: [10, 0], maxSpeed: 15 },
      { id: 1, source: [5, 0], destination: [5, 0], maxSpeed: 15, speed: 0 },
    ],
  };

  /** Three vessels converging on a common point. */
  static threeWayCross: Scenario = {
    name: 'threeWayCross',
    vessels: [
      { id: 0, source: [0, 5], destination: [10, 5], maxSpeed: 16 },
      { id: 1, source: [10, 4], destination: [0, 6], maxSpeed: 16 },
      { id: 2, source: [5, 0], destination: [5, 10], maxSpeed: 16 },
    ],
  };

  static all(): Scenario[] {
    return [
      Scenarios.headOn,
      Scenarios.crossing,
      Scenarios.overtake,
      Scenarios.stationaryObstacle,
      Scenarios.threeWayCross,
    ];
  }

  static byName(name: string): Scenario {
    const found = Scenarios.all().find((s) => s.name === name);
    if (!found) {
      throw new Error(`[Scenarios] unknown scenario "${name}"`);
    }
    return found;
  }
}

export function createStrategy(name: StrategyName): AvoidanceStrategy {
  return name === 'backtracking' ? new BacktrackingPlanner() : new ReactiveAvoidance();
}

/**
 * Build a world for the scenario. The horizon step count is derived from
 * the fastest vessel unless the scenario fixes it.
 */
export function createWorld(
  scenario: Scenario,
  strategy: AvoidanceStrategy = new ReactiveAvoidance(),
  overrides: ConfigOverrides = {}
): World {
  const fastest = scenario.vessels.reduce((max, v) => Math.max(max, v.maxSpeed), 0);
  const config = buildConfig({ maxSpeedKnots: fastest, ...scenario.settings, ...overrides });
  const world = new World(config, strategy);
  for (const v of scenario.vessels) world.addVessel(v);
  return world;
}

function parsePoint(value: unknown): Vec2 | null {
  if (typeof value === 'string') {
    const parts = value.split(',').map((p) => Number(p.trim()));
    if (parts.length !== 2 || !parts.every(Number.isFinite)) return null;
    return [parts[0], parts[1]];
  }
  if (Array.isArray(value) && value.length === 2) {
    const [x, y] = value;
    if (typeof x === 'number' && typeof y === 'number' && Number.isFinite(x) && Number.isFinite(y)) {
      return [x, y];
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Read a scenario from parsed JSON. Positions may be `[x, y]` arrays or
 * `"x,y"` strings; vessels with unreadable positions are skipped.
 */
export function parseScenario(raw: unknown, fallbackName = 'custom'): Scenario {
  if (!isRecord(raw) || !Array.isArray(raw.vessels)) {
    throw new Error('[Scenarios] scenario must be an object with a "vessels" array');
  }
  const defaultSpeed = optionalNumber(raw.maxSpeed) ?? 10;
  const vessels: VesselInit[] = [];
  raw.vessels.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      console.warn('[Scenarios] skipping vessel', index, 'not an object');
      return;
    }
    const source = parsePoint(entry.source);
    const destination = parsePoint(entry.destination);
    if (!source || !destination) {
      console.warn('[Scenarios] skipping vessel', index, 'unreadable source or destination');
      return;
    }
    vessels.push({
      id: optionalNumber(entry.id) ?? index,
      source,
      destination,
      maxSpeed: optionalNumber(entry.maxSpeed) ?? defaultSpeed,
      speed: optionalNumber(entry.speed),
      widthM: optionalNumber(entry.widthM),
      lengthM: optionalNumber(entry.lengthM),
    });
  });

  const settings: ConfigOverrides = {};
  const safety = optionalNumber(raw.safetyZoneM);
  const horizon = optionalNumber(raw.horizonNm);
  const stepSeconds = optionalNumber(raw.stepSeconds);
  if (safety !== undefined) settings.safetyZoneRadiusM = safety;
  if (horizon !== undefined) settings.horizonNm = horizon;
  if (stepSeconds !== undefined) settings.stepSeconds = stepSeconds;

  return {
    name: typeof raw.name === 'string' ? raw.name : fallbackName,
    vessels,
    settings,
  };
}
