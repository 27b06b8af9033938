import type { Encounter } from './ColregsClassifier.js';
import type { Role } from './RoleAssigner.js';
import { normalizeHeading } from './Kinematics.js';

export type Vec2 = [number, number];

/** Proximity status: red is an immediate violation, orange a predicted one. */
export type Status = 'green' | 'orange' | 'red';

export interface VesselInit {
  id: number;
  source: Vec2;
  destination: Vec2;
  maxSpeed: number; // knots
  /** Initial speed in knots, defaults to `maxSpeed`. */
  speed?: number;
  widthM?: number;
  lengthM?: number;
}

const ARRIVAL_EPSILON_NM = 1e-6;

/**
 * A ship transiting in a straight line from `source` to `destination`.
 *
 * Heading follows the atan2 convention: 0° points along +x and angles grow
 * counter-clockwise. A turn to starboard therefore lowers the heading.
 */
export class Vessel {
  readonly id: number;
  readonly source: Vec2;
  readonly destination: Vec2;
  readonly maxSpeed: number;
  readonly widthM: number;
  readonly lengthM: number;

  position: Vec2;
  scenario: Encounter | null = null;
  role: Role | null = null;
  isAvoiding = false;

  private headingDeg = 0;
  private dir: Vec2 = [0, 0];
  private speedKnots: number;
  private currentStatus: Status = 'green';

  constructor(init: VesselInit) {
    this.id = init.id;
    this.source = [...init.source];
    this.destination = [...init.destination];
    this.maxSpeed = Math.max(init.maxSpeed, 0);
    this.widthM = init.widthM ?? 200;
    this.lengthM = init.lengthM ?? 200;
    this.position = [...init.source];
    this.speedKnots = clamp(init.speed ?? this.maxSpeed, 0, this.maxSpeed);

    const dx = this.destination[0] - this.source[0];
    const dy = this.destination[1] - this.source[1];
    const dist = Math.hypot(dx, dy);
    if (dist > ARRIVAL_EPSILON_NM) {
      this.dir = [dx / dist, dy / dist];
      this.headingDeg = normalizeHeading((Math.atan2(dy, dx) * 180) / Math.PI);
    }
  }

  get heading(): number {
    return this.headingDeg;
  }

  set heading(deg: number) {
    this.headingDeg = normalizeHeading(deg);
    const rad = (this.headingDeg * Math.PI) / 180;
    this.dir = [Math.cos(rad), Math.sin(rad)];
  }

  /** Unit vector along the heading, or the zero vector for a vessel with no transit. */
  get direction(): Vec2 {
    return [this.dir[0], this.dir[1]];
  }

  get speed(): number {
    return this.speedKnots;
  }

  set speed(knots: number) {
    this.speedKnots = clamp(knots, 0, this.maxSpeed);
  }

  get status(): Status {
    return this.currentStatus;
  }

  set status(status: Status) {
    this.currentStatus = status;
  }

  get inDanger(): boolean {
    return this.currentStatus !== 'green';
  }

  get distanceToDestination(): number {
    return Math.hypot(
      this.destination[0] - this.position[0],
      this.destination[1] - this.position[1]
    );
  }

  get hasArrived(): boolean {
    return this.distanceToDestination <= ARRIVAL_EPSILON_NM;
  }

  /** Deep copy for what-if simulation; nothing is shared with the original. */
  clone(): Vessel {
    const copy = new Vessel({
      id: this.id,
      source: this.source,
      destination: this.destination,
      maxSpeed: this.maxSpeed,
      speed: this.speedKnots,
      widthM: this.widthM,
      lengthM: this.lengthM,
    });
    copy.position = [...this.position];
    copy.headingDeg = this.headingDeg;
    copy.dir = [...this.dir];
    copy.currentStatus = this.currentStatus;
    copy.scenario = this.scenario;
    copy.role = this.role;
    copy.isAvoiding = this.isAvoiding;
    return copy;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
