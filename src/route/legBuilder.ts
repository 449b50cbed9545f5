import { DecodeError } from "./errors.js";
import { speedInKnots, type PerformanceSnapshot } from "./performance.js";
import type { Fix } from "./resolver.js";
import { haversineDistance, initialBearing, normalizeHeading } from "../geo.js";
import { solveWindTriangle } from "../utils/windTriangle.js";
import type { MagneticModel, PerformanceProfile } from "../types.js";

/** External inputs some leg values depend on */
export interface DecodeContext {
  /** Date for the magnetic model; magnetic values are left out without a valid one */
  date?: Date;
  magneticModel?: MagneticModel;
  /** Cruise profile used for fuel */
  performance?: PerformanceProfile;
}

/**
 * A leg from one fix to the next. Values that need inputs the route did not
 * give (no wind, no profile, no date) are absent, never zero.
 */
export interface Leg {
  readonly origin: Fix;
  readonly destination: Fix;
  readonly performance: PerformanceSnapshot;
  readonly distance: number; // NM
  readonly trueCourse: number; // degrees
  readonly wca?: number; // degrees
  readonly groundSpeed?: number; // knots
  readonly heading?: number; // true, degrees
  readonly ete?: number; // minutes
  readonly fuel?: number; // profile fuel flow units × hours
  readonly magneticCourse?: number;
  readonly magneticHeading?: number;
}

export function isValidDate(date: Date | undefined): date is Date {
  return date instanceof Date && !Number.isNaN(date.getTime());
}

export function buildLeg(origin: Fix, destination: Fix, performance: PerformanceSnapshot, context: DecodeContext = {}): Leg {
  const distance = haversineDistance(origin.coordinate, destination.coordinate);
  const trueCourse = initialBearing(origin.coordinate, destination.coordinate);

  let leg: Leg = {
    origin: { ...origin },
    destination: { ...destination },
    performance,
    distance,
    trueCourse,
  };

  const { speed, wind, level } = performance;
  if (speed && wind) {
    const tas = speedInKnots(speed, level);
    const { wca, heading, groundSpeed } = solveWindTriangle(trueCourse, tas, wind.direction, wind.speed);
    leg = { ...leg, wca, heading, groundSpeed };

    // no ETE (and so no fuel) when the leg is never flown to its end
    if (groundSpeed > 0) {
      const ete = (distance / groundSpeed) * 60;
      leg = { ...leg, ete };

      const fuelFlow = context.performance?.fuelFlow(level);
      if (fuelFlow !== undefined) {
        leg = { ...leg, fuel: (fuelFlow * ete) / 60 };
      }
    }
  }

  if (context.magneticModel && isValidDate(context.date)) {
    const declination = context.magneticModel.declination(origin.coordinate, context.date);
    leg = { ...leg, magneticCourse: normalizeHeading(trueCourse - declination) };
    if (leg.heading !== undefined) {
      leg = { ...leg, magneticHeading: normalizeHeading(leg.heading - declination) };
    }
  }

  return Object.freeze(leg);
}

/**
 * Chains fixes into legs as they are resolved. Each leg gets the performance
 * snapshot taken when its destination was reached.
 */
export class LegBuilder {
  private previous?: Fix;
  private readonly legs: Leg[] = [];

  constructor(private readonly context: DecodeContext = {}) {}

  add(fix: Fix, performance: PerformanceSnapshot): Leg | undefined {
    const origin = this.previous;
    this.previous = fix;
    if (!origin) return undefined;

    const leg = buildLeg(origin, fix, performance, this.context);
    this.legs.push(leg);
    return leg;
  }

  build(): readonly Leg[] {
    if (this.legs.length === 0) {
      throw new DecodeError(
        "MissingOriginOrDestination",
        this.previous ? `Route has no destination after ${this.previous.ident}` : "Route has no origin or destination"
      );
    }
    return Object.freeze([...this.legs]);
  }
}
