import { config } from "../config.js";
import { DecodeError, getDecodeDebugMessage } from "./errors.js";
import { LegBuilder, type DecodeContext, type Leg } from "./legBuilder.js";
import { formatLevel, formatSpeed, formatWind, PerformanceState } from "./performance.js";
import { airportFix, FixResolver, type Fix, type RouteElement } from "./resolver.js";
import { scanRoute, type Token } from "./scanner.js";
import { approach, describeScope, direct, enterAirport, initialScope, type ScopeState } from "./scope.js";
import type { AreaId, Level, NavigationData, RunwayRecord, Speed } from "../types.js";

export interface RouteTotals {
  distance: number; // NM
  ete?: number; // minutes, absent as soon as one leg has none
  fuel?: number;
}

interface RouteInit {
  tokens: readonly Token[];
  legs: readonly Leg[];
  cruiseSpeed?: Speed;
  cruiseLevel?: Level;
}

/**
 * A decoded route: a non-empty chain of legs where each leg starts at the
 * previous leg's destination. Immutable; decode the string again to change it.
 *
 * ```text
 * 13509KT N0107 EDDH D DCT 18009KT DCT W EDHL
 * ```
 *
 * has wind 135° at 9 kt on the leg EDDH to D and 180° at 9 kt from D onwards.
 */
export class Route {
  readonly tokens: readonly Token[];
  readonly legs: readonly Leg[];
  /** First speed given in the route */
  readonly cruiseSpeed?: Speed;
  /** First level given in the route */
  readonly cruiseLevel?: Level;

  constructor(init: RouteInit) {
    if (init.legs.length === 0) {
      throw new DecodeError("MissingOriginOrDestination", "A route needs at least one leg");
    }
    this.tokens = init.tokens;
    this.legs = init.legs;
    this.cruiseSpeed = init.cruiseSpeed;
    this.cruiseLevel = init.cruiseLevel;
    Object.freeze(this);
  }

  get origin(): Fix {
    return this.legs[0].origin;
  }

  get destination(): Fix {
    return this.legs[this.legs.length - 1].destination;
  }

  get takeoffRunway(): RunwayRecord | undefined {
    return this.origin.kind === "airport" ? this.origin.runway : undefined;
  }

  get landingRunway(): RunwayRecord | undefined {
    return this.destination.kind === "airport" ? this.destination.runway : undefined;
  }

  /**
   * Running totals from the origin to the end of each leg. ETE and fuel are
   * all-or-nothing: once a leg lacks them, every later total lacks them too.
   */
  accumulateLegs(): RouteTotals[] {
    const totals: RouteTotals[] = [];
    let running: RouteTotals = { distance: 0, ete: 0, fuel: 0 };

    for (const leg of this.legs) {
      running = {
        distance: running.distance + leg.distance,
        ete: running.ete !== undefined && leg.ete !== undefined ? running.ete + leg.ete : undefined,
        fuel: running.fuel !== undefined && leg.fuel !== undefined ? running.fuel + leg.fuel : undefined,
      };
      totals.push(running);
    }

    return totals;
  }

  totals(): RouteTotals {
    const all = this.accumulateLegs();
    return all[all.length - 1];
  }

  toString(): string {
    return this.tokens.map((token) => token.text).join(" ");
  }
}

/** Area of the next airport ahead, unless a DCT comes first */
function incomingArea(elements: RouteElement[], from: number, resolver: FixResolver): AreaId | undefined {
  for (const element of elements.slice(from)) {
    if (element.kind === "airport") return resolver.areaOf(element.airport);
    if (element.kind === "via") return undefined;
  }
  return undefined;
}

function debug(message: string) {
  if (config.routeDebug) console.debug(`[ROUTE DEBUG] ${message}`);
}

/**
 * Decodes a route string such as `N0107 A025 EDDH D DCT W EDHL` into legs.
 *
 * Grammar: `[WIND] SPEED LEVEL ORIGIN {[DCT [AIRPORT]] WAYPOINT}* DESTINATION`;
 * speed, level and wind may appear anywhere and apply from there on.
 *
 * @throws DecodeError on the first element that cannot be decoded
 */
export function decode(route: string, nav: NavigationData, context: DecodeContext = {}): Route {
  debug(`decode: ${JSON.stringify(route)}`);

  try {
    const tokens = scanRoute(route);
    const resolver = new FixResolver(nav);
    const elements = tokens.map((token) => resolver.classify(token));

    const performance = new PerformanceState();
    const builder = new LegBuilder(context);
    let scope: ScopeState = initialScope();

    elements.forEach((element, i) => {
      const previous = elements[i - 1];
      const next = elements[i + 1];

      switch (element.kind) {
        case "performance":
          performance.apply(element.element);
          break;

        case "via":
          if (next?.kind !== "airport") scope = direct(scope);
          break;

        case "airport": {
          const afterDirect = previous?.kind === "via";
          scope = enterAirport(scope, resolver.areaOf(element.airport), afterDirect);
          debug(`${element.token.text}: scope ${describeScope(scope)}`);

          // DCT <airport> <waypoint> only opens the terminal area
          if (afterDirect && next?.kind === "identifier") break;

          builder.add(airportFix(element.airport, element.runway), performance.snapshot());
          break;
        }

        case "identifier": {
          const waypointScope = approach(scope, incomingArea(elements, i + 1, resolver));
          const fix = resolver.resolveWaypoint(element.token, waypointScope);
          debug(`${element.token.text}: ${fix.key} in ${describeScope(waypointScope)}`);
          builder.add(fix, performance.snapshot());
          break;
        }
      }
    });

    const legs = builder.build();
    const cruise = performance.cruise();
    debug(`decoded ${legs.length} leg(s)`);

    return new Route({ tokens, legs, cruiseSpeed: cruise.speed, cruiseLevel: cruise.level });
  } catch (err) {
    if (config.routeDebug && err instanceof DecodeError) console.debug(getDecodeDebugMessage(err));
    throw err;
  }
}

/** Canonical text of the performance a leg is flown with, e.g. `N0107 A025 01005KT` */
export function describePerformance(leg: Leg): string {
  const { speed, level, wind } = leg.performance;
  return [speed && formatSpeed(speed), level && formatLevel(level), wind && formatWind(wind)]
    .filter((part): part is string => typeof part === "string")
    .join(" ");
}
