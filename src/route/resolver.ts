import { DecodeError } from "./errors.js";
import { looksLikePerformance, malformedPerformance, parsePerformance, type PerformanceElement } from "./performance.js";
import { openAreas, type ScopeState } from "./scope.js";
import type { Token } from "./scanner.js";
import type { AirportRecord, AreaId, Coordinate, NavigationData, RunwayRecord, WaypointRecord } from "../types.js";

/** A route element classified from its token, before waypoint resolution */
export type RouteElement =
  | { kind: "via"; token: Token }
  | { kind: "performance"; token: Token; element: PerformanceElement }
  | { kind: "airport"; token: Token; airport: AirportRecord; runway?: RunwayRecord }
  | { kind: "identifier"; token: Token };

export type Fix =
  | {
      kind: "airport";
      key: string;
      ident: string;
      coordinate: Coordinate;
      airport: AirportRecord;
      runway?: RunwayRecord;
    }
  | {
      kind: "waypoint";
      key: string;
      ident: string;
      coordinate: Coordinate;
      waypoint: WaypointRecord;
    };

const VIA_DIRECT = "DCT";
const IDENTIFIER = /^[A-Z0-9]+$/;
const AIRPORT_SHAPE = /^[A-Z]{4}(?:\d{1,2}[LRC]?)?$/;
const RUNWAY_DESIGNATOR = /^\d{1,2}[LRC]?$/;

const ENROUTE_AREA = "ENRT";

function details(token: Token) {
  return { token: token.text, position: token.index, offset: token.offset };
}

export function airportFix(airport: AirportRecord, runway?: RunwayRecord): Fix {
  return Object.freeze({
    kind: "airport",
    key: airport.ident,
    ident: airport.ident,
    coordinate: airport.coordinate,
    airport,
    runway,
  });
}

export function waypointFix(waypoint: WaypointRecord): Fix {
  const area = waypoint.region.kind === "terminal" ? waypoint.region.area : ENROUTE_AREA;
  return Object.freeze({
    kind: "waypoint",
    key: `${area}/${waypoint.ident}`,
    ident: waypoint.ident,
    coordinate: waypoint.coordinate,
    waypoint,
  });
}

/**
 * Resolves route elements against navigation data. Lookups only; the data
 * is never modified.
 */
export class FixResolver {
  constructor(private readonly nav: NavigationData) {}

  /**
   * Classifies a token without looking at its neighbours: `DCT`, a valid
   * speed/level/wind, an airport (with optional runway suffix) or an
   * identifier left for waypoint resolution.
   */
  classify(token: Token): RouteElement {
    const { text } = token;

    if (text === VIA_DIRECT) return { kind: "via", token };

    if (!IDENTIFIER.test(text)) {
      throw new DecodeError("InvalidToken", `${text} is not a valid route element`, details(token));
    }

    const element = parsePerformance(token);
    if (element) return { kind: "performance", token, element };

    if (text.length >= 4) {
      const airport = this.nav.lookupAirport(text.slice(0, 4));
      if (airport) {
        const designator = text.slice(4);
        if (designator === "") return { kind: "airport", token, airport };

        const runway = RUNWAY_DESIGNATOR.test(designator) ? this.nav.lookupRunway(airport, designator) : undefined;
        if (runway) return { kind: "airport", token, airport, runway };

        // a waypoint whose name starts with an airport ident, e.g. EDHLA
        if (this.isWaypointName(text, airport)) return { kind: "identifier", token };

        throw new DecodeError("InvalidRunway", `Runway ${designator} not found at ${airport.ident}`, details(token));
      }
    }

    return { kind: "identifier", token };
  }

  areaOf(airport: AirportRecord): AreaId {
    return this.nav.terminalAreaOf(airport);
  }

  /**
   * Terminal lookup in the open area(s) first, then the enroute waypoints in
   * the store's order. Between two terminal areas a name found in only one of
   * them resolves there.
   */
  resolveWaypoint(token: Token, scope: ScopeState): Fix {
    const terminal = this.resolveTerminal(token, scope);
    if (terminal) return waypointFix(terminal);

    // first match wins
    const enroute = this.nav.lookupEnrouteWaypoints(token.text)[Symbol.iterator]().next();
    if (!enroute.done) return waypointFix(enroute.value);

    throw this.unresolved(token);
  }

  private resolveTerminal(token: Token, scope: ScopeState): WaypointRecord | undefined {
    const [outgoing, incoming] = openAreas(scope).map((area) => this.nav.lookupTerminalWaypoint(token.text, area));

    if (scope.kind === "crossing" && outgoing && incoming) {
      if (waypointFix(outgoing).key === waypointFix(incoming).key || scope.pinned) {
        return outgoing;
      }
      throw new DecodeError(
        "AmbiguousWaypoint",
        `${token.text} exists in terminal areas ${scope.from} and ${scope.to}; use DCT <airport> to pick one`,
        details(token)
      );
    }

    return outgoing ?? incoming;
  }

  private isWaypointName(ident: string, airport: AirportRecord): boolean {
    if (this.nav.lookupTerminalWaypoint(ident, this.areaOf(airport))) return true;
    return !this.nav.lookupEnrouteWaypoints(ident)[Symbol.iterator]().next().done;
  }

  private unresolved(token: Token): DecodeError {
    const { text } = token;

    if (looksLikePerformance(text)) return malformedPerformance(token);

    if (AIRPORT_SHAPE.test(text)) {
      return new DecodeError("UnknownAirport", `Unknown airport ${text.slice(0, 4)}`, details(token));
    }

    return new DecodeError("UnknownWaypoint", `No waypoint ${text} in terminal area or enroute`, details(token));
  }
}
