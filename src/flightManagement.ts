import { DecodeError } from "./route/errors.js";
import { buildLeg, type DecodeContext, type Leg } from "./route/legBuilder.js";
import { airportFix, waypointFix, type Fix } from "./route/resolver.js";
import { decode, type Route, type RouteTotals } from "./route/route.js";
import type { AreaId, NavigationData } from "./types.js";

/**
 * Owns the route of a planning session together with the navigation data it
 * was decoded against. The route is replaced, never edited: every change to
 * the route string or the data decodes it again.
 */
export class FlightManagement<N extends NavigationData = NavigationData> {
  private routeString = "";
  private current?: Route;
  private alternate?: Fix;

  constructor(
    private readonly nav: N,
    private context: DecodeContext = {}
  ) {}

  get route(): Route | undefined {
    return this.current;
  }

  /** Decodes a new route string; if it fails the previous route is gone too */
  decode(route: string): Route {
    this.routeString = route;
    this.current = undefined;
    this.current = decode(route, this.nav, this.context);
    return this.current;
  }

  setContext(context: DecodeContext): Route | undefined {
    this.context = context;
    return this.reevaluate();
  }

  /**
   * Applies a change to the navigation data and decodes the route again. If
   * the route no longer decodes it is cleared and the error rethrown.
   */
  modifyNavigationData(modify: (nav: N) => void): Route | undefined {
    modify(this.nav);
    return this.reevaluate();
  }

  /**
   * Sets the alternate by airport ident, terminal waypoint of the destination's
   * area or enroute waypoint ident; undefined removes it.
   */
  setAlternate(ident: string | undefined): void {
    if (ident === undefined) {
      this.alternate = undefined;
      return;
    }

    const airport = this.nav.lookupAirport(ident);
    if (airport) {
      this.alternate = airportFix(airport);
      return;
    }

    const area = this.destinationArea();
    const terminal = area !== undefined ? this.nav.lookupTerminalWaypoint(ident, area) : undefined;
    if (terminal) {
      this.alternate = waypointFix(terminal);
      return;
    }

    const enroute = this.nav.lookupEnrouteWaypoints(ident)[Symbol.iterator]().next();
    if (enroute.done) {
      throw new DecodeError("UnknownWaypoint", `Unknown alternate ${ident}`, { token: ident });
    }
    this.alternate = waypointFix(enroute.value);
  }

  /**
   * The final leg flown to the alternate instead of the destination: same
   * origin, same performance.
   */
  alternateLeg(): Leg | undefined {
    if (!this.current || !this.alternate) return undefined;

    const finalLeg = this.current.legs[this.current.legs.length - 1];
    return buildLeg(finalLeg.origin, this.alternate, finalLeg.performance, this.context);
  }

  totals(): RouteTotals | undefined {
    return this.current?.totals();
  }

  private destinationArea(): AreaId | undefined {
    const destination = this.current?.destination;
    if (!destination) return undefined;
    if (destination.kind === "airport") return this.nav.terminalAreaOf(destination.airport);
    return destination.waypoint.region.kind === "terminal" ? destination.waypoint.region.area : undefined;
  }

  private reevaluate(): Route | undefined {
    if (this.routeString.trim() === "") return undefined;
    return this.decode(this.routeString);
  }
}
