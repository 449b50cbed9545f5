import type { AirportRecord, AreaId, NavigationData, RunwayRecord, WaypointRecord } from "./types.js";

/**
 * Navigation data held in memory, in insertion order. Used by tests and as
 * the snapshot a flight management session decodes against.
 */
export class InMemoryNavigationData implements NavigationData {
  private airports = new Map<string, AirportRecord>();
  private waypoints: WaypointRecord[] = [];

  constructor(records: { airports?: AirportRecord[]; waypoints?: WaypointRecord[] } = {}) {
    records.airports?.forEach((airport) => this.addAirport(airport));
    records.waypoints?.forEach((waypoint) => this.addWaypoint(waypoint));
  }

  addAirport(airport: AirportRecord): this {
    this.airports.set(airport.ident, airport);
    return this;
  }

  addWaypoint(waypoint: WaypointRecord): this {
    this.waypoints.push(waypoint);
    return this;
  }

  lookupAirport(ident: string): AirportRecord | undefined {
    return this.airports.get(ident);
  }

  lookupRunway(airport: AirportRecord, designator: string): RunwayRecord | undefined {
    return airport.runways.find((rwy) => rwy.designator === designator);
  }

  lookupTerminalWaypoint(ident: string, area: AreaId): WaypointRecord | undefined {
    return this.waypoints.find(
      (wp) => wp.ident === ident && wp.region.kind === "terminal" && wp.region.area === area
    );
  }

  lookupEnrouteWaypoints(ident: string): WaypointRecord[] {
    return this.waypoints.filter((wp) => wp.ident === ident && wp.region.kind === "enroute");
  }

  terminalAreaOf(airport: AirportRecord): AreaId {
    return airport.ident;
  }
}
