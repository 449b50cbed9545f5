/** Latitude/longitude in decimal degrees (WGS84) */
export interface Coordinate {
  lat: number;
  lon: number;
}

export type SpeedUnit = "kt" | "kmh" | "mach";

/** True airspeed as written in the route, e.g. N0107 is { unit: "kt", value: 107 } */
export interface Speed {
  unit: SpeedUnit;
  value: number;
}

// F: flight level (100 ft), S: standard metric level (10 m),
// A: altitude (100 ft), M: altitude (10 m)
export type LevelKind = "F" | "S" | "A" | "M";

/** Cruising level as written in the route, e.g. A070 is { kind: "A", value: 70 } */
export interface Level {
  kind: LevelKind;
  value: number;
}

/** Wind in METAR notation: direction the wind blows from (true) and speed in knots */
export interface Wind {
  direction: number;
  speed: number;
}

/** Identifier of a terminal area; by convention the ICAO ident of its airport */
export type AreaId = string;

export interface RunwayRecord {
  designator: string; // e.g. "33", "07L"
  bearing?: number; // magnetic, degrees
  length?: number; // metres
  threshold?: Coordinate;
}

export interface AirportRecord {
  ident: string; // 4-letter ICAO location indicator
  name: string;
  coordinate: Coordinate;
  elevation?: number; // feet MSL
  runways: RunwayRecord[];
}

export type WaypointUsage = "vfr" | "ifr" | "unknown";

/** Terminal waypoints belong to one airport's area; enroute waypoints to none */
export type WaypointRegion = { kind: "terminal"; area: AreaId } | { kind: "enroute" };

export interface WaypointRecord {
  ident: string;
  name?: string;
  coordinate: Coordinate;
  usage: WaypointUsage;
  region: WaypointRegion;
}

/**
 * Read-only lookups the route decoder needs from a navigation data store.
 *
 * `lookupEnrouteWaypoints` must enumerate in a stable order: the decoder takes
 * the first record when an enroute identifier is not unique.
 */
export interface NavigationData {
  lookupAirport(ident: string): AirportRecord | undefined;
  lookupRunway(airport: AirportRecord, designator: string): RunwayRecord | undefined;
  lookupTerminalWaypoint(ident: string, area: AreaId): WaypointRecord | undefined;
  lookupEnrouteWaypoints(ident: string): Iterable<WaypointRecord>;
  terminalAreaOf(airport: AirportRecord): AreaId;
}

/** Magnetic declination source, east positive, in degrees */
export interface MagneticModel {
  declination(coordinate: Coordinate, date: Date): number;
}

/** Cruise performance of the aircraft flying the route */
export interface PerformanceProfile {
  /** Fuel flow per hour at the given level, or undefined if the profile has no value there */
  fuelFlow(level: Level | undefined): number | undefined;
}
