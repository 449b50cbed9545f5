import { InMemoryNavigationData } from "../../navigationData.js";
import { DecodeError } from "../errors.js";
import type { AirportRecord, Coordinate, WaypointRecord } from "../../types.js";
import type { Token } from "../scanner.js";

function airport(ident: string, name: string, coordinate: Coordinate, runways: string[]): AirportRecord {
  return { ident, name, coordinate, runways: runways.map((designator) => ({ designator })) };
}

function terminal(ident: string, area: string, lat: number, lon: number): WaypointRecord {
  return { ident, coordinate: { lat, lon }, usage: "vfr", region: { kind: "terminal", area } };
}

function enroute(ident: string, lat: number, lon: number, name?: string): WaypointRecord {
  return { ident, name, coordinate: { lat, lon }, usage: "ifr", region: { kind: "enroute" } };
}

export const airports = {
  EDDH: airport("EDDH", "Hamburg", { lat: 53.63, lon: 9.99 }, ["05", "23", "15", "33"]),
  EDHF: airport("EDHF", "Itzehoe", { lat: 53.99, lon: 9.58 }, ["02", "20"]),
  EDHL: airport("EDHL", "Luebeck", { lat: 53.81, lon: 10.72 }, ["07", "25"]),
  EDAH: airport("EDAH", "Heringsdorf", { lat: 53.88, lon: 14.15 }, ["10", "28"]),
  EDDV: airport("EDDV", "Hannover", { lat: 52.46, lon: 9.69 }, ["09L", "27R"]),
  KSFO: airport("KSFO", "San Francisco", { lat: 37.62, lon: -122.38 }, ["28L", "28R"]),
  KSAN: airport("KSAN", "San Diego", { lat: 32.73, lon: -117.19 }, ["27"]),
};

export const waypoints: WaypointRecord[] = [
  terminal("N1", "EDDH", 53.75, 10.05),
  terminal("N2", "EDDH", 53.7, 10.02),
  terminal("D", "EDDH", 53.6, 10.2),
  terminal("P2", "EDDH", 53.72, 9.85),
  terminal("EDDHS", "EDDH", 53.58, 10.0),
  terminal("W", "EDHL", 53.8, 10.6),
  terminal("W", "EDAH", 53.88, 14.0),
  terminal("N1", "EDDV", 52.55, 9.7),
  terminal("N2", "EDDV", 52.52, 9.69),
  terminal("W1", "EDDV", 52.46, 9.55),
  terminal("W2", "EDDV", 52.47, 9.6),
  enroute("HAM", 53.68, 10.2, "Hamburg VOR"),
  enroute("HAM", 50.0, 10.0, "Second HAM"),
  enroute("D", 52.0, 11.0),
  enroute("EDHLA", 53.9, 10.9),
];

export function navigationData(): InMemoryNavigationData {
  return new InMemoryNavigationData({ airports: Object.values(airports), waypoints });
}

export function token(text: string, index = 0, offset = 0): Token {
  return { text, index, offset };
}

/** Runs fn and returns the DecodeError it throws */
export function thrown(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error("expected a DecodeError");
}
