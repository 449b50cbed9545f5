import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { openDatabase } from "../db.js";
import { SqliteNavigationData, type NavigationDataBatch } from "../dbHelpers.js";
import { decode } from "../route/route.js";

const batch: NavigationDataBatch = {
  partition: "north",
  airports: [
    {
      ident: "EDDH",
      name: "Hamburg",
      coordinate: { lat: 53.63, lon: 9.99 },
      elevation: 53,
      runways: [{ designator: "33", bearing: 327, length: 3250, threshold: { lat: 53.62, lon: 10.0 } }, { designator: "15" }],
    },
    { ident: "EDHF", name: "Itzehoe", coordinate: { lat: 53.99, lon: 9.58 }, runways: [{ designator: "02" }] },
  ],
  waypoints: [
    { ident: "P2", coordinate: { lat: 53.72, lon: 9.85 }, usage: "vfr", region: { kind: "terminal", area: "EDDH" } },
    { ident: "HAM", name: "First", coordinate: { lat: 53.68, lon: 10.2 }, usage: "ifr", region: { kind: "enroute" } },
    { ident: "HAM", name: "Second", coordinate: { lat: 50.0, lon: 10.0 }, usage: "ifr", region: { kind: "enroute" } },
  ],
};

describe("SqliteNavigationData", () => {
  let db: Database.Database;
  let nav: SqliteNavigationData;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    db = openDatabase(":memory:");
    nav = new SqliteNavigationData(db);
    nav.importRecords(batch);
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it("reports what it imported", () => {
    expect(nav.importRecords({ partition: "south", airports: [], waypoints: batch.waypoints.slice(1) })).toEqual({
      partition: "south",
      airports: 0,
      runways: 0,
      waypoints: 2,
    });
    expect(console.log).toHaveBeenLastCalledWith("Imported partition south: 0 airports, 0 runways, 2 waypoints");
  });

  it("looks up airports with their runways", () => {
    expect(nav.lookupAirport("EDDH")).toEqual({
      ident: "EDDH",
      name: "Hamburg",
      coordinate: { lat: 53.63, lon: 9.99 },
      elevation: 53,
      runways: [
        { designator: "33", bearing: 327, length: 3250, threshold: { lat: 53.62, lon: 10.0 } },
        { designator: "15", bearing: undefined, length: undefined, threshold: undefined },
      ],
    });
    expect(nav.lookupAirport("ZZZZ")).toBeUndefined();
  });

  it("looks up single runways", () => {
    const eddh = nav.lookupAirport("EDDH");
    expect(eddh).toBeDefined();
    if (!eddh) return;

    expect(nav.lookupRunway(eddh, "15")?.designator).toBe("15");
    expect(nav.lookupRunway(eddh, "02")).toBeUndefined();
  });

  it("keeps terminal and enroute waypoints apart", () => {
    expect(nav.lookupTerminalWaypoint("P2", "EDDH")?.region).toEqual({ kind: "terminal", area: "EDDH" });
    expect(nav.lookupTerminalWaypoint("P2", "EDHF")).toBeUndefined();
    expect(nav.lookupEnrouteWaypoints("P2")).toEqual([]);
    expect(nav.lookupTerminalWaypoint("HAM", "EDDH")).toBeUndefined();
  });

  it("returns enroute waypoints in insertion order", () => {
    expect(nav.lookupEnrouteWaypoints("HAM").map((wp) => wp.name)).toEqual(["First", "Second"]);
  });

  it("uses the airport ident as terminal area", () => {
    expect(nav.terminalAreaOf(batch.airports[0])).toBe("EDDH");
  });

  it("decodes routes against the stored data", () => {
    const route = decode("N0107 A025 EDDH33 P2 DCT HAM DCT EDHF02", nav);
    expect([route.origin.key, ...route.legs.map((leg) => leg.destination.key)]).toEqual([
      "EDDH",
      "EDDH/P2",
      "ENRT/HAM",
      "EDHF",
    ]);
    expect(route.takeoffRunway?.designator).toBe("33");
  });

  it("removes partitions with their runways", () => {
    nav.importRecords({ partition: "south", airports: [], waypoints: [batch.waypoints[1]] });
    expect(nav.partitions()).toEqual(["north", "south"]);

    expect(nav.removePartition("north")).toBe(true);
    expect(nav.lookupAirport("EDDH")).toBeUndefined();
    expect(db.prepare("SELECT COUNT(*) AS n FROM runways").get()).toEqual({ n: 0 });
    expect(nav.lookupEnrouteWaypoints("HAM")).toHaveLength(1);
    expect(nav.partitions()).toEqual(["south"]);

    expect(nav.removePartition("north")).toBe(false);
  });
});
