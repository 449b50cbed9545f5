import type Database from "better-sqlite3";
import type {
  AirportRecord,
  AreaId,
  NavigationData,
  RunwayRecord,
  WaypointRecord,
  WaypointUsage,
} from "./types.js";

interface AirportRow {
  ident: string;
  name: string;
  lat: number;
  lon: number;
  elevation: number | null;
}

interface RunwayRow {
  designator: string;
  bearing: number | null;
  length: number | null;
  lat: number | null;
  lon: number | null;
}

interface WaypointRow {
  ident: string;
  name: string | null;
  lat: number;
  lon: number;
  usage: WaypointUsage;
  area: string | null;
}

export interface NavigationDataBatch {
  partition?: string;
  airports: AirportRecord[];
  waypoints: WaypointRecord[];
}

export interface ImportResult {
  partition: string;
  airports: number;
  runways: number;
  waypoints: number;
}

function toRunway(row: RunwayRow): RunwayRecord {
  return {
    designator: row.designator,
    bearing: row.bearing ?? undefined,
    length: row.length ?? undefined,
    threshold: row.lat !== null && row.lon !== null ? { lat: row.lat, lon: row.lon } : undefined,
  };
}

function toWaypoint(row: WaypointRow): WaypointRecord {
  return {
    ident: row.ident,
    name: row.name ?? undefined,
    coordinate: { lat: row.lat, lon: row.lon },
    usage: row.usage,
    region: row.area === null ? { kind: "enroute" } : { kind: "terminal", area: row.area },
  };
}

/**
 * Navigation data backed by SQLite. Lookups run on prepared statements;
 * enroute waypoints come back in insertion order (rowid).
 *
 * better-sqlite3 is synchronous, so an import runs to completion (in one
 * transaction) before any decode on the same process sees the tables.
 */
export class SqliteNavigationData implements NavigationData {
  private readonly selectAirport: Database.Statement<[string], AirportRow>;
  private readonly selectRunways: Database.Statement<[string], RunwayRow>;
  private readonly selectRunway: Database.Statement<[string, string], RunwayRow>;
  private readonly selectTerminal: Database.Statement<[string, string], WaypointRow>;
  private readonly selectEnroute: Database.Statement<[string], WaypointRow>;
  private readonly insertAirport: Database.Statement<unknown[]>;
  private readonly insertRunway: Database.Statement<unknown[]>;
  private readonly insertWaypoint: Database.Statement<unknown[]>;

  constructor(private readonly db: Database.Database) {
    this.selectAirport = db.prepare<[string], AirportRow>(
      "SELECT ident, name, lat, lon, elevation FROM airports WHERE ident = ?"
    );
    this.selectRunways = db.prepare<[string], RunwayRow>(
      "SELECT designator, bearing, length, lat, lon FROM runways WHERE airport_ident = ? ORDER BY id"
    );
    this.selectRunway = db.prepare<[string, string], RunwayRow>(
      "SELECT designator, bearing, length, lat, lon FROM runways WHERE airport_ident = ? AND designator = ?"
    );
    this.selectTerminal = db.prepare<[string, string], WaypointRow>(
      "SELECT ident, name, lat, lon, usage, area FROM waypoints WHERE ident = ? AND area = ? ORDER BY id LIMIT 1"
    );
    this.selectEnroute = db.prepare<[string], WaypointRow>(
      "SELECT ident, name, lat, lon, usage, area FROM waypoints WHERE ident = ? AND area IS NULL ORDER BY id"
    );
    this.insertAirport = db.prepare(
      `INSERT OR REPLACE INTO airports (ident, name, lat, lon, elevation, partition_id)
       VALUES (@ident, @name, @lat, @lon, @elevation, @partition_id)`
    );
    this.insertRunway = db.prepare(
      `INSERT OR REPLACE INTO runways (airport_ident, designator, bearing, length, lat, lon)
       VALUES (@airport_ident, @designator, @bearing, @length, @lat, @lon)`
    );
    this.insertWaypoint = db.prepare(
      `INSERT INTO waypoints (ident, name, lat, lon, usage, area, partition_id)
       VALUES (@ident, @name, @lat, @lon, @usage, @area, @partition_id)`
    );
  }

  lookupAirport(ident: string): AirportRecord | undefined {
    const row = this.selectAirport.get(ident);
    if (!row) return undefined;

    return {
      ident: row.ident,
      name: row.name,
      coordinate: { lat: row.lat, lon: row.lon },
      elevation: row.elevation ?? undefined,
      runways: this.selectRunways.all(row.ident).map(toRunway),
    };
  }

  lookupRunway(airport: AirportRecord, designator: string): RunwayRecord | undefined {
    const row = this.selectRunway.get(airport.ident, designator);
    return row ? toRunway(row) : undefined;
  }

  lookupTerminalWaypoint(ident: string, area: AreaId): WaypointRecord | undefined {
    const row = this.selectTerminal.get(ident, area);
    return row ? toWaypoint(row) : undefined;
  }

  // .all() rather than .iterate(): an abandoned iterator keeps the connection busy
  lookupEnrouteWaypoints(ident: string): WaypointRecord[] {
    return this.selectEnroute.all(ident).map(toWaypoint);
  }

  terminalAreaOf(airport: AirportRecord): AreaId {
    return airport.ident;
  }

  /** Writes a batch of records in one transaction; airports with the same ident are replaced */
  importRecords(batch: NavigationDataBatch): ImportResult {
    const partition = batch.partition ?? "default";

    const run = this.db.transaction((): ImportResult => {
      let runways = 0;
      for (const airport of batch.airports) {
        this.insertAirport.run({
          ident: airport.ident,
          name: airport.name,
          lat: airport.coordinate.lat,
          lon: airport.coordinate.lon,
          elevation: airport.elevation ?? null,
          partition_id: partition,
        });
        for (const rwy of airport.runways) {
          this.insertRunway.run({
            airport_ident: airport.ident,
            designator: rwy.designator,
            bearing: rwy.bearing ?? null,
            length: rwy.length ?? null,
            lat: rwy.threshold?.lat ?? null,
            lon: rwy.threshold?.lon ?? null,
          });
          runways++;
        }
      }

      for (const wp of batch.waypoints) {
        this.insertWaypoint.run({
          ident: wp.ident,
          name: wp.name ?? null,
          lat: wp.coordinate.lat,
          lon: wp.coordinate.lon,
          usage: wp.usage,
          area: wp.region.kind === "terminal" ? wp.region.area : null,
          partition_id: partition,
        });
      }

      return { partition, airports: batch.airports.length, runways, waypoints: batch.waypoints.length };
    });

    const result = run();
    console.log(
      `Imported partition ${partition}: ${result.airports} airports, ${result.runways} runways, ${result.waypoints} waypoints`
    );
    return result;
  }

  /** Deletes every record imported with the given partition id; returns whether anything was removed */
  removePartition(partition: string): boolean {
    const run = this.db.transaction(() => {
      const airports = this.db.prepare("DELETE FROM airports WHERE partition_id = ?").run(partition);
      const waypoints = this.db.prepare("DELETE FROM waypoints WHERE partition_id = ?").run(partition);
      return airports.changes + waypoints.changes;
    });

    const removed = run();
    if (removed > 0) console.log(`Removed partition ${partition} (${removed} records)`);
    return removed > 0;
  }

  partitions(): string[] {
    const rows = this.db
      .prepare<[], { partition_id: string }>(
        "SELECT partition_id FROM airports UNION SELECT partition_id FROM waypoints ORDER BY partition_id"
      )
      .all();
    return rows.map((row) => row.partition_id);
  }
}
