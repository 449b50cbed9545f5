import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

/**
 * Opens (and creates if needed) the navigation database. Pass ":memory:" for
 * a throwaway database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    // Ensure parent dir exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
CREATE TABLE IF NOT EXISTS airports (
  ident      TEXT PRIMARY KEY,   -- ICAO location indicator
  name       TEXT NOT NULL,
  lat        REAL NOT NULL,
  lon        REAL NOT NULL,
  elevation  INTEGER,            -- feet MSL (optional)
  partition_id TEXT NOT NULL DEFAULT 'default'
);

CREATE TABLE IF NOT EXISTS runways (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  airport_ident TEXT NOT NULL,
  designator    TEXT NOT NULL,
  bearing       REAL,
  length        REAL,
  lat           REAL,
  lon           REAL,
  UNIQUE (airport_ident, designator),
  FOREIGN KEY(airport_ident) REFERENCES airports(ident) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS waypoints (
  id         INTEGER PRIMARY KEY AUTOINCREMENT, -- insertion order decides enroute ties
  ident      TEXT NOT NULL,
  name       TEXT,
  lat        REAL NOT NULL,
  lon        REAL NOT NULL,
  usage      TEXT NOT NULL DEFAULT 'unknown', -- 'vfr', 'ifr', 'unknown'
  area       TEXT,                            -- terminal area, NULL for enroute
  partition_id TEXT NOT NULL DEFAULT 'default'
);

CREATE INDEX IF NOT EXISTS waypoints_ident ON waypoints (ident, area);
`);

  return db;
}
