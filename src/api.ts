import { Router, Request, Response } from "express";
import { z } from "zod";

import type { SqliteNavigationData } from "./dbHelpers.js";
import { FlightManagement } from "./flightManagement.js";
import { getDecodeDebugMessage, isDecodeError } from "./route/errors.js";
import type { DecodeContext, Leg } from "./route/legBuilder.js";
import type { Fix } from "./route/resolver.js";
import { describePerformance } from "./route/route.js";
import type { MagneticModel, PerformanceProfile } from "./types.js";

const coordinate = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

const NavigationDataBatch = z.object({
  partition: z.string().min(1).optional(),
  airports: z
    .array(
      z.object({
        ident: z.string().regex(/^[A-Z]{4}$/),
        name: z.string(),
        coordinate,
        elevation: z.number().optional(),
        runways: z
          .array(
            z.object({
              designator: z.string().regex(/^\d{1,2}[LRC]?$/),
              bearing: z.number().optional(),
              length: z.number().optional(),
              threshold: coordinate.optional(),
            })
          )
          .default([]),
      })
    )
    .default([]),
  waypoints: z
    .array(
      z.object({
        ident: z.string().regex(/^[A-Z0-9]+$/),
        name: z.string().optional(),
        coordinate,
        usage: z.enum(["vfr", "ifr", "unknown"]).default("unknown"),
        region: z.discriminatedUnion("kind", [
          z.object({ kind: z.literal("terminal"), area: z.string().min(1) }),
          z.object({ kind: z.literal("enroute") }),
        ]),
      })
    )
    .default([]),
});

const DecodeRequest = z.object({
  route: z.string(),
  date: z.string().datetime().optional(),
  alternate: z.string().optional(),
});

export interface ApiOptions {
  magneticModel?: MagneticModel;
  performance?: PerformanceProfile;
}

function fixSummary(fix: Fix) {
  return {
    ident: fix.ident,
    key: fix.key,
    kind: fix.kind,
    lat: fix.coordinate.lat,
    lon: fix.coordinate.lon,
    runway: fix.kind === "airport" ? fix.runway?.designator ?? null : null,
  };
}

function legSummary(leg: Leg) {
  return {
    from: fixSummary(leg.origin),
    to: fixSummary(leg.destination),
    performance: describePerformance(leg),
    distance: leg.distance,
    trueCourse: leg.trueCourse,
    wca: leg.wca ?? null,
    heading: leg.heading ?? null,
    groundSpeed: leg.groundSpeed ?? null,
    ete: leg.ete ?? null,
    fuel: leg.fuel ?? null,
    magneticCourse: leg.magneticCourse ?? null,
    magneticHeading: leg.magneticHeading ?? null,
  };
}

export function createApi(nav: SqliteNavigationData, options: ApiOptions = {}): Router {
  const router = Router();

  // ---------- route decoding ----------
  router.post("/route/decode", (req: Request, res: Response) => {
    const parsed = DecodeRequest.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid payload", issues: parsed.error.issues });
    }

    const { route, date, alternate } = parsed.data;
    const context: DecodeContext = { ...options, date: date ? new Date(date) : undefined };
    const fms = new FlightManagement(nav, context);

    try {
      const decoded = fms.decode(route);
      fms.setAlternate(alternate);
      const alternateLeg = fms.alternateLeg();

      res.json({
        route: decoded.toString(),
        origin: fixSummary(decoded.origin),
        destination: fixSummary(decoded.destination),
        legs: decoded.legs.map(legSummary),
        alternate: alternateLeg ? legSummary(alternateLeg) : null,
        totals: decoded.totals(),
      });
    } catch (err) {
      if (isDecodeError(err)) {
        console.warn(getDecodeDebugMessage(err));
        return res.status(422).json({ error: err.message, code: err.code, token: err.token, position: err.position });
      }
      console.error("Error decoding route:", err);
      res.status(500).json({ error: "Failed to decode route" });
    }
  });

  // ---------- navigation data ----------
  router.get("/airports/:ident", (req: Request, res: Response) => {
    const airport = nav.lookupAirport(req.params.ident.toUpperCase());
    if (!airport) {
      return res.status(404).json({ error: "Airport not found" });
    }
    res.json(airport);
  });

  router.get("/waypoints/:ident", (req: Request, res: Response) => {
    const ident = req.params.ident.toUpperCase();
    const area = typeof req.query.area === "string" ? req.query.area.toUpperCase() : undefined;

    const waypoints = area
      ? [nav.lookupTerminalWaypoint(ident, area)].filter((wp) => wp !== undefined)
      : nav.lookupEnrouteWaypoints(ident);

    if (waypoints.length === 0) {
      return res.status(404).json({ error: "Waypoint not found" });
    }
    res.json(waypoints);
  });

  router.post("/navdata", (req: Request, res: Response) => {
    const parsed = NavigationDataBatch.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid payload", issues: parsed.error.issues });
    }

    try {
      res.status(201).json(nav.importRecords(parsed.data));
    } catch (err) {
      console.error("Error importing navigation data:", err);
      res.status(500).json({ error: "Failed to import navigation data" });
    }
  });

  router.get("/navdata/partitions", (_req: Request, res: Response) => {
    res.json(nav.partitions());
  });

  router.delete("/navdata/:partition", (req: Request, res: Response) => {
    if (!nav.removePartition(req.params.partition)) {
      return res.status(404).json({ error: "Partition not found" });
    }
    res.status(204).send();
  });

  return router;
}
