import dotenv from "dotenv";

dotenv.config();

export const config = {
  port: Number(process.env.PORT ?? 3000),
  dbPath: process.env.DB_PATH || "data/navdata.db",
  // Prints one [ROUTE DEBUG] line per decoded token and leg.
  routeDebug: process.env.ROUTE_DEBUG === "1",
};
