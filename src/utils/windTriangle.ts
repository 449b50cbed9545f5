import { normalizeHeading } from "../geo.js";

export interface WindTriangle {
  wca: number; // degrees, positive = correct to the right
  heading: number; // true heading, degrees
  groundSpeed: number; // knots
}

const toRadians = (deg: number) => (deg * Math.PI) / 180;

/**
 * Solves the wind triangle for a true course.
 *
 * @param course true course in degrees
 * @param tas true airspeed in knots
 * @param windDirection direction the wind blows from, degrees true
 * @param windSpeed wind speed in knots
 */
export function solveWindTriangle(course: number, tas: number, windDirection: number, windSpeed: number): WindTriangle {
  // angle between the course and the direction the wind blows to
  const windAngle = toRadians(course - (windDirection + 180));

  // law of sines: sin(wca) / ws = sin(windAngle) / tas; a wind stronger than
  // the aircraft can hold the course against is clamped to 90°
  const ratio = tas === 0 ? 0 : (windSpeed / tas) * Math.sin(windAngle);
  const wcaRad = Math.asin(Math.max(-1, Math.min(1, ratio)));

  const groundSpeed = Math.sqrt(
    Math.max(0, tas * tas + windSpeed * windSpeed - 2 * tas * windSpeed * Math.cos(toRadians(course - windDirection) + wcaRad))
  );

  const wca = (wcaRad * 180) / Math.PI;
  return { wca, heading: normalizeHeading(course + wca), groundSpeed };
}
