import { DecodeError } from "./errors.js";
import type { Token } from "./scanner.js";
import type { Level, Speed, Wind } from "../types.js";

export type PerformanceElement =
  | { kind: "speed"; speed: Speed }
  | { kind: "level"; level: Level }
  | { kind: "wind"; wind: Wind };

/** Speed, level and wind in force at a point of the route; absent until first set */
export interface PerformanceSnapshot {
  readonly speed?: Speed;
  readonly level?: Level;
  readonly wind?: Wind;
}

const SPEED = /^(?:([KN])(\d{4})|M(\d{3}))$/;
const LEVEL = /^(?:([FA])(\d{3})|S(\d{3,4})|M(\d{4}))$/;
const WIND = /^(\d{3})(\d{2,3})KT$/;

// Shapes that can only be meant as performance elements
const SPEED_OR_LEVEL_LIKE = /^[KNMFSA]\d+$/;
const WIND_LIKE = /^\d+KT$/;

const FEET_PER_METRE = 3.28084;
const KMH_PER_KNOT = 1.852;

function invalid(token: Token, message: string): DecodeError {
  return new DecodeError("InvalidPerformanceFormat", message, {
    token: token.text,
    position: token.index,
    offset: token.offset,
  });
}

export function parseSpeed(text: string): Speed | undefined {
  const match = SPEED.exec(text);
  if (!match) return undefined;

  const [, letter, knotsOrKmh, mach] = match;
  if (mach !== undefined) {
    return { unit: "mach", value: parseInt(mach, 10) / 100 };
  }
  return { unit: letter === "K" ? "kmh" : "kt", value: parseInt(knotsOrKmh, 10) };
}

export function parseLevel(text: string): Level | undefined {
  const match = LEVEL.exec(text);
  if (!match) return undefined;

  const [, letter, feet, metricLevel, metricAltitude] = match;
  if (metricLevel !== undefined) return { kind: "S", value: parseInt(metricLevel, 10) };
  if (metricAltitude !== undefined) return { kind: "M", value: parseInt(metricAltitude, 10) };
  return { kind: letter === "F" ? "F" : "A", value: parseInt(feet, 10) };
}

/**
 * Parses a METAR style wind such as 13509KT.
 * Returns undefined if the shape does not match and throws on a direction beyond 360.
 */
export function parseWind(token: Token): Wind | undefined {
  const match = WIND.exec(token.text);
  if (!match) return undefined;

  const direction = parseInt(match[1], 10);
  if (direction > 360) {
    throw invalid(token, `Wind direction ${direction}° is out of range 000-360`);
  }
  return { direction, speed: parseInt(match[2], 10) };
}

/**
 * Interprets a token as speed, level or wind. The M prefix is a Mach number
 * with three digits and a metric altitude with four.
 */
export function parsePerformance(token: Token): PerformanceElement | undefined {
  const speed = parseSpeed(token.text);
  if (speed) return { kind: "speed", speed };

  const level = parseLevel(token.text);
  if (level) return { kind: "level", level };

  const wind = parseWind(token);
  if (wind) return { kind: "wind", wind };

  return undefined;
}

/** True for tokens that look like a performance element but have the wrong digit count */
export function looksLikePerformance(text: string): boolean {
  return SPEED_OR_LEVEL_LIKE.test(text) || WIND_LIKE.test(text);
}

export function malformedPerformance(token: Token): DecodeError {
  return invalid(token, `${token.text} is not a valid speed, level or wind`);
}

/**
 * The performance values in force while walking a route. Each element
 * overrides its own field only; the others carry forward.
 */
export class PerformanceState {
  private current: PerformanceSnapshot = {};
  private cruiseSpeed?: Speed;
  private cruiseLevel?: Level;

  apply(element: PerformanceElement): void {
    switch (element.kind) {
      case "speed":
        this.current = { ...this.current, speed: element.speed };
        this.cruiseSpeed ??= element.speed;
        break;
      case "level":
        this.current = { ...this.current, level: element.level };
        this.cruiseLevel ??= element.level;
        break;
      case "wind":
        this.current = { ...this.current, wind: element.wind };
        break;
    }
  }

  /** A frozen copy; later updates never reach snapshots already handed out */
  snapshot(): PerformanceSnapshot {
    return Object.freeze({ ...this.current });
  }

  /** The first speed and level given in the route */
  cruise(): { speed?: Speed; level?: Level } {
    return { speed: this.cruiseSpeed, level: this.cruiseLevel };
  }
}

export function levelInFeet(level: Level): number {
  switch (level.kind) {
    case "F":
    case "A":
      return level.value * 100;
    case "S":
    case "M":
      return Math.round(level.value * 10 * FEET_PER_METRE);
  }
}

/**
 * ISA speed of sound in knots at the given pressure altitude. Temperature
 * falls 1.98 °C per 1000 ft up to the tropopause at 36,089 ft.
 */
export function speedOfSound(feet: number): number {
  const kelvin = Math.max(288.15 - 0.0019812 * feet, 216.65);
  return 661.4786 * Math.sqrt(kelvin / 288.15);
}

/** True airspeed in knots; Mach numbers are taken at the level, or at sea level without one */
export function speedInKnots(speed: Speed, level?: Level): number {
  switch (speed.unit) {
    case "kt":
      return speed.value;
    case "kmh":
      return speed.value / KMH_PER_KNOT;
    case "mach":
      return speed.value * speedOfSound(level ? levelInFeet(level) : 0);
  }
}

export function formatSpeed(speed: Speed): string {
  switch (speed.unit) {
    case "kt":
      return `N${String(speed.value).padStart(4, "0")}`;
    case "kmh":
      return `K${String(speed.value).padStart(4, "0")}`;
    case "mach":
      return `M${String(Math.round(speed.value * 100)).padStart(3, "0")}`;
  }
}

export function formatLevel(level: Level): string {
  const digits = level.kind === "M" || level.kind === "S" ? 4 : 3;
  return `${level.kind}${String(level.value).padStart(digits, "0")}`;
}

export function formatWind(wind: Wind): string {
  return `${String(wind.direction).padStart(3, "0")}${String(wind.speed).padStart(2, "0")}KT`;
}
