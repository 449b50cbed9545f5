export type DecodeErrorCode =
  | "EmptyRoute"
  | "InvalidToken"
  | "InvalidPerformanceFormat"
  | "UnknownAirport"
  | "InvalidRunway"
  | "UnknownWaypoint"
  | "AmbiguousWaypoint"
  | "MissingOriginOrDestination";

export interface DecodeErrorDetails {
  token?: string;
  /** Index of the offending token in the route */
  position?: number;
  /** Character offset of the offending token in the route string */
  offset?: number;
}

/**
 * A route string that cannot be decoded against the navigation data.
 * Decoding stops at the first one; there is no partial route.
 */
export class DecodeError extends Error {
  readonly code: DecodeErrorCode;
  readonly token?: string;
  readonly position?: number;
  readonly offset?: number;

  constructor(code: DecodeErrorCode, message: string, details: DecodeErrorDetails = {}) {
    super(message);
    this.name = "DecodeError";
    this.code = code;
    this.token = details.token;
    this.position = details.position;
    this.offset = details.offset;
  }
}

export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError;
}

/**
 * One-line diagnostic for logs, e.g.
 * `[ROUTE DEBUG] UnknownWaypoint at token 3 "XYZ": no waypoint XYZ in terminal area or enroute`
 */
export function getDecodeDebugMessage(err: DecodeError): string {
  const where = err.position !== undefined ? ` at token ${err.position}` : "";
  const token = err.token !== undefined ? ` "${err.token}"` : "";
  return `[ROUTE DEBUG] ${err.code}${where}${token}: ${err.message}`;
}
