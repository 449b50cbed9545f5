import { DecodeError } from "./errors.js";

export interface Token {
  text: string; // upper-cased
  index: number;
  offset: number;
}

/**
 * Splits a route string on runs of whitespace into ordered, upper-cased tokens.
 * Classification is left to the interpreter and resolver: whether "N1" is a
 * reporting point or a malformed speed depends on the navigation data.
 */
export function scanRoute(route: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /\S+/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(route)) !== null) {
    tokens.push({ text: match[0].toUpperCase(), index: tokens.length, offset: match.index });
  }

  if (tokens.length === 0) {
    throw new DecodeError("EmptyRoute", "Route contains no elements");
  }

  return tokens;
}
