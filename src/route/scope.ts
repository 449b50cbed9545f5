import type { AreaId } from "../types.js";

/**
 * Which terminal areas are open for resolving reporting points by their
 * short names ("W", "N1", ...).
 *
 * - closed: no area open, only enroute waypoints resolve
 * - open: one area open; pinned when it was opened with `DCT <airport>`
 * - crossing: between the area we left and the next airport's area
 */
export type ScopeState =
  | { kind: "closed" }
  | { kind: "open"; area: AreaId; pinned: boolean }
  | { kind: "crossing"; from: AreaId; to: AreaId; pinned: boolean };

export const CLOSED: ScopeState = Object.freeze({ kind: "closed" });

export function initialScope(): ScopeState {
  return CLOSED;
}

/**
 * An airport element opens its terminal area. After `DCT` the area is pinned:
 * reporting points found in it win over a same-named point further ahead.
 */
export function enterAirport(_state: ScopeState, area: AreaId, direct: boolean): ScopeState {
  return { kind: "open", area, pinned: direct };
}

/** `DCT` without an airport behind it closes whatever area is open */
export function direct(_state: ScopeState): ScopeState {
  return CLOSED;
}

/**
 * The scope a waypoint is resolved in, given the area of the next airport
 * ahead of it (if any, and not behind a `DCT`).
 */
export function approach(state: ScopeState, incoming: AreaId | undefined): ScopeState {
  if (incoming === undefined) return state;

  switch (state.kind) {
    case "closed":
      return { kind: "open", area: incoming, pinned: false };
    case "open":
      if (state.area === incoming) return state;
      return { kind: "crossing", from: state.area, to: incoming, pinned: state.pinned };
    case "crossing":
      if (state.to === incoming) return state;
      return { kind: "crossing", from: state.from, to: incoming, pinned: state.pinned };
  }
}

/** Areas a terminal lookup is restricted to, outgoing area first */
export function openAreas(state: ScopeState): AreaId[] {
  switch (state.kind) {
    case "closed":
      return [];
    case "open":
      return [state.area];
    case "crossing":
      return [state.from, state.to];
  }
}

export function describeScope(state: ScopeState): string {
  switch (state.kind) {
    case "closed":
      return "closed";
    case "open":
      return `open(${state.area}${state.pinned ? ", pinned" : ""})`;
    case "crossing":
      return `crossing(${state.from} -> ${state.to}${state.pinned ? ", pinned" : ""})`;
  }
}
