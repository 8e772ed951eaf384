import type { GameAction, GameState } from "../types";
import { hashState } from "./stateHash";
import type { ReplayEntry, ReplayLog } from "./replay";

export function makeReplayEntry(before: GameState, action: GameAction, after: GameState): ReplayEntry {
  return {
    beforeHash: hashState(before),
    action,
    afterHash: hashState(after),
  };
}

/**
 * Append a single replay entry for an action, given the before/after states.
 * Pure function: does not mutate inputs.
 */
export function recordAction(
  log: ReplayLog,
  before: GameState,
  action: GameAction,
  after: GameState
): ReplayLog {
  return [...log, makeReplayEntry(before, action, after)];
}
