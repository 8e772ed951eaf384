import type { GameAction, GameState } from "../types";
import { applyMove } from "./applyMove";
import { applyRoll } from "./applyRoll";
import type { ReplayLog } from "./replay";
import type { ReplayFile } from "./replay";
import { recordAction } from "./replayRecorder";
import { hashState } from "./stateHash";

export function applyAction(state: GameState, action: GameAction): GameState {
  switch (action.kind) {
    case "roll":
      return applyRoll(state, action.dice).state;
    case "move":
      return applyMove(state, action.tiles).state;
    default: {
      const _exhaustive: never = action;
      throw new Error(`Unsupported action: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export type ApplyAndRecordResult = {
  nextState: GameState;
  nextLog: ReplayLog;
};

/**
 * Apply an action and append a replay entry for the state transition.
 */
export function applyAndRecord(
  state: GameState,
  action: GameAction,
  log: ReplayLog
): ApplyAndRecordResult {
  const nextState = applyAction(state, action);
  const nextLog = recordAction(log, state, action, nextState);
  return { nextState, nextLog };
}

/**
 * Re-apply every logged action from the replay's initial state, checking
 * both hashes of each entry. Returns the final state.
 */
export function verifyReplay(replay: ReplayFile): GameState {
  let state = replay.initialState;

  replay.log.forEach((entry, i) => {
    const before = hashState(state);
    if (before !== entry.beforeHash) {
      throw new Error(`Replay log[${i}] beforeHash mismatch: expected ${entry.beforeHash}, got ${before}`);
    }

    state = applyAction(state, entry.action);

    const after = hashState(state);
    if (after !== entry.afterHash) {
      throw new Error(`Replay log[${i}] afterHash mismatch: expected ${entry.afterHash}, got ${after}`);
    }
  });

  return state;
}
