import type { GameAction, GameState } from "../types";
import type { ReplayEntry } from "./replay";
import { applyAction } from "./replayApply";
import { makeReplayEntry } from "./replayRecorder";

export type SyncResult = {
  nextState: GameState;
  afterHash: string;
  replayEntry: ReplayEntry;
};

/**
 * Apply an action and return a minimal sync payload:
 * - nextState (authoritative)
 * - afterHash (consumer-side consistency check)
 * - replayEntry (for audit/replay streams)
 */
export function applyActionWithSync(state: GameState, action: GameAction): SyncResult {
  const nextState = applyAction(state, action);
  const replayEntry = makeReplayEntry(state, action, nextState);
  return { nextState, afterHash: replayEntry.afterHash, replayEntry };
}
