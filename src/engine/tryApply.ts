import type { GameAction, GameState } from "../types";
import type { ActionResponse } from "./envelope";
import { isEngineError } from "./errors";
import { applyActionWithSync } from "./sync";

function isActionShape(x: unknown): x is GameAction {
  if (typeof x !== "object" || x === null) return false;
  if (!("kind" in x)) return false;
  if (x.kind === "roll") return "dice" in x && Array.isArray(x.dice);
  if (x.kind === "move") return "tiles" in x && Array.isArray(x.tiles);
  return false;
}

/**
 * Apply a proposed roll or move and return a response envelope instead of
 * throwing. Rule violations come back as { ok: false, error }; anything that
 * is not an EngineError (a corrupted state, a bug) still throws.
 */
export function tryApplyAction(state: GameState, proposed: unknown): ActionResponse {
  if (!isActionShape(proposed)) {
    return {
      ok: false,
      error: {
        code: "INVALID_INPUT",
        message: "Action must be { kind: \"roll\", dice } or { kind: \"move\", tiles }.",
      },
    };
  }

  try {
    return { ok: true, result: applyActionWithSync(state, proposed) };
  } catch (err) {
    if (isEngineError(err)) {
      return { ok: false, error: { code: err.code, message: err.message } };
    }
    throw err;
  }
}
