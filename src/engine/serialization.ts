import type { GameState } from "../types";
import { InvalidConfigError } from "./errors";
import { validateState } from "./validateState";

export function serializeState(state: GameState): string {
  return JSON.stringify(state);
}

/**
 * Parse and shape-check a serialized state. The shape check always runs
 * here, whatever STB_VALIDATE_STATE says.
 */
export function deserializeState(json: string): GameState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new InvalidConfigError(`Serialized state is not valid JSON: ${String(err)}`);
  }

  if (!isGameStateShape(parsed)) {
    throw new InvalidConfigError("Serialized state is not a game state object.");
  }

  try {
    validateState(parsed, "deserializeState", { force: true });
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err));
  }
  return parsed;
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isGameStateShape(x: unknown): x is GameState {
  if (!isObject(x)) return false;
  const config = x["config"];
  const tiles = x["tiles"];
  const turn = x["turn"];
  return (
    typeof x["gameId"] === "string" &&
    isObject(config) &&
    isObject(config["options"]) &&
    Array.isArray(tiles) &&
    tiles.every(isObject) &&
    isObject(turn) &&
    isObject(turn["roll"])
  );
}
