import type { GameAction } from "../types";
import type { ReplayFile } from "./replay";
import { REPLAY_FORMAT_VERSION } from "./replay";
import { deserializeState } from "./serialization";

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isIsoDateString(s: unknown): s is string {
  if (typeof s !== "string") return false;
  const t = Date.parse(s);
  return Number.isFinite(t) && new Date(t).toISOString() === s;
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function isNumberArray(x: unknown): x is number[] {
  return Array.isArray(x) && x.every((n) => typeof n === "number");
}

function isGameAction(x: unknown): x is GameAction {
  if (!isObject(x)) return false;
  if (x["kind"] === "roll") return isNumberArray(x["dice"]);
  if (x["kind"] === "move") return isNumberArray(x["tiles"]);
  return false;
}

export function validateReplayFile(replay: unknown): asserts replay is ReplayFile {
  if (!isObject(replay)) {
    throw new Error("Invalid replay: not an object");
  }

  if (replay["formatVersion"] !== REPLAY_FORMAT_VERSION) {
    throw new Error(`Invalid replay formatVersion: ${String(replay["formatVersion"])}`);
  }

  if (!isIsoDateString(replay["createdAt"])) {
    throw new Error(`Invalid replay createdAt: ${String(replay["createdAt"])}`);
  }

  const initialState = replay["initialState"];
  if (!isObject(initialState)) {
    throw new Error("Invalid replay initialState");
  }
  // Full shape check of the embedded state.
  deserializeState(JSON.stringify(initialState));

  const log = replay["log"];
  if (!Array.isArray(log)) {
    throw new Error("Invalid replay log");
  }

  log.forEach((e: unknown, i) => {
    if (!isObject(e)) {
      throw new Error(`Invalid replay log[${i}]`);
    }
    if (!isString(e["beforeHash"])) {
      throw new Error(`Invalid replay log[${i}].beforeHash`);
    }
    if (!isGameAction(e["action"])) {
      throw new Error(`Invalid replay log[${i}].action`);
    }
    if (!isString(e["afterHash"])) {
      throw new Error(`Invalid replay log[${i}].afterHash`);
    }
  });
}
