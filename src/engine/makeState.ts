// src/engine/makeState.ts

import type { GameId, GameState, TileState } from "../types";
import { DEFAULT_MAX_TILE } from "./constants";
import { InvalidConfigError } from "./errors";
import { validateState } from "./validateState";

function asGameId(s: string): GameId {
  return s as GameId;
}

export type MakeStateOptions = {
  /** Highest tile value; the board holds 1..maxTile. Default 9. */
  maxTile?: number;

  /**
   * Allow one-die rolls once 7, 8 and 9 are closed. Default true.
   */
  singleDieRule?: boolean;

  gameId?: string;
};

function makeTiles(maxTile: number): readonly TileState[] {
  return Array.from({ length: maxTile }, (_, i) => ({ value: i + 1, isOpen: true }));
}

/**
 * Initial state:
 * - phase: "active"
 * - every tile 1..maxTile open
 * - turn count 0, roll idle
 */
export function makeState(opts: MakeStateOptions = {}): GameState {
  const maxTile = opts.maxTile ?? DEFAULT_MAX_TILE;
  if (!Number.isInteger(maxTile) || maxTile < 1) {
    throw new InvalidConfigError(`maxTile must be an integer >= 1, got ${String(maxTile)}.`);
  }

  const state: GameState = {
    gameId: asGameId(opts.gameId ?? "g_local"),
    phase: "active",
    config: {
      maxTile,
      options: {
        singleDieRule: opts.singleDieRule ?? true,
      },
    },
    tiles: makeTiles(maxTile),
    turn: {
      count: 0,
      roll: { status: "idle" },
    },
  };

  validateState(state, "makeState");
  return state;
}
