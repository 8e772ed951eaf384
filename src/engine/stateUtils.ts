// src/engine/stateUtils.ts

import type { GameState, Roll, TileSet, TileState } from "../types";
import { ONE_DIE_UNLOCK_TILES } from "./constants";

export function openTiles(state: GameState): number[] {
  return state.tiles.filter((t) => t.isOpen).map((t) => t.value);
}

export function scoreOf(state: GameState): number {
  return openTiles(state).reduce((sum, v) => sum + v, 0);
}

export function findTile(state: GameState, value: number): TileState | undefined {
  return state.tiles.find((t) => t.value === value);
}

export function pendingTarget(state: GameState): number | null {
  return state.turn.roll.status === "rolled" ? state.turn.roll.target : null;
}

/**
 * True when the player may choose a one-die roll: the single-die rule is on
 * and every unlock tile present on the board is closed.
 */
export function canUseSingleDie(state: GameState): boolean {
  if (!state.config.options.singleDieRule) return false;

  for (const value of ONE_DIE_UNLOCK_TILES) {
    const tile = findTile(state, value);
    if (tile && tile.isOpen) return false;
  }
  return true;
}

export function moveId(tiles: TileSet): string {
  return tiles.join("+");
}

export function parseMoveId(id: string): number[] {
  return id
    .split("+")
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => Number(p));
}

function cloneRoll(roll: Roll): Roll {
  return { dice: [...roll.dice], target: roll.target };
}

/**
 * Deep copy with a fixed key order (state hashes depend on it).
 */
export function cloneState(state: GameState): GameState {
  const roll = state.turn.roll;
  return {
    ...state,
    config: { ...state.config, options: { ...state.config.options } },
    tiles: state.tiles.map((t) => ({ ...t })),
    turn: {
      ...state.turn,
      roll: roll.status === "rolled" ? { status: "rolled", ...cloneRoll(roll) } : { status: "idle" },
    },
    lastRoll: state.lastRoll ? cloneRoll(state.lastRoll) : undefined,
    outcome: state.outcome ? { ...state.outcome } : undefined,
  };
}
