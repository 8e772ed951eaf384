// src/engine/snapshot.ts

import type { GameSnapshot, GameState } from "../types";
import { canUseSingleDie, openTiles, pendingTarget, scoreOf } from "./stateUtils";

/**
 * Read-only view of a state for renderers and policies.
 * Built fresh on every call; mutating it does not affect the game.
 */
export function snapshot(state: GameState): GameSnapshot {
  const tiles: Record<number, boolean> = {};
  for (const t of state.tiles) tiles[t.value] = t.isOpen;

  return {
    maxTile: state.config.maxTile,
    tiles,
    openTiles: openTiles(state),
    pendingTarget: pendingTarget(state),
    lastRoll: state.lastRoll ? { dice: [...state.lastRoll.dice], target: state.lastRoll.target } : null,
    turnCount: state.turn.count,
    isTerminal: state.phase === "ended",
    score: scoreOf(state),
    outcome: state.outcome ? { ...state.outcome } : null,
    canUseSingleDie: state.phase === "active" && canUseSingleDie(state),
  };
}

/**
 * Board as text: each tile's value when open, "X" when closed.
 * e.g. "123X56X89"
 */
export function boardKey(snap: GameSnapshot): string {
  return Array.from({ length: snap.maxTile }, (_, i) => (snap.tiles[i + 1] ? String(i + 1) : "X")).join("");
}
