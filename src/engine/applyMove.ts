// src/engine/applyMove.ts
//
// Closes a set of tiles against the pending target.

import type { GameState, TileSet } from "../types";
import { GameOverError, IllegalMoveError } from "./errors";
import { cloneState, findTile, moveId, openTiles } from "./stateUtils";
import { validateState } from "./validateState";

/**
 * Check a candidate move and return it ascending.
 * Submission order does not matter; duplicates do.
 */
export function normalizeMove(state: GameState, tiles: readonly number[]): TileSet {
  if (state.phase === "ended") throw new GameOverError();

  const roll = state.turn.roll;
  if (roll.status !== "rolled") {
    throw new IllegalMoveError("No roll is pending; roll the dice first.");
  }

  if (tiles.length === 0) throw new IllegalMoveError("A move must close at least one tile.");

  const sorted = [...tiles].sort((a, b) => a - b);
  for (let i = 0; i < sorted.length; i++) {
    const value = sorted[i];
    if (!Number.isInteger(value)) {
      throw new IllegalMoveError(`Tile must be an integer, got ${String(value)}.`);
    }
    if (i > 0 && sorted[i - 1] === value) {
      throw new IllegalMoveError(`Tile ${value} is listed more than once.`);
    }

    const tile = findTile(state, value);
    if (!tile) throw new IllegalMoveError(`Tile ${value} is not on the board.`);
    if (!tile.isOpen) throw new IllegalMoveError(`Tile ${value} is already closed.`);
  }

  const sum = sorted.reduce((acc, v) => acc + v, 0);
  if (sum !== roll.target) {
    throw new IllegalMoveError(
      `Tiles ${moveId(sorted)} sum to ${sum}, but the roll is ${roll.target}.`
    );
  }

  return sorted;
}

/**
 * Applies a move. Contract is { state: GameState } (input is never mutated).
 */
export function applyMove(state: GameState, tiles: readonly number[]): { state: GameState } {
  const move = normalizeMove(state, tiles);

  const base = cloneState(state);
  const closed: GameState = {
    ...base,
    tiles: base.tiles.map((t) => (move.includes(t.value) ? { ...t, isOpen: false } : t)),
    turn: { ...base.turn, roll: { status: "idle" } },
  };

  const next: GameState =
    openTiles(closed).length === 0 ? { ...closed, phase: "ended", outcome: { kind: "shut", score: 0 } } : closed;

  validateState(next, "applyMove");
  return { state: next };
}
