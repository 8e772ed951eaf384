// src/engine/legalMoves.ts

import type { GameState, TileSet } from "../types";
import { openTiles, pendingTarget } from "./stateUtils";

/**
 * Every distinct subset of `tiles` summing exactly to `target`.
 *
 * Depth-first over the tiles in ascending order, so each subset comes out
 * ascending and the list is in lexicographic order ([1,4] before [2,3]
 * before [5]). A branch stops as soon as the next tile would overshoot.
 */
export function combosThatSum(tiles: readonly number[], target: number): TileSet[] {
  const sorted = [...new Set(tiles)].sort((a, b) => a - b);
  const out: TileSet[] = [];
  const picked: number[] = [];

  const walk = (start: number, sum: number) => {
    for (let i = start; i < sorted.length; i++) {
      const next = sum + sorted[i];
      if (next > target) break;

      picked.push(sorted[i]);
      if (next === target) out.push([...picked]);
      else walk(i + 1, next);
      picked.pop();
    }
  };

  if (target > 0) walk(0, 0);
  return out;
}

/**
 * Legal moves for the pending target. Empty when no roll is pending or when
 * no open subset matches.
 */
export function listLegalMoves(state: GameState): TileSet[] {
  const target = pendingTarget(state);
  if (target === null || state.phase !== "active") return [];
  return combosThatSum(openTiles(state), target);
}

export function listLegalMovesForTarget(state: GameState, target: number): TileSet[] {
  return combosThatSum(openTiles(state), target);
}
