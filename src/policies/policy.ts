// src/policies/policy.ts

import type { GameSnapshot, TileSet } from "../types";
import type { Rng } from "../engine/rng";

/**
 * Decision function: picks one move from a non-empty legal-move list.
 * Policies hold no game state; `rng` is the only source of randomness.
 */
export type Policy = (snapshot: GameSnapshot, moves: readonly TileSet[], rng: Rng) => TileSet;

export function requireMoves(moves: readonly TileSet[], policyName: string): void {
  if (moves.length === 0) {
    throw new Error(`${policyName}: called with no legal moves.`);
  }
}

export function sumOf(tiles: TileSet): number {
  return tiles.reduce((acc, v) => acc + v, 0);
}

export function scoreAfterMove(snapshot: GameSnapshot, move: TileSet): number {
  return snapshot.score - sumOf(move);
}
