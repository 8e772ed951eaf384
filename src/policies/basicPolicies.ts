// src/policies/basicPolicies.ts

import type { GameSnapshot, TileSet } from "../types";
import { randomInt } from "../engine/rng";
import type { Policy } from "./policy";
import { requireMoves, scoreAfterMove } from "./policy";

function topTile(move: TileSet): number {
  return move[move.length - 1] ?? 0;
}

/** Uniform pick. */
export const randomPolicy: Policy = (_snapshot, moves, rng) => {
  requireMoves(moves, "randomPolicy");
  return moves[randomInt(rng, 0, moves.length - 1)];
};

/** Fewest tiles; among equals, the one reaching the highest tile. */
export const fewestTilesPolicy: Policy = (_snapshot, moves) => {
  requireMoves(moves, "fewestTilesPolicy");

  let best = moves[0];
  for (const m of moves.slice(1)) {
    if (m.length < best.length || (m.length === best.length && topTile(m) > topTile(best))) {
      best = m;
    }
  }
  return best;
};

function lowestScore(snapshot: GameSnapshot, moves: readonly TileSet[]): TileSet {
  let best = moves[0];
  let bestScore = scoreAfterMove(snapshot, best);

  for (const m of moves.slice(1)) {
    const s = scoreAfterMove(snapshot, m);
    if (s < bestScore || (s === bestScore && m.length < best.length)) {
      best = m;
      bestScore = s;
    }
  }
  return best;
}

/**
 * Lowest resulting score, then fewer tiles, then list order.
 * All legal moves for one roll close the same total, so the tile count
 * usually decides.
 */
export const minScorePolicy: Policy = (snapshot, moves) => {
  requireMoves(moves, "minScorePolicy");
  return lowestScore(snapshot, moves);
};

/** Prefers splitting the roll over two or more tiles. */
export const humanLikePolicy: Policy = (snapshot, moves, rng) => {
  requireMoves(moves, "humanLikePolicy");

  const multi = moves.filter((m) => m.length >= 2);
  if (multi.length > 0) return lowestScore(snapshot, multi);
  return minScorePolicy(snapshot, moves, rng);
};
