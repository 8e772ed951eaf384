// src/engine/publicApi.ts
//
// Public query surface. This is the ONLY place legalMoves is exported from.

import type { GameState, TileSet } from "../types";
import { listLegalMoves } from "./legalMoves";

/**
 * Contract name: legalMoves
 * All subsets of open tiles matching the pending target; [] when no roll is
 * pending or the game has ended.
 */
export function legalMoves(state: GameState): TileSet[] {
  return listLegalMoves(state);
}
