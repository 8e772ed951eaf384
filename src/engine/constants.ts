// src/engine/constants.ts

export const DEFAULT_MAX_TILE = 9;

// One-die rolls unlock once these tiles (where present on the board) are closed.
// Anchored to the literal values even on boards larger than 9.
export const ONE_DIE_UNLOCK_TILES: readonly number[] = [7, 8, 9];
