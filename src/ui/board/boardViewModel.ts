// src/ui/board/boardViewModel.ts
//
// Board cells for text rendering.
// Convention: tiles left to right in ascending order; a closed tile shows "X".

import type { GameSnapshot } from "../../types";

export type TileCell = {
  value: number;
  isOpen: boolean;
  label: string;
};

export function boardCells(snapshot: GameSnapshot): TileCell[] {
  return Array.from({ length: snapshot.maxTile }, (_, i) => {
    const value = i + 1;
    const isOpen = snapshot.tiles[value] === true;
    return { value, isOpen, label: isOpen ? String(value) : "X" };
  });
}

/**
 * Tiles as one space-separated line: "1 2 X 4 5 6 X X 9".
 * On boards past 9 each label is padded to the widest tile.
 */
export function tilesLine(snapshot: GameSnapshot): string {
  const width = String(snapshot.maxTile).length;
  return boardCells(snapshot)
    .map((c) => c.label.padStart(width, " "))
    .join(" ");
}
