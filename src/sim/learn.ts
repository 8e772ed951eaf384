// src/sim/learn.ts
//
// Builds a lookup table for tablePolicy from recorded steps: for every
// (board, roll) seen, the move whose games ended with the lowest mean score.

import type { PolicyTable } from "../policies/tablePolicy";
import { moveId } from "../engine/stateUtils";
import type { StepRow } from "./csv";

export type LearnOptions = {
  /** Ignore a (board, roll, move) seen fewer times than this. Default 1. */
  minCount?: number;
};

type MoveStats = { total: number; count: number };

export function learnPolicyTable(rows: readonly StepRow[], opts: LearnOptions = {}): PolicyTable {
  const minCount = opts.minCount ?? 1;
  const byState = new Map<string, Map<string, MoveStats>>();

  for (const row of rows) {
    if (!row.chosenMove || row.chosenMove.length === 0) continue;

    const key = `${row.tilesBefore}|${row.roll}`;
    const moves = byState.get(key) ?? new Map<string, MoveStats>();
    byState.set(key, moves);

    const id = moveId([...row.chosenMove].sort((a, b) => a - b));
    const stats = moves.get(id) ?? { total: 0, count: 0 };
    moves.set(id, { total: stats.total + row.finalScore, count: stats.count + 1 });
  }

  const table: Record<string, string> = {};
  for (const key of [...byState.keys()].sort()) {
    const moves = byState.get(key);
    if (!moves) continue;

    let best: { id: string; mean: number } | undefined;
    // Ascending ids, so a tie keeps the smaller one.
    for (const id of [...moves.keys()].sort()) {
      const stats = moves.get(id);
      if (!stats || stats.count < minCount) continue;
      const mean = stats.total / stats.count;
      if (!best || mean < best.mean) best = { id, mean };
    }
    if (best) table[key] = best.id;
  }

  return table;
}
