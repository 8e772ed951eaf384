// src/policies/tablePolicy.ts
//
// Lookup-table policy. Keys look like "123X56X89|7" (board, "|", target);
// values name the tiles to close, "a+b".

import fs from "node:fs";
import path from "node:path";
import type { GameSnapshot, TileSet } from "../types";
import { boardKey } from "../engine/snapshot";
import { parseMoveId } from "../engine/stateUtils";
import { minScorePolicy } from "./basicPolicies";
import type { Policy } from "./policy";
import { requireMoves } from "./policy";

export type PolicyTable = Readonly<Record<string, string>>;

export function snapshotKey(snapshot: GameSnapshot): string {
  return `${boardKey(snapshot)}|${snapshot.pendingTarget ?? ""}`;
}

function sameTiles(a: TileSet, b: readonly number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/**
 * Moves found in the table win; a miss, or an entry that is not legal right
 * now, falls back to minScorePolicy.
 */
export function tablePolicy(table: PolicyTable): Policy {
  return (snapshot, moves, rng) => {
    requireMoves(moves, "tablePolicy");

    const hit = table[snapshotKey(snapshot)];
    if (hit !== undefined) {
      const want = parseMoveId(hit).sort((a, b) => a - b);
      const match = moves.find((m) => sameTiles(m, want));
      if (match) return match;
    }

    return minScorePolicy(snapshot, moves, rng);
  };
}

function isPolicyTable(x: unknown): x is PolicyTable {
  return (
    typeof x === "object" &&
    x !== null &&
    !Array.isArray(x) &&
    Object.values(x).every((v) => typeof v === "string")
  );
}

export function loadTablePolicy(filePath: string): Policy {
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);

  if (!isPolicyTable(parsed)) {
    throw new Error(`Policy table ${filePath} must be an object of "tiles|target" -> "a+b" strings.`);
  }

  return tablePolicy(parsed);
}

export function writePolicyTable(filePath: string, table: PolicyTable): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(table, null, 2) + "\n", "utf8");
}
