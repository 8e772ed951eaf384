// src/sim/csv.ts

import fs from "node:fs";
import path from "node:path";
import type { TileSet } from "../types";
import { moveId, parseMoveId } from "../engine/stateUtils";
import type { GameRecord } from "./playGame";
import type { RunRow } from "./simulate";

export const CSV_HEADER = "run_id,policy,score,turns";

export const STEPS_CSV_HEADER =
  "episode,step,roll,tiles_before,legal_moves,chosen_move,tiles_after,remaining_sum_after,terminal,final_score";

/** One step of one game, flattened for the per-step CSV. */
export type StepRow = {
  episode: number;
  step: number;
  roll: number;
  tilesBefore: string;
  legalMoves: TileSet[];
  chosenMove: TileSet | null;
  tilesAfter: string;
  remainingSumAfter: number;
  terminal: boolean;
  // Score the whole game ended with, repeated on each of its rows.
  finalScore: number;
};

function csvField(s: string): string {
  return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

function ensureDirForFile(filePath: string) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

export function runsToCsv(rows: readonly RunRow[]): string {
  const lines = rows.map((r) => [String(r.runId), csvField(r.policy), String(r.score), String(r.turns)].join(","));
  return [CSV_HEADER, ...lines].join("\n") + "\n";
}

export function writeRunsCsv(filePath: string, rows: readonly RunRow[]): void {
  ensureDirForFile(filePath);
  fs.writeFileSync(filePath, runsToCsv(rows), "utf8");
}

// ---------------------------
// Per-step rows
// ---------------------------

export function stepRows(episode: number, record: GameRecord): StepRow[] {
  return record.steps.map((s) => ({
    episode,
    step: s.step,
    roll: s.roll.target,
    tilesBefore: s.tilesBefore,
    legalMoves: s.legalMoves,
    chosenMove: s.move,
    tilesAfter: s.tilesAfter,
    remainingSumAfter: s.scoreAfter,
    terminal: s.terminal,
    finalScore: record.score,
  }));
}

/**
 * Moves are written "a+b"; the legal-move list joins them with ";".
 * A step with no move leaves both columns empty.
 */
export function stepsToCsv(rows: readonly StepRow[]): string {
  const lines = rows.map((r) =>
    [
      String(r.episode),
      String(r.step),
      String(r.roll),
      r.tilesBefore,
      r.legalMoves.map(moveId).join(";"),
      r.chosenMove ? moveId(r.chosenMove) : "",
      r.tilesAfter,
      String(r.remainingSumAfter),
      String(r.terminal),
      String(r.finalScore),
    ].join(",")
  );
  return [STEPS_CSV_HEADER, ...lines].join("\n") + "\n";
}

export function writeStepsCsv(filePath: string, rows: readonly StepRow[]): void {
  ensureDirForFile(filePath);
  fs.writeFileSync(filePath, stepsToCsv(rows), "utf8");
}

function csvInt(value: string, column: string, line: number): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new Error(`Steps CSV line ${line}: ${column} must be an integer, got "${value}"`);
  }
  return n;
}

/**
 * Parse a per-step CSV. Columns are found by header name, so extra or
 * reordered columns are fine.
 */
export function parseStepsCsv(text: string): StepRow[] {
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== "");
  if (lines.length === 0) return [];

  const header = lines[0].split(",").map((h) => h.trim());
  const required = STEPS_CSV_HEADER.split(",");
  for (const name of required) {
    if (!header.includes(name)) throw new Error(`Steps CSV is missing column "${name}"`);
  }

  return lines.slice(1).map((line, i) => {
    const lineNo = i + 2;
    const cells = line.split(",");
    const cell = (name: string) => cells[header.indexOf(name)] ?? "";

    const legal = cell("legal_moves");
    const chosen = cell("chosen_move");
    return {
      episode: csvInt(cell("episode"), "episode", lineNo),
      step: csvInt(cell("step"), "step", lineNo),
      roll: csvInt(cell("roll"), "roll", lineNo),
      tilesBefore: cell("tiles_before"),
      legalMoves: legal === "" ? [] : legal.split(";").map(parseMoveId),
      chosenMove: chosen === "" ? null : parseMoveId(chosen),
      tilesAfter: cell("tiles_after"),
      remainingSumAfter: csvInt(cell("remaining_sum_after"), "remaining_sum_after", lineNo),
      terminal: cell("terminal").trim().toLowerCase() === "true",
      finalScore: csvInt(cell("final_score"), "final_score", lineNo),
    };
  });
}

export function readStepsCsv(filePath: string): StepRow[] {
  return parseStepsCsv(fs.readFileSync(filePath, "utf8"));
}
