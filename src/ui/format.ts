// src/ui/format.ts

import type { GameSnapshot, Roll, TileSet } from "../types";
import type { GameStep } from "../sim/playGame";
import type { ScoreSummary } from "../sim/stats";
import { tilesLine } from "./board/boardViewModel";

export function formatMove(move: TileSet | null): string {
  return move && move.length > 0 ? move.join("+") : "-";
}

export function formatRoll(roll: Roll): string {
  return roll.dice.length === 1 ? `${roll.target}` : `${roll.dice.join("+")}=${roll.target}`;
}

/**
 * One line per step:
 * "Step  0 | Roll:  7 | Move: 3+4   | Tiles: 1 2 X X 5 6 7 8 9 | Score: 38"
 * Tiles are shown as they stand after the move.
 */
export function formatStep(step: GameStep, after: GameSnapshot): string {
  const stepNo = String(step.step).padStart(2, " ");
  const roll = String(step.roll.target).padStart(2, " ");
  const move = formatMove(step.move).padEnd(5, " ");
  return `Step ${stepNo} | Roll: ${roll} | Move: ${move} | Tiles: ${tilesLine(after)} | Score: ${step.scoreAfter}`;
}

export function formatState(snapshot: GameSnapshot): string {
  const lines = [`Tiles: ${tilesLine(snapshot)}`, `Score: ${snapshot.score}  Turn: ${snapshot.turnCount}`];

  if (snapshot.pendingTarget !== null) {
    lines.push(`Pending target: ${snapshot.pendingTarget}`);
  } else if (!snapshot.isTerminal) {
    lines.push(snapshot.canUseSingleDie ? "Roll one or two dice." : "Roll two dice.");
  }

  if (snapshot.outcome) {
    lines.push(
      snapshot.outcome.kind === "shut"
        ? "Shut the box! Final score 0."
        : `No tiles make ${snapshot.outcome.target}. Final score ${snapshot.outcome.score}.`
    );
  }

  return lines.join("\n");
}

export function formatSummary(name: string, s: ScoreSummary): string {
  return (
    `${name.padEnd(9, " ")} games=${s.count} mean=${s.mean.toFixed(2)} median=${s.median} ` +
    `min=${s.min} max=${s.max} p10-p90=${s.p10.toFixed(0)}-${s.p90.toFixed(0)} std=${s.stdDev.toFixed(2)} ` +
    `shut=${(s.shutRate * 100).toFixed(2)}%`
  );
}
