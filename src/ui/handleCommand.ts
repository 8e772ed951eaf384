// src/ui/handleCommand.ts
//
// Interactive command handling, kept free of I/O so it can be tested.
//
//   help
//   roll            two dice
//   roll1           one die (once 7, 8, 9 are closed)
//   roll <a> [b]    forced dice
//   moves
//   move <tiles...> e.g. "move 3 4" or "move 3+4"
//   state
//   q

import type { GameSession } from "../engine/session";
import { isEngineError } from "../engine/errors";
import { formatMove, formatRoll, formatState } from "./format";

export type CommandResult = {
  output: string;
  quit?: boolean;
};

export const HELP_TEXT =
  "Commands:\n" +
  "  help\n" +
  "  roll            roll two dice\n" +
  "  roll1           roll one die (after 7, 8 and 9 are closed)\n" +
  "  roll <a> [b]    roll with forced dice\n" +
  "  moves           list legal moves\n" +
  "  move <tiles>    close tiles, e.g. move 3 4\n" +
  "  state\n" +
  "  q";

function parseNumbers(parts: readonly string[]): number[] {
  return parts
    .flatMap((p) => p.split("+"))
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => Number(p));
}

function listMoves(game: GameSession): string {
  const moves = game.legalMoves();
  if (moves.length === 0) return "No legal moves.";
  return moves.map((m, i) => `  [${i}] ${formatMove(m)}`).join("\n");
}

function run(game: GameSession, cmd: string, args: readonly string[]): CommandResult {
  switch (cmd) {
    case "help":
      return { output: HELP_TEXT };

    case "q":
    case "quit":
      return { output: "Bye.", quit: true };

    case "state":
      return { output: formatState(game.snapshot()) };

    case "moves":
      return { output: listMoves(game) };

    case "roll":
    case "roll1": {
      const forced = parseNumbers(args);
      if (forced.length > 2) return { output: "roll takes at most two values." };

      const roll = game.roll(
        forced.length === 2
          ? { forced: [forced[0], forced[1]] }
          : forced.length === 1
            ? { forced: forced[0] }
            : { diceCount: cmd === "roll1" ? 1 : 2 }
      );

      const snap = game.snapshot();
      const body = snap.isTerminal ? formatState(snap) : listMoves(game);
      return { output: `Rolled ${formatRoll(roll)}\n${body}` };
    }

    case "move": {
      const tiles = parseNumbers(args);
      const snap = game.move(tiles);
      return { output: formatState(snap) };
    }

    default:
      return { output: `Unknown command "${cmd}". Type "help".` };
  }
}

/**
 * Run one input line against the game. Rule violations are reported in the
 * output; other errors propagate.
 */
export function handleCommand(game: GameSession, line: string): CommandResult {
  const [cmd = "", ...args] = line.trim().split(/\s+/);
  if (cmd === "") return { output: "" };

  try {
    return run(game, cmd.toLowerCase(), args);
  } catch (err) {
    if (isEngineError(err)) return { output: `${err.code}: ${err.message}` };
    throw err;
  }
}
