// src/sim/playGame.ts

import type { GameOutcome, GameSnapshot, Roll, TileSet } from "../types";
import type { CreateGameOptions } from "../engine/session";
import { createGame } from "../engine/session";
import { boardKey } from "../engine/snapshot";
import type { Policy } from "../policies/policy";

export type GameStep = {
  step: number;
  roll: Roll;
  // Board before the move, e.g. "123X56X89".
  tilesBefore: string;
  legalMoves: TileSet[];
  move: TileSet | null;
  tilesAfter: string;
  scoreAfter: number;
  terminal: boolean;
};

export type GameRecord = {
  score: number;
  turns: number;
  outcome: GameOutcome;
  steps: GameStep[];
};

export type PlayGameOptions = CreateGameOptions & {
  /** Roll one die whenever that is allowed. Default false. */
  preferSingleDie?: boolean;

  /** Called after every step with the board as it stands afterwards. */
  onStep?: (step: GameStep, after: GameSnapshot) => void;
};

/**
 * Play one game to the end with `policy` choosing every move.
 */
export function playGame(policy: Policy, opts: PlayGameOptions = {}): GameRecord {
  const game = createGame(opts);
  const steps: GameStep[] = [];

  let before = game.snapshot();
  while (!before.isTerminal) {
    const diceCount = opts.preferSingleDie && before.canUseSingleDie ? 1 : 2;
    const roll = game.roll({ diceCount });

    const legalMoves = game.legalMoves();
    let move: TileSet | null = null;
    if (legalMoves.length > 0) {
      move = policy(game.snapshot(), legalMoves, game.rng);
      game.move(move);
    }

    const after = game.snapshot();
    const step: GameStep = {
      step: steps.length,
      roll,
      tilesBefore: boardKey(before),
      legalMoves,
      move,
      tilesAfter: boardKey(after),
      scoreAfter: after.score,
      terminal: after.isTerminal,
    };
    steps.push(step);
    opts.onStep?.(step, after);
    before = after;
  }

  const outcome = before.outcome;
  if (!outcome) throw new Error("playGame: game ended without an outcome");

  return { score: outcome.score, turns: before.turnCount, outcome, steps };
}
