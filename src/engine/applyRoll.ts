// src/engine/applyRoll.ts

import type { DieFace, GameState, Roll, RollRequest } from "../types";
import { assertSingleDieAllowed, resolveDice } from "./dice";
import { GameOverError, IllegalRollRequestError } from "./errors";
import { listLegalMovesForTarget } from "./legalMoves";
import type { Rng } from "./rng";
import { isDieFace } from "./rulesConstants";
import { cloneState, scoreOf } from "./stateUtils";
import { validateState } from "./validateState";

export type RollResult = {
  state: GameState;
  roll: Roll;
};

export function assertCanRoll(state: GameState): void {
  if (state.phase === "ended") throw new GameOverError();
  if (state.turn.roll.status === "rolled") {
    throw new IllegalRollRequestError(
      `A roll of ${state.turn.roll.target} is still pending; close tiles before rolling again.`
    );
  }
}

function checkDice(state: GameState, dice: readonly number[]): DieFace[] {
  if (dice.length !== 1 && dice.length !== 2) {
    throw new IllegalRollRequestError(`A roll uses 1 or 2 dice, got ${dice.length}.`);
  }

  const faces: DieFace[] = [];
  for (const d of dice) {
    if (!isDieFace(d)) {
      throw new IllegalRollRequestError(`Die must be an integer 1..6, got ${String(d)}.`);
    }
    faces.push(d);
  }

  if (faces.length === 1) assertSingleDieAllowed(state);

  return faces;
}

/**
 * Apply already-known dice to the state.
 *
 * Sets the pending target and bumps the turn counter. When no open subset
 * matches the target the game ends right here with a "stuck" outcome.
 */
export function applyRoll(state: GameState, dice: readonly number[]): RollResult {
  assertCanRoll(state);
  const faces = checkDice(state, dice);

  const roll: Roll = { dice: faces, target: faces.reduce<number>((sum, d) => sum + d, 0) };
  const base = cloneState(state);
  const rolled: GameState = {
    ...base,
    turn: { count: state.turn.count + 1, roll: { status: "rolled", ...roll } },
    lastRoll: roll,
  };

  const next: GameState =
    listLegalMovesForTarget(rolled, roll.target).length > 0
      ? rolled
      : {
          ...rolled,
          phase: "ended",
          turn: { ...rolled.turn, roll: { status: "idle" } },
          outcome: { kind: "stuck", score: scoreOf(rolled), target: roll.target },
        };

  validateState(next, "applyRoll");
  return { state: next, roll };
}

/**
 * Draw (or take forced) dice for `request` and apply them.
 */
export function rollDice(state: GameState, request: RollRequest, rng: Rng): RollResult {
  assertCanRoll(state);
  return applyRoll(state, resolveDice(state, request, rng));
}
