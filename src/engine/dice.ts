// src/engine/dice.ts

import type { DieFace, GameState, RollRequest } from "../types";
import { IllegalRollRequestError } from "./errors";
import type { Rng } from "./rng";
import { randomInt } from "./rng";
import { isDieFace } from "./rulesConstants";
import { canUseSingleDie } from "./stateUtils";

export function rollDie(rng: Rng): DieFace {
  const face = randomInt(rng, 1, 6);
  if (!isDieFace(face)) throw new Error(`rng produced an out-of-range die: ${face}`);
  return face;
}

export function assertSingleDieAllowed(state: GameState): void {
  if (!state.config.options.singleDieRule) {
    throw new IllegalRollRequestError("One-die rolls are turned off for this game.");
  }
  if (!canUseSingleDie(state)) {
    throw new IllegalRollRequestError("One-die roll requires tiles 7, 8 and 9 to be closed.");
  }
}

function forcedFaces(forced: number | readonly [number, number]): readonly number[] {
  return typeof forced === "number" ? [forced] : [forced[0], forced[1]];
}

/**
 * Resolve a roll request into dice faces without touching the state.
 *
 * - forced faces override the draw and fix the dice count
 * - one die only when canUseSingleDie(state)
 */
export function resolveDice(state: GameState, request: RollRequest, rng: Rng): DieFace[] {
  const forced = request.forced === undefined ? undefined : forcedFaces(request.forced);
  const count = request.diceCount ?? forced?.length ?? 2;

  if (count !== 1 && count !== 2) {
    throw new IllegalRollRequestError(`Dice count must be 1 or 2, got ${String(count)}.`);
  }

  if (forced && forced.length !== count) {
    throw new IllegalRollRequestError(
      `Requested ${count} dice but forced ${forced.length} value(s).`
    );
  }

  if (count === 1) assertSingleDieAllowed(state);

  if (!forced) {
    return Array.from({ length: count }, () => rollDie(rng));
  }

  return forced.map((v) => {
    if (!isDieFace(v)) {
      throw new IllegalRollRequestError(`Forced die must be an integer 1..6, got ${String(v)}.`);
    }
    return v;
  });
}
