// src/engine/session.ts
//
// Stateful wrapper around the pure engine: one GameState, one random source,
// and the replay log of everything applied to it.

import type { GameAction, GameSnapshot, GameState, Roll, RollRequest, TileSet } from "../types";
import { applyMove } from "./applyMove";
import { rollDice } from "./applyRoll";
import { listLegalMoves } from "./legalMoves";
import type { MakeStateOptions } from "./makeState";
import { makeState } from "./makeState";
import type { ReplayEntry, ReplayLog } from "./replay";
import type { ReplayFile } from "./replay";
import { REPLAY_FORMAT_VERSION } from "./replay";
import { recordAction } from "./replayRecorder";
import type { Rng } from "./rng";
import { createRng, randomSeed } from "./rng";
import { snapshot } from "./snapshot";
import { cloneState } from "./stateUtils";

function copyEntry(entry: ReplayEntry): ReplayEntry {
  const action: GameAction =
    entry.action.kind === "roll"
      ? { kind: "roll", dice: [...entry.action.dice] }
      : { kind: "move", tiles: [...entry.action.tiles] };
  return { ...entry, action };
}

export type CreateGameOptions = MakeStateOptions & {
  /** Seed for the session's own generator. Ignored when `rng` is given. */
  seed?: number;
  rng?: Rng;
};

export interface GameSession {
  /** A copy of the current state; writing to it does not reach the game. */
  readonly state: GameState;
  readonly rng: Rng;
  snapshot(): GameSnapshot;
  legalMoves(): TileSet[];
  roll(request?: RollRequest): Roll;
  move(tiles: readonly number[]): GameSnapshot;
  replay(createdAt?: Date): ReplayFile;
}

export function createGame(opts: CreateGameOptions = {}): GameSession {
  const initialState = makeState(opts);
  const rng = opts.rng ?? createRng(opts.seed ?? randomSeed());

  let state = initialState;
  let log: ReplayLog = [];

  const commit = (next: GameState, action: GameAction) => {
    log = recordAction(log, state, action, next);
    state = next;
  };

  return {
    get state() {
      return cloneState(state);
    },
    rng,

    snapshot() {
      return snapshot(state);
    },

    legalMoves() {
      return listLegalMoves(state);
    },

    roll(request: RollRequest = {}) {
      const result = rollDice(state, request, rng);
      commit(result.state, { kind: "roll", dice: result.roll.dice });
      return result.roll;
    },

    move(tiles: readonly number[]) {
      const { state: next } = applyMove(state, tiles);
      commit(next, { kind: "move", tiles: [...tiles].sort((a, b) => a - b) });
      return snapshot(state);
    },

    replay(createdAt = new Date()) {
      return {
        formatVersion: REPLAY_FORMAT_VERSION,
        createdAt: createdAt.toISOString(),
        initialState: cloneState(initialState),
        log: log.map(copyEntry),
      };
    },
  };
}
