import type { GameAction, GameState } from "../types";

/**
 * One authoritative state transition.
 */
export type ReplayEntry = {
  /** Hash of the state BEFORE the action */
  readonly beforeHash: string;

  /** The roll or move that was applied */
  readonly action: GameAction;

  /** Hash of the state AFTER the action */
  readonly afterHash: string;
};

export type ReplayLog = readonly ReplayEntry[];

export const REPLAY_FORMAT_VERSION = 1 as const;

/**
 * Replay file, version 1: a starting state plus every transition from it.
 */
export type ReplayFile = {
  formatVersion: typeof REPLAY_FORMAT_VERSION;

  // ISO timestamp string
  createdAt: string;

  initialState: GameState;
  log: ReplayLog;
};
