// Public engine surface

export { makeState } from "./makeState";
export type { MakeStateOptions } from "./makeState";

export { applyRoll, rollDice } from "./applyRoll";
export type { RollResult } from "./applyRoll";
export { applyMove } from "./applyMove";

// Contract name: legalMoves
export { legalMoves } from "./publicApi";
export { combosThatSum } from "./legalMoves";

export { boardKey, snapshot } from "./snapshot";
export { canUseSingleDie, moveId, openTiles, parseMoveId, scoreOf } from "./stateUtils";

export { createGame } from "./session";
export type { CreateGameOptions, GameSession } from "./session";

export { createRng, deriveSeed, randomSeed } from "./rng";
export type { Rng } from "./rng";

export { DEFAULT_MAX_TILE, ONE_DIE_UNLOCK_TILES } from "./constants";

// Errors
export {
  EngineError,
  GameOverError,
  IllegalMoveError,
  IllegalRollRequestError,
  InvalidConfigError,
  isEngineError,
} from "./errors";
export type { EngineErrorCode } from "./errors";

// State serialization
export { serializeState, deserializeState } from "./serialization";

// Deterministic state hash
export { hashState } from "./stateHash";

// Replay log
export { applyAction, applyAndRecord, verifyReplay } from "./replayApply";
export type { ReplayEntry, ReplayLog } from "./replay";

// Replay file format + IO
export { REPLAY_FORMAT_VERSION } from "./replay";
export type { ReplayFile } from "./replay";
export { serializeReplay, deserializeReplay, writeReplayFile, readReplayFile } from "./replayIO";
export { validateReplayFile } from "./replayValidate";

// Sync primitive + try-apply envelope
export { applyActionWithSync } from "./sync";
export type { SyncResult } from "./sync";
export type { ActionResponse, EngineErrorInfo } from "./envelope";
export { tryApplyAction } from "./tryApply";
