// src/types.ts

export type GameId = string & { readonly __brand: "GameId" };

export type DieFace = 1 | 2 | 3 | 4 | 5 | 6;

// Ascending, distinct tile values.
export type TileSet = readonly number[];

export interface TileState {
  readonly value: number;
  readonly isOpen: boolean;
}

export interface Roll {
  readonly dice: readonly DieFace[];
  readonly target: number;
}

export type RollStatus = { readonly status: "idle" } | ({ readonly status: "rolled" } & Roll);

export type GameOutcome =
  | {
      // Every tile closed.
      readonly kind: "shut";
      readonly score: 0;
    }
  | {
      // A roll left no legal move.
      readonly kind: "stuck";
      readonly score: number;
      readonly target: number;
    };

// Engine-owned. Transitions return a new state; nothing writes into one.
export interface GameState {
  readonly gameId: GameId;
  readonly phase: "active" | "ended";
  readonly config: {
    readonly maxTile: number;
    readonly options: {
      // When false, every roll uses two dice.
      readonly singleDieRule: boolean;
    };
  };

  readonly tiles: readonly TileState[];

  readonly turn: {
    readonly count: number;
    readonly roll: RollStatus;
  };

  // Most recent roll, kept after it has been resolved.
  readonly lastRoll?: Roll;

  // Set when the game ends
  readonly outcome?: GameOutcome;
}

export interface GameSnapshot {
  maxTile: number;
  tiles: Readonly<Record<number, boolean>>;
  openTiles: readonly number[];
  pendingTarget: number | null;
  lastRoll: Roll | null;
  turnCount: number;
  isTerminal: boolean;
  score: number;
  outcome: GameOutcome | null;
  canUseSingleDie: boolean;
}

export type RollRequest = {
  // Defaults to 2, or to the number of forced faces.
  diceCount?: 1 | 2;
  forced?: number | readonly [number, number];
};

export type GameAction =
  | { kind: "roll"; dice: readonly number[] }
  | { kind: "move"; tiles: readonly number[] };
