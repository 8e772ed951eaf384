// src/sim/simulate.ts

import { deriveSeed, randomSeed } from "../engine/rng";
import type { Policy } from "../policies/policy";
import type { StepRow } from "./csv";
import { stepRows } from "./csv";
import { playGame } from "./playGame";
import type { ScoreSummary } from "./stats";
import { summarizeScores } from "./stats";

export type RunRow = {
  runId: number;
  policy: string;
  score: number;
  turns: number;
};

export type SimulationOptions = {
  policies: Readonly<Record<string, Policy>>;
  gamesPerPolicy: number;
  /** Base seed; each game gets its own seed derived from it. */
  seed?: number;
  maxTile?: number;
  singleDieRule?: boolean;
  preferSingleDie?: boolean;
  /** Called after each game, e.g. for progress output. */
  onGame?: (row: RunRow) => void;
};

export type SimulationResult = {
  seed: number;
  rows: RunRow[];
  summaries: Record<string, ScoreSummary>;
};

/**
 * Play `gamesPerPolicy` games with every policy. Game i of every policy uses
 * the same derived seed, so policies face the same first rolls.
 */
export function runSimulation(opts: SimulationOptions): SimulationResult {
  if (!Number.isInteger(opts.gamesPerPolicy) || opts.gamesPerPolicy < 0) {
    throw new Error(`gamesPerPolicy must be a non-negative integer, got ${opts.gamesPerPolicy}`);
  }

  const seed = opts.seed ?? randomSeed();
  const rows: RunRow[] = [];
  const summaries: Record<string, ScoreSummary> = {};

  for (const [name, policy] of Object.entries(opts.policies)) {
    const scores: number[] = [];

    for (let i = 0; i < opts.gamesPerPolicy; i++) {
      const record = playGame(policy, {
        seed: deriveSeed(seed, i),
        maxTile: opts.maxTile,
        singleDieRule: opts.singleDieRule,
        preferSingleDie: opts.preferSingleDie,
      });

      const row: RunRow = { runId: rows.length, policy: name, score: record.score, turns: record.turns };
      rows.push(row);
      scores.push(record.score);
      opts.onGame?.(row);
    }

    summaries[name] = summarizeScores(scores);
  }

  return { seed, rows, summaries };
}

export type CollectOptions = {
  policy: Policy;
  games: number;
  seed?: number;
  maxTile?: number;
  singleDieRule?: boolean;
};

/**
 * Play `games` games with one policy and flatten every step into rows,
 * e.g. as training data for learnPolicyTable.
 */
export function collectSteps(opts: CollectOptions): { seed: number; rows: StepRow[] } {
  if (!Number.isInteger(opts.games) || opts.games < 0) {
    throw new Error(`games must be a non-negative integer, got ${opts.games}`);
  }

  const seed = opts.seed ?? randomSeed();
  const rows: StepRow[] = [];
  for (let episode = 0; episode < opts.games; episode++) {
    const record = playGame(opts.policy, {
      seed: deriveSeed(seed, episode),
      maxTile: opts.maxTile,
      singleDieRule: opts.singleDieRule,
    });
    rows.push(...stepRows(episode, record));
  }
  return { seed, rows };
}
