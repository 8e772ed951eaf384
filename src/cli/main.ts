// src/cli/main.ts
//
// Usage:
//   shut-the-box play [--replay out.json]
//   shut-the-box verify <replay.json>
//   shut-the-box demo [--games N] [--policy random|fewest|minscore|human] [--table file.json]
//   shut-the-box simulate [--games N] [--out runs.csv]
//   shut-the-box collect [--games N] [--policy NAME] [--out steps.csv]
//   shut-the-box learn --in steps.csv [--out table.json] [--min-count N]
//
// Flags --seed and --max-tile override STB_SEED / STB_MAX_TILE.

import { createGame } from "../engine/session";
import { readReplayFile, writeReplayFile } from "../engine/replayIO";
import { verifyReplay } from "../engine/replayApply";
import { scoreOf } from "../engine/stateUtils";
import { randomSeed, deriveSeed } from "../engine/rng";
import { isPolicyName, loadTablePolicy, POLICIES, writePolicyTable } from "../policies";
import type { Policy } from "../policies";
import { playGame } from "../sim/playGame";
import { collectSteps, runSimulation } from "../sim/simulate";
import { readStepsCsv, writeRunsCsv, writeStepsCsv } from "../sim/csv";
import { learnPolicyTable } from "../sim/learn";
import { formatStep, formatSummary } from "../ui/format";
import { startTextClient } from "../ui/textClient";
import { flagInt, parseArgs } from "./args";
import type { ParsedArgs } from "./args";
import { readConfig } from "./env";
import type { CliConfig } from "./env";

const USAGE =
  "Usage:\n" +
  "  shut-the-box play [--replay out.json]\n" +
  "  shut-the-box verify <replay.json>\n" +
  "  shut-the-box demo [--games N] [--policy random|fewest|minscore|human] [--table file.json]\n" +
  "  shut-the-box simulate [--games N] [--out runs.csv]\n" +
  "  shut-the-box collect [--games N] [--policy NAME] [--out steps.csv]\n" +
  "  shut-the-box learn --in steps.csv [--out table.json] [--min-count N]\n" +
  "Common flags: --seed N, --max-tile N";

function withFlags(config: CliConfig, args: ParsedArgs): CliConfig {
  return {
    ...config,
    maxTile: flagInt(args.flags, "max-tile", config.maxTile),
    seed: args.flags["seed"] !== undefined ? flagInt(args.flags, "seed", 0) : config.seed,
  };
}

function pickPolicy(args: ParsedArgs, defaultName = "fewest"): { name: string; policy: Policy } {
  const table = args.flags["table"];
  if (table) return { name: `table(${table})`, policy: loadTablePolicy(table) };

  const name = args.flags["policy"] ?? defaultName;
  if (!isPolicyName(name)) {
    throw new Error(`Unknown policy "${name}". Choose one of: ${Object.keys(POLICIES).join(", ")}`);
  }
  return { name, policy: POLICIES[name] };
}

function demo(config: CliConfig, args: ParsedArgs): void {
  const games = flagInt(args.flags, "games", 2);
  const { name, policy } = pickPolicy(args);
  const seed = config.seed ?? randomSeed();

  for (let g = 0; g < games; g++) {
    console.log(`\n=== New Game (policy=${name}) ===`);
    const record = playGame(policy, {
      maxTile: config.maxTile,
      singleDieRule: config.singleDieRule,
      seed: deriveSeed(seed, g),
      onStep: (step, after) => console.log(formatStep(step, after)),
    });
    console.log(`Game over! Final score = ${record.score}`);
  }
}

function verify(args: ParsedArgs): void {
  const file = args.positional[0];
  if (!file) throw new Error("verify: missing replay file path");

  const replay = readReplayFile(file);
  const final = verifyReplay(replay);
  console.log(`OK: ${replay.log.length} actions, final score ${scoreOf(final)}`);
}

function simulate(config: CliConfig, args: ParsedArgs): void {
  const games = flagInt(args.flags, "games", 1000);
  const result = runSimulation({
    policies: POLICIES,
    gamesPerPolicy: games,
    seed: config.seed,
    maxTile: config.maxTile,
    singleDieRule: config.singleDieRule,
  });

  console.log(`seed=${result.seed}`);
  for (const [name, summary] of Object.entries(result.summaries)) {
    console.log(formatSummary(name, summary));
  }

  const out = args.flags["out"];
  if (out) {
    writeRunsCsv(out, result.rows);
    console.log(`Saved: ${out}`);
  }
}

function collect(config: CliConfig, args: ParsedArgs): void {
  const games = flagInt(args.flags, "games", 100);
  const { name, policy } = pickPolicy(args, "random");
  const out = args.flags["out"] ?? "run_results/steps.csv";

  const { seed, rows } = collectSteps({
    policy,
    games,
    seed: config.seed,
    maxTile: config.maxTile,
    singleDieRule: config.singleDieRule,
  });
  writeStepsCsv(out, rows);
  console.log(`seed=${seed} policy=${name} games=${games} steps=${rows.length}`);
  console.log(`Saved: ${out}`);
}

function learn(args: ParsedArgs): void {
  const input = args.flags["in"];
  if (!input) throw new Error("learn: --in <steps.csv> is required");
  const out = args.flags["out"] ?? "run_results/policy_table.json";

  const table = learnPolicyTable(readStepsCsv(input), { minCount: flagInt(args.flags, "min-count", 1) });
  writePolicyTable(out, table);
  console.log(`Learned ${Object.keys(table).length} board|roll -> move entries`);
  console.log(`Saved: ${out}`);
}

export type MainIo = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
};

export async function main(argv: readonly string[] = process.argv.slice(2), io: MainIo = {}): Promise<void> {
  const args = parseArgs(argv);
  const config = withFlags(readConfig(), args);

  switch (args.command) {
    case "play": {
      const game = createGame({ maxTile: config.maxTile, singleDieRule: config.singleDieRule, seed: config.seed });
      await startTextClient(game, io.input, io.output);
      const out = args.flags["replay"];
      if (out) {
        writeReplayFile(out, game.replay());
        console.log(`Saved replay: ${out}`);
      }
      return;
    }
    case "demo":
      demo(config, args);
      return;
    case "verify":
      verify(args);
      return;
    case "simulate":
      simulate(config, args);
      return;
    case "collect":
      collect(config, args);
      return;
    case "learn":
      learn(args);
      return;
    default:
      console.log(USAGE);
  }
}
