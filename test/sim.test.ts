import { describe, it, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { POLICIES, fewestTilesPolicy, randomPolicy } from "../src/policies";
import { playGame } from "../src/sim/playGame";
import type { GameRecord } from "../src/sim/playGame";
import { collectSteps, runSimulation } from "../src/sim/simulate";
import { summarizeScores } from "../src/sim/stats";
import {
  CSV_HEADER,
  parseStepsCsv,
  readStepsCsv,
  runsToCsv,
  STEPS_CSV_HEADER,
  stepRows,
  stepsToCsv,
  writeRunsCsv,
  writeStepsCsv,
} from "../src/sim/csv";
import type { StepRow } from "../src/sim/csv";
import { learnPolicyTable } from "../src/sim/learn";

describe("playGame", () => {
  it("plays to the end and the record agrees with itself", () => {
    const record = playGame(fewestTilesPolicy, { seed: 2024 });

    expect(record.turns).toBe(record.steps.length);
    expect(record.steps[record.steps.length - 1].scoreAfter).toBe(record.score);
    if (record.outcome.kind === "stuck") {
      expect(record.steps[record.steps.length - 1].move).toBeNull();
    } else {
      expect(record.score).toBe(0);
    }
    for (const step of record.steps.slice(0, -1)) {
      expect(step.move).not.toBeNull();
    }
  });

  it("is reproducible from a seed", () => {
    expect(playGame(POLICIES.human, { seed: 5 })).toEqual(playGame(POLICIES.human, { seed: 5 }));
  });

  it("rolls one die when preferred and allowed", () => {
    const record = playGame(fewestTilesPolicy, { seed: 11, maxTile: 6, preferSingleDie: true });
    for (const step of record.steps) expect(step.roll.dice).toHaveLength(1);
  });

  it("records the board on both sides of every step", () => {
    const record = playGame(fewestTilesPolicy, { seed: 8 });
    const { steps } = record;

    expect(steps[0].tilesBefore).toBe("123456789");
    for (let i = 1; i < steps.length; i++) expect(steps[i].tilesBefore).toBe(steps[i - 1].tilesAfter);
    expect(steps.map((s) => s.terminal)).toEqual(steps.map((_, i) => i === steps.length - 1));

    for (const step of steps) {
      if (step.move) expect(step.legalMoves).toContainEqual(step.move);
      else expect(step.legalMoves).toEqual([]);
    }
  });

  it("reports each step to onStep", () => {
    const seen: number[] = [];
    const record = playGame(fewestTilesPolicy, { seed: 3, onStep: (step) => seen.push(step.step) });
    expect(seen).toEqual(record.steps.map((s) => s.step));
  });
});

describe("summarizeScores", () => {
  it("computes mean, median, extremes, shut rate and histogram", () => {
    const s = summarizeScores([0, 10, 4, 0, 6]);
    expect(s.count).toBe(5);
    expect(s.mean).toBe(4);
    expect(s.median).toBe(4);
    expect(s.min).toBe(0);
    expect(s.max).toBe(10);
    expect(s.shutRate).toBeCloseTo(0.4);
    expect(s.p10).toBe(0);
    expect(s.p25).toBe(0);
    expect(s.p75).toBe(6);
    expect(s.p90).toBeCloseTo(8.4);
    expect(s.stdDev).toBeCloseTo(Math.sqrt(18));
    expect([...s.histogram.entries()]).toEqual([
      [0, 2],
      [4, 1],
      [6, 1],
      [10, 1],
    ]);
  });

  it("averages the middle pair for an even count", () => {
    expect(summarizeScores([3, 1, 8, 6]).median).toBe(4.5);
  });

  it("returns zeros for no games", () => {
    expect(summarizeScores([]).count).toBe(0);
  });

  it("has no spread for a single game", () => {
    const s = summarizeScores([7]);
    expect(s.stdDev).toBe(0);
    expect([s.p10, s.p25, s.median, s.p75, s.p90]).toEqual([7, 7, 7, 7, 7]);
  });
});

describe("runSimulation", () => {
  it("plays the requested games per policy with stable run ids", () => {
    const result = runSimulation({ policies: POLICIES, gamesPerPolicy: 3, seed: 99 });
    const names = Object.keys(POLICIES);

    expect(result.seed).toBe(99);
    expect(result.rows).toHaveLength(3 * names.length);
    expect(result.rows.map((r) => r.runId)).toEqual(result.rows.map((_, i) => i));
    expect(result.rows.slice(0, 3).every((r) => r.policy === names[0])).toBe(true);
    for (const name of names) expect(result.summaries[name].count).toBe(3);
  });

  it("is reproducible from a seed", () => {
    const a = runSimulation({ policies: POLICIES, gamesPerPolicy: 4, seed: 7 });
    const b = runSimulation({ policies: POLICIES, gamesPerPolicy: 4, seed: 7 });
    expect(a.rows).toEqual(b.rows);
  });

  it("rejects a negative game count", () => {
    expect(() => runSimulation({ policies: POLICIES, gamesPerPolicy: -1 })).toThrow("gamesPerPolicy");
  });
});

describe("CSV export", () => {
  const rows = [
    { runId: 0, policy: "random", score: 12, turns: 5 },
    { runId: 1, policy: "odd,name", score: 0, turns: 7 },
  ];

  it("writes a header and one line per run", () => {
    expect(runsToCsv(rows)).toBe(`${CSV_HEADER}\n0,random,12,5\n1,"odd,name",0,7\n`);
  });

  it("writes the file, creating directories", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stb-csv-"));
    const file = path.join(dir, "nested", "runs.csv");
    try {
      writeRunsCsv(file, rows);
      expect(fs.readFileSync(file, "utf8")).toBe(runsToCsv(rows));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("per-step CSV", () => {
  const record: GameRecord = {
    score: 3,
    turns: 2,
    outcome: { kind: "stuck", score: 3, target: 12 },
    steps: [
      {
        step: 0,
        roll: { dice: [1, 2], target: 3 },
        tilesBefore: "123",
        legalMoves: [[1, 2], [3]],
        move: [3],
        tilesAfter: "12X",
        scoreAfter: 3,
        terminal: false,
      },
      {
        step: 1,
        roll: { dice: [6, 6], target: 12 },
        tilesBefore: "12X",
        legalMoves: [],
        move: null,
        tilesAfter: "12X",
        scoreAfter: 3,
        terminal: true,
      },
    ],
  };

  it("writes one line per step with the game's final score", () => {
    expect(stepsToCsv(stepRows(4, record))).toBe(
      `${STEPS_CSV_HEADER}\n4,0,3,123,1+2;3,3,12X,3,false,3\n4,1,12,12X,,,12X,3,true,3\n`
    );
  });

  it("parses what it writes", () => {
    const rows = stepRows(4, record);
    expect(parseStepsCsv(stepsToCsv(rows))).toEqual(rows);
  });

  it("finds columns by name and reads any-case booleans", () => {
    const text =
      "final_score,episode,step,roll,tiles_before,legal_moves,chosen_move,tiles_after,remaining_sum_after,terminal\n" +
      "0,2,5,4,1XXX,,,1XXX,1,True\n";
    expect(parseStepsCsv(text)).toEqual([
      {
        episode: 2,
        step: 5,
        roll: 4,
        tilesBefore: "1XXX",
        legalMoves: [],
        chosenMove: null,
        tilesAfter: "1XXX",
        remainingSumAfter: 1,
        terminal: true,
        finalScore: 0,
      },
    ]);
  });

  it("rejects a file without the step columns", () => {
    expect(() => parseStepsCsv(`${CSV_HEADER}\n0,random,12,5\n`)).toThrow('Steps CSV is missing column "episode"');
  });

  it("writes and reads the file, creating directories", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stb-steps-"));
    const file = path.join(dir, "nested", "steps.csv");
    try {
      const rows = stepRows(0, record);
      writeStepsCsv(file, rows);
      expect(readStepsCsv(file)).toEqual(rows);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("collectSteps", () => {
  it("flattens every game into consecutive rows", () => {
    const { seed, rows } = collectSteps({ policy: randomPolicy, games: 3, seed: 9 });
    expect(seed).toBe(9);

    for (const episode of [0, 1, 2]) {
      const game = rows.filter((r) => r.episode === episode);
      const last = game[game.length - 1];
      expect(game.map((r) => r.step)).toEqual(game.map((_, i) => i));
      expect(game.filter((r) => r.terminal)).toEqual([last]);
      expect(game.every((r) => r.finalScore === last.remainingSumAfter)).toBe(true);
    }
  });

  it("is reproducible from a seed", () => {
    const a = collectSteps({ policy: randomPolicy, games: 2, seed: 4 });
    const b = collectSteps({ policy: randomPolicy, games: 2, seed: 4 });
    expect(a.rows).toEqual(b.rows);
  });
});

describe("learnPolicyTable", () => {
  function row(tilesBefore: string, roll: number, chosenMove: number[] | null, finalScore: number): StepRow {
    return {
      episode: 0,
      step: 0,
      roll,
      tilesBefore,
      legalMoves: [],
      chosenMove,
      tilesAfter: tilesBefore,
      remainingSumAfter: finalScore,
      terminal: chosenMove === null,
      finalScore,
    };
  }

  const rows = [
    row("12345", 5, [5], 10),
    row("12345", 5, [5], 2),
    row("12345", 5, [4, 1], 4),
    row("12345", 5, [2, 3], 4),
    row("12345", 5, null, 0),
    row("1234X", 3, [3], 7),
  ];

  it("keeps the move with the lowest mean final score, smaller id on a tie", () => {
    expect(learnPolicyTable(rows)).toEqual({ "12345|5": "1+4", "1234X|3": "3" });
  });

  it("skips moves seen fewer than minCount times", () => {
    expect(learnPolicyTable(rows, { minCount: 2 })).toEqual({ "12345|5": "5" });
  });

  it("only learns moves that were actually chosen in that state", () => {
    const collected = collectSteps({ policy: randomPolicy, games: 5, seed: 12 }).rows;
    const table = learnPolicyTable(collected);

    expect(Object.keys(table).length).toBeGreaterThan(0);
    for (const [key, move] of Object.entries(table)) {
      const chosen = collected
        .filter((r) => `${r.tilesBefore}|${r.roll}` === key && r.chosenMove)
        .map((r) => r.chosenMove?.join("+"));
      expect(chosen).toContain(move);
    }
  });
});
