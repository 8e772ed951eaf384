// src/sim/stats.ts

export type ScoreSummary = {
  count: number;
  mean: number;
  median: number;
  min: number;
  max: number;
  p10: number;
  p25: number;
  p75: number;
  p90: number;
  // Sample standard deviation (n - 1); 0 below two games.
  stdDev: number;
  // Share of games ending with every tile closed.
  shutRate: number;
  histogram: ReadonlyMap<number, number>;
};

/**
 * Quantile of ascending `sorted` with linear interpolation between the two
 * nearest ranks, position (n - 1) * q.
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0;
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function summarizeScores(scores: readonly number[]): ScoreSummary {
  if (scores.length === 0) {
    return {
      count: 0,
      mean: 0,
      median: 0,
      min: 0,
      max: 0,
      p10: 0,
      p25: 0,
      p75: 0,
      p90: 0,
      stdDev: 0,
      shutRate: 0,
      histogram: new Map(),
    };
  }

  const sorted = [...scores].sort((a, b) => a - b);
  const n = sorted.length;
  const mean = sorted.reduce((acc, s) => acc + s, 0) / n;
  const squares = sorted.reduce((acc, s) => acc + (s - mean) ** 2, 0);

  const histogram = new Map<number, number>();
  for (const s of sorted) histogram.set(s, (histogram.get(s) ?? 0) + 1);

  return {
    count: n,
    mean,
    median: quantile(sorted, 0.5),
    min: sorted[0],
    max: sorted[n - 1],
    p10: quantile(sorted, 0.1),
    p25: quantile(sorted, 0.25),
    p75: quantile(sorted, 0.75),
    p90: quantile(sorted, 0.9),
    stdDev: n > 1 ? Math.sqrt(squares / (n - 1)) : 0,
    shutRate: (histogram.get(0) ?? 0) / n,
    histogram,
  };
}
