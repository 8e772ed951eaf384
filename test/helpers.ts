import type { GameState } from "../src/types";
import { makeState } from "../src/engine/makeState";
import type { MakeStateOptions } from "../src/engine/makeState";

/**
 * Fresh state with only `open` tiles left open. Everything else closed.
 */
export function stateWithOpen(open: readonly number[], opts: MakeStateOptions = {}): GameState {
  const base = makeState(opts);
  return {
    ...base,
    tiles: base.tiles.map((t) => ({ ...t, isOpen: open.includes(t.value) })),
  };
}

export function closeTiles(state: GameState, closed: readonly number[]): GameState {
  return {
    ...state,
    tiles: state.tiles.map((t) => (closed.includes(t.value) ? { ...t, isOpen: false } : t)),
  };
}

/**
 * Reference enumeration by bitmask: every subset of `tiles` summing to
 * `target`, as sorted "a+b" strings.
 */
export function bruteForceMoves(tiles: readonly number[], target: number): string[] {
  const sorted = [...tiles].sort((a, b) => a - b);
  const out: string[] = [];
  for (let mask = 1; mask < 1 << sorted.length; mask++) {
    const pick = sorted.filter((_, i) => (mask & (1 << i)) !== 0);
    if (pick.reduce((s, v) => s + v, 0) === target) out.push(pick.join("+"));
  }
  return out.sort();
}

/** Rng that returns fixed floats in order, then repeats the last one. */
export function fixedRng(values: readonly number[]): () => number {
  let i = 0;
  return () => {
    const v = values[Math.min(i, values.length - 1)];
    i++;
    return v;
  };
}

/** The float that randomInt(rng, 1, 6) maps to `face`. */
export function faceToFloat(face: number): number {
  return (face - 1) / 6 + 0.01;
}
