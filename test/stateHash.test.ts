import { describe, it, expect } from "vitest";
import { applyRoll, hashState, makeState } from "../src/engine";

describe("GameState hash", () => {
  it("produces the same hash for identical states", () => {
    expect(hashState(makeState())).toBe(hashState(makeState()));
  });

  it("is a 64-char hex digest", () => {
    expect(hashState(makeState())).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when the state changes", () => {
    const a = makeState();
    const b = applyRoll(a, [1, 2]).state;
    expect(hashState(a)).not.toBe(hashState(b));
  });
});
