import { describe, expect, it } from "vitest";

import {
  applyMove,
  applyRoll,
  canUseSingleDie,
  GameOverError,
  IllegalRollRequestError,
  makeState,
  rollDice,
} from "../../src/engine";
import { closeTiles, faceToFloat, fixedRng, stateWithOpen } from "../helpers";

describe("Contract: dice count rule", () => {
  it("refuses a one-die roll while any of 7, 8, 9 is open", () => {
    const boards = [makeState(), closeTiles(makeState(), [7, 8]), closeTiles(makeState(), [8, 9])];
    for (const state of boards) {
      expect(canUseSingleDie(state)).toBe(false);
      expect(() => applyRoll(state, [3])).toThrow(IllegalRollRequestError);
      expect(() => rollDice(state, { diceCount: 1 }, fixedRng([0.5]))).toThrow(IllegalRollRequestError);
      expect(() => rollDice(state, { forced: 3 }, fixedRng([0.5]))).toThrow(IllegalRollRequestError);
    }
  });

  it("allows one or two dice once 7, 8 and 9 are closed", () => {
    const state = closeTiles(makeState(), [7, 8, 9]);
    expect(canUseSingleDie(state)).toBe(true);

    const one = applyRoll(state, [5]);
    expect(one.roll).toEqual({ dice: [5], target: 5 });

    const two = applyRoll(state, [2, 3]);
    expect(two.roll).toEqual({ dice: [2, 3], target: 5 });
  });

  it("never allows one die when the single-die rule is off", () => {
    const state = closeTiles(makeState({ singleDieRule: false }), [7, 8, 9]);
    expect(canUseSingleDie(state)).toBe(false);
    expect(() => applyRoll(state, [4])).toThrow(IllegalRollRequestError);
    expect(() => applyRoll(state, [4])).toThrow("One-die rolls are turned off for this game.");
    expect(() => rollDice(state, { diceCount: 1 }, fixedRng([0.5]))).toThrow(
      "One-die rolls are turned off for this game."
    );
  });

  it("names the open unlock tiles as the reason while the rule is on", () => {
    expect(() => applyRoll(makeState(), [4])).toThrow("One-die roll requires tiles 7, 8 and 9 to be closed.");
  });

  it("on boards below 7 one die is allowed from the start", () => {
    expect(canUseSingleDie(makeState({ maxTile: 6 }))).toBe(true);
  });

  it("on boards above 9 only 7, 8, 9 gate the single die", () => {
    const state = closeTiles(makeState({ maxTile: 12 }), [7, 8, 9]);
    expect(canUseSingleDie(state)).toBe(true);
  });

  it("rejects a count that disagrees with the forced faces", () => {
    const state = closeTiles(makeState(), [7, 8, 9]);
    expect(() => rollDice(state, { diceCount: 2, forced: 4 }, fixedRng([0.5]))).toThrow(
      IllegalRollRequestError
    );
    expect(() => rollDice(state, { diceCount: 1, forced: [1, 2] }, fixedRng([0.5]))).toThrow(
      IllegalRollRequestError
    );
  });

  it("rejects faces outside 1..6 and non-integers", () => {
    const state = makeState();
    expect(() => applyRoll(state, [0, 3])).toThrow(IllegalRollRequestError);
    expect(() => applyRoll(state, [7, 1])).toThrow(IllegalRollRequestError);
    expect(() => applyRoll(state, [2.5, 1])).toThrow(IllegalRollRequestError);
    expect(() => applyRoll(state, [])).toThrow(IllegalRollRequestError);
    expect(() => applyRoll(state, [1, 2, 3])).toThrow(IllegalRollRequestError);
  });
});

describe("Contract: roll lifecycle", () => {
  it("stores the pending target and bumps the turn counter", () => {
    const { state, roll } = applyRoll(makeState(), [3, 4]);
    expect(roll.target).toBe(7);
    expect(state.turn.count).toBe(1);
    expect(state.turn.roll).toEqual({ status: "rolled", dice: [3, 4], target: 7 });
    expect(state.lastRoll).toEqual({ dice: [3, 4], target: 7 });
  });

  it("refuses a second roll while one is pending", () => {
    const { state } = applyRoll(makeState(), [3, 4]);
    expect(() => applyRoll(state, [1, 1])).toThrow(IllegalRollRequestError);
  });

  it("allows the next roll once the pending one is resolved", () => {
    const rolled = applyRoll(makeState(), [3, 4]).state;
    const moved = applyMove(rolled, [7]).state;
    const again = applyRoll(moved, [1, 1]);
    expect(again.state.turn.count).toBe(2);
    expect(again.roll.target).toBe(2);
  });

  it("draws two dice from the rng by default", () => {
    const rng = fixedRng([faceToFloat(2), faceToFloat(6)]);
    const { roll } = rollDice(makeState(), {}, rng);
    expect(roll).toEqual({ dice: [2, 6], target: 8 });
  });

  it("draws one die when asked and allowed", () => {
    const rng = fixedRng([faceToFloat(4)]);
    const { roll } = rollDice(stateWithOpen([1, 3, 4]), { diceCount: 1 }, rng);
    expect(roll).toEqual({ dice: [4], target: 4 });
  });

  it("forced faces override the rng", () => {
    const rng = fixedRng([faceToFloat(1)]);
    const { roll } = rollDice(makeState(), { forced: [6, 5] }, rng);
    expect(roll).toEqual({ dice: [6, 5], target: 11 });
  });

  it("refuses to roll on an ended game with GameOver", () => {
    const { state } = applyRoll(stateWithOpen([1, 2]), [4, 5]);
    expect(state.phase).toBe("ended");
    expect(() => applyRoll(state, [1, 1])).toThrow(GameOverError);
    expect(() => rollDice(state, {}, fixedRng([0.5]))).toThrow(GameOverError);
  });
});
