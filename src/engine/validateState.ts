import type { GameState } from "../types";
import { combosThatSum } from "./legalMoves";
import { isDieFace } from "./rulesConstants";

/**
 * validateState (shape-only)
 *
 * Catches structural drift after each transition: missing fields, tiles out of
 * order, bad dice, a pending roll on an ended game. Beyond shape, it rejects
 * states no transition can reach: an active game with every tile closed, a
 * pending target no open subset makes, a stuck outcome with a legal move.
 *
 * Disabled with STB_VALIDATE_STATE=0 unless `force` is set.
 */
export function validateState(
  state: GameState,
  where = "unknown",
  opts: { force?: boolean } = {}
): void {
  if (!opts.force && process.env.STB_VALIDATE_STATE === "0") return;

  assert(state, "state missing", where);

  // ---------------------------
  // Core shape
  // ---------------------------

  assert(typeof state.gameId === "string" && state.gameId.length > 0, "gameId missing", where);
  assert(state.phase === "active" || state.phase === "ended", "phase invalid", where);

  assert(state.config, "config missing", where);
  const maxTile = state.config.maxTile;
  assert(Number.isInteger(maxTile) && maxTile >= 1, "config.maxTile invalid", where);
  assert(state.config.options, "config.options missing", where);
  assert(typeof state.config.options.singleDieRule === "boolean", "config.options.singleDieRule invalid", where);

  // ---------------------------
  // Tiles
  // ---------------------------

  assert(Array.isArray(state.tiles), "tiles not array", where);
  assert(state.tiles.length === maxTile, `tiles must have ${maxTile} entries`, where);
  state.tiles.forEach((tile, i) => {
    assert(tile && typeof tile === "object", `tile ${i} missing`, where);
    assert(tile.value === i + 1, `tile ${i} value must be ${i + 1}`, where);
    assert(typeof tile.isOpen === "boolean", `tile ${tile.value} isOpen invalid`, where);
  });

  // ---------------------------
  // Turn
  // ---------------------------

  assert(state.turn, "turn missing", where);
  assert(Number.isInteger(state.turn.count) && state.turn.count >= 0, "turn.count invalid", where);

  const open = state.tiles.filter((t) => t.isOpen).map((t) => t.value);
  if (state.phase === "active") {
    assert(open.length > 0, "active game with every tile closed", where);
  }

  const roll = state.turn.roll;
  assert(roll, "turn.roll missing", where);
  if (roll.status === "rolled") {
    assertRoll(roll.dice, roll.target, "turn.roll", where);
    assert(state.phase === "active", "pending roll on ended game", where);
    assert(combosThatSum(open, roll.target).length > 0, `pending target ${roll.target} has no legal move`, where);
  } else {
    assert(roll.status === "idle", "turn.roll.status invalid", where);
  }

  if (state.lastRoll !== undefined) {
    assertRoll(state.lastRoll.dice, state.lastRoll.target, "lastRoll", where);
  }

  // ---------------------------
  // Outcome
  // ---------------------------

  if (state.phase === "ended") {
    assert(state.outcome, "ended game without outcome", where);
  }

  if (state.outcome) {
    assert(state.phase === "ended", "outcome on active game", where);
    const score = open.reduce((sum, v) => sum + v, 0);
    if (state.outcome.kind === "shut") {
      assert(open.length === 0 && state.outcome.score === 0, "shut outcome with open tiles", where);
    } else if (state.outcome.kind === "stuck") {
      assert(open.length > 0, "stuck outcome with every tile closed", where);
      assert(state.outcome.score === score, "stuck outcome score mismatch", where);
      assert(Number.isInteger(state.outcome.target), "stuck outcome target invalid", where);
      assert(combosThatSum(open, state.outcome.target).length === 0, "stuck outcome target has a legal move", where);
    } else {
      assert(false, "outcome.kind invalid", where);
    }
  }
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[validateState @ ${where}] ${message}`);
}

function assertRoll(dice: readonly unknown[], target: unknown, label: string, where: string) {
  assert(Array.isArray(dice), `${label}.dice not array`, where);
  assert(dice.length === 1 || dice.length === 2, `${label}.dice must hold 1 or 2 dice`, where);
  let sum = 0;
  for (const d of dice) {
    assert(isDieFace(d), `${label}.dice invalid die: ${String(d)}`, where);
    sum += d;
  }
  assert(target === sum, `${label}.target must equal dice sum`, where);
}
