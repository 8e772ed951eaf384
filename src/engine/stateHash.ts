import { createHash } from "node:crypto";
import type { GameState } from "../types";
import { serializeState } from "./serialization";

/**
 * Deterministic hash of GameState (SHA-256 hex of the serialized form).
 * Used for replay verification.
 */
export function hashState(state: GameState): string {
  return createHash("sha256").update(serializeState(state)).digest("hex");
}
