// src/engine/rulesConstants.ts

import type { DieFace } from "../types";

export function isDieFace(n: unknown): n is DieFace {
  return typeof n === "number" && Number.isInteger(n) && n >= 1 && n <= 6;
}
