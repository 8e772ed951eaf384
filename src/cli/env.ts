// src/cli/env.ts
//
// Environment configuration (all optional):
// - STB_MAX_TILE: highest tile, default 9
// - STB_SEED: integer seed; unset means random
// - STB_SINGLE_DIE_RULE: "true" | "false", default true
// - STB_VALIDATE_STATE: "0" turns off engine shape checks (read by the engine)

export function envFlag(name: string, defaultValue = false, env: NodeJS.ProcessEnv = process.env): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(name: string, defaultValue: number, env: NodeJS.ProcessEnv = process.env): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

export type CliConfig = {
  maxTile: number;
  seed?: number;
  singleDieRule: boolean;
};

export function readConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const seedRaw = env.STB_SEED;
  const seed = seedRaw != null && seedRaw.trim() !== "" && Number.isInteger(Number(seedRaw)) ? Number(seedRaw) : undefined;

  return {
    maxTile: envInt("STB_MAX_TILE", 9, env),
    seed,
    singleDieRule: envFlag("STB_SINGLE_DIE_RULE", true, env),
  };
}
