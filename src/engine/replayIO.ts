import fs from "node:fs";
import path from "node:path";
import type { ReplayFile } from "./replay";
import { validateReplayFile } from "./replayValidate";

export function serializeReplay(replay: ReplayFile): string {
  return JSON.stringify(replay);
}

/**
 * Parse and structurally validate a replay. Hashes are not re-checked here;
 * see verifyReplay.
 */
export function deserializeReplay(json: string): ReplayFile {
  const replay: unknown = JSON.parse(json);
  validateReplayFile(replay);
  return replay;
}

export function writeReplayFile(filePath: string, replay: ReplayFile): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(replay, null, 2), "utf8");
}

export function readReplayFile(filePath: string): ReplayFile {
  return deserializeReplay(fs.readFileSync(filePath, "utf8"));
}
