// src/ui/textClient.ts
//
// Readline front end for one interactive game.

import readline from "node:readline";
import type { GameSession } from "../engine/session";
import { formatState } from "./format";
import { HELP_TEXT, handleCommand } from "./handleCommand";

export function startTextClient(
  game: GameSession,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const rl = readline.createInterface({ input, output });

  const print = (text: string) => {
    if (text) output.write(text + "\n");
  };

  print(HELP_TEXT);
  print(formatState(game.snapshot()));
  rl.setPrompt("> ");
  rl.prompt();

  return new Promise<void>((resolve, reject) => {
    rl.on("line", (line) => {
      try {
        const res = handleCommand(game, line);
        print(res.output);
        if (res.quit || game.snapshot().isTerminal) {
          rl.close();
          return;
        }
        rl.prompt();
      } catch (err) {
        rl.close();
        reject(err);
      }
    });

    rl.on("close", () => resolve());
  });
}
