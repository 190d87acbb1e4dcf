import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { CommandResult, CommandRunner } from "../../src/core/exec.js";

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const path = join(root, rel);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}

export function commandResult(partial: Partial<CommandResult> = {}): CommandResult {
  return { code: 0, stdout: "", stderr: "", notFound: false, timedOut: false, ...partial };
}

/**
 * Fake runner answering `git` calls by their joined arguments. Unknown calls
 * exit 128 like git does outside a repository.
 */
export function fakeGit(responses: Record<string, string>): CommandRunner {
  return async (cmd, args) => {
    const key = args.join(" ");
    if (cmd === "git" && key in responses) {
      return commandResult({ stdout: responses[key] });
    }
    return commandResult({ code: 128, stderr: `unexpected: ${cmd} ${key}` });
  };
}
