import { existsSync } from "node:fs";
import { join } from "node:path";
import { runCommand, type CommandRunner } from "../../core/exec.js";
import type { GitAnalysis } from "../../types/index.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface GitAnalyzerOptions {
  run?: CommandRunner;
  now?: Date;
}

function emptyAnalysis(isGitRepo: boolean, gitAvailable: boolean): GitAnalysis {
  return {
    isGitRepo,
    gitAvailable,
    commitCount7d: 0,
    commitCount30d: 0,
    activeBranches: 0,
    contributors: 0,
    activeContributors30d: 0,
    commitsPerDay: 0,
  };
}

/** YYYY-MM-DD, `days` before `now`. */
export function sinceDate(now: Date, days: number): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString().slice(0, 10);
}

function nonEmptyLines(output: string): string[] {
  return output.split("\n").map((l) => l.trim()).filter(Boolean);
}

function toInt(output: string): number {
  const n = Number.parseInt(output, 10);
  return Number.isNaN(n) ? 0 : n;
}

/**
 * Commit activity from the local git history. Each failed git call counts
 * as empty output; a missing git binary yields zeros.
 */
export async function analyzeGit(root: string, options: GitAnalyzerOptions = {}): Promise<GitAnalysis> {
  if (!existsSync(join(root, ".git"))) {
    return emptyAnalysis(false, true);
  }

  const run = options.run ?? runCommand;
  const now = options.now ?? new Date();
  let gitMissing = false;

  const git = async (args: string[]): Promise<string> => {
    const result = await run("git", args, { cwd: root });
    if (result.notFound) {
      gitMissing = true;
      return "";
    }
    return result.code === 0 ? result.stdout.trim() : "";
  };

  const count7d = toInt(await git(["rev-list", "--count", `--since=${sinceDate(now, 7)}`, "HEAD"]));
  if (gitMissing) {
    return emptyAnalysis(true, false);
  }
  const count30d = toInt(await git(["rev-list", "--count", `--since=${sinceDate(now, 30)}`, "HEAD"]));
  const branches = nonEmptyLines(await git(["branch", "-a"])).length;
  const contributors = nonEmptyLines(await git(["shortlog", "-s", "-n", "HEAD"])).length;
  const emails = new Set(
    nonEmptyLines(await git(["log", `--since=${sinceDate(now, 30)}`, "--format=%aE"])).map((e) =>
      e.toLowerCase()
    )
  );

  const timestamp = toInt(await git(["log", "-1", "--format=%ct"]));
  const message = await git(["log", "-1", "--format=%s"]);

  return {
    isGitRepo: true,
    gitAvailable: true,
    commitCount7d: count7d,
    commitCount30d: count30d,
    activeBranches: branches,
    contributors,
    activeContributors30d: emails.size,
    commitsPerDay: Math.round((count7d / 7) * 10) / 10,
    lastCommitDate: timestamp > 0 ? new Date(timestamp * 1000).toISOString() : undefined,
    lastCommitMessage: message || undefined,
  };
}
