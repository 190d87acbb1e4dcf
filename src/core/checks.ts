import { execFileSync } from "node:child_process";
import { existsSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { StructureCheck, ToolPaths } from "../types/index.js";
import { getDefaultAgent, isX100Project } from "./config-store.js";
import { getAgentMeta } from "./registry.js";
import { StepTracker } from "./step-tracker.js";
import { listActive } from "./templates.js";
import type { X100Config } from "./validation.js";

export type ToolLookup = (tool: string) => boolean;

/** Looked up at the root, then under .github/. */
const COMMUNITY_FILES: Array<[string, string]> = [
  ["license", "LICENSE"],
  ["contributing", "CONTRIBUTING.md"],
  ["code_of_conduct", "CODE_OF_CONDUCT.md"],
];

/**
 * Check if a tool is installed on this system.
 */
export function isToolInstalled(tool: string): boolean {
  // `claude migrate-installer` moves the binary off PATH
  if (tool === "claude" && isFile(join(homedir(), ".claude", "local", "claude"))) {
    return true;
  }
  try {
    execFileSync(process.platform === "win32" ? "where" : "which", [tool], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

export interface CheckReport {
  tracker: StepTracker;
  tips: string[];
}

/**
 * Environment checklist: project, tools, assistants from the config, and
 * the community files a repository is expected to carry.
 */
export function runChecks(
  root: string,
  config: X100Config,
  isInstalled: ToolLookup = isToolInstalled
): CheckReport {
  const tracker = new StepTracker("Checklist");

  tracker.add("x100", "Is x100 project initialized?");
  if (isX100Project(root)) {
    tracker.complete("x100", "yes");
  } else {
    tracker.error("x100", "no - run `x100 init` to initialize the project");
  }

  const gitOk = checkTool(tracker, "git", "Git version control", "git", isInstalled);
  checkTool(tracker, "gh", "GitHub CLI", "gh", isInstalled);

  let anyAgentFound = false;
  for (const [key, entry] of Object.entries(config.agents ?? {})) {
    tracker.add(key, entry.name);
    if (!entry.requires_cli) {
      tracker.skip(key, "IDE-based, no CLI check");
      continue;
    }
    const cmd = getAgentMeta(key)?.cli?.cmd ?? key;
    if (checkTool(tracker, key, entry.name, cmd, isInstalled)) {
      anyAgentFound = true;
    }
  }

  checkTool(tracker, "code", "Visual Studio Code", "code", isInstalled);

  checkFile(tracker, "readme", "Presence of README.md", [join(root, "README.md")]);
  checkFile(tracker, "agents_md", "Presence of AGENTS.md", [join(root, "AGENTS.md")]);
  for (const [key, file] of COMMUNITY_FILES) {
    checkFile(tracker, key, `Presence of ${file}`, [join(root, file), join(root, ".github", file)]);
  }

  const tips: string[] = [];
  if (!gitOk) tips.push("Install git for repository management");
  if (!anyAgentFound) tips.push("Install an AI assistant for the best experience");

  return { tracker, tips };
}

/**
 * Required project layout: src/, docs/, README.md, AGENTS.md and a git repo.
 */
export function verifyStructure(root: string): StructureCheck[] {
  const dirs = ["src", "docs"];
  const files = ["README.md", "AGENTS.md"];
  const checks: StructureCheck[] = [];

  for (const name of dirs) {
    const path = join(root, name);
    checks.push({ name, path, ok: isDirectory(path) });
  }
  for (const name of files) {
    const path = join(root, name);
    checks.push({ name, path, ok: isFile(path) });
  }
  // .git is a file inside worktrees and submodules
  const gitPath = join(root, ".git");
  checks.push({ name: ".git", path: gitPath, ok: existsSync(gitPath) });
  return checks;
}

export interface ProjectStatusSummary {
  isX100Project: boolean;
  isGitRepo: boolean;
  defaultAgent: string;
  activeCommands: number;
  activeAgents: number;
}

export function projectStatus(paths: ToolPaths, config: X100Config): ProjectStatusSummary {
  return {
    isX100Project: isX100Project(paths.projectRoot),
    isGitRepo: existsSync(join(paths.projectRoot, ".git")),
    defaultAgent: getDefaultAgent(config),
    activeCommands: listActive(paths, "command").length,
    activeAgents: listActive(paths, "agent").length,
  };
}

function checkTool(
  tracker: StepTracker,
  key: string,
  label: string,
  cmd: string,
  isInstalled: ToolLookup
): boolean {
  tracker.add(key, label);
  const found = isInstalled(cmd);
  if (found) {
    tracker.complete(key, "available");
  } else {
    tracker.error(key, "not found");
  }
  return found;
}

function checkFile(tracker: StepTracker, key: string, label: string, candidates: string[]): boolean {
  tracker.add(key, label);
  const found = candidates.some(isFile);
  if (found) {
    tracker.complete(key, "found");
  } else {
    tracker.error(key, "not found");
  }
  return found;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}
