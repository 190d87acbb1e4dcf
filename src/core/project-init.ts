import { copyFileSync, existsSync, mkdirSync, statSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import type { AgentId, InitOptions, InitStep, ToolPaths } from "../types/index.js";
import { loadConfig, saveConfig } from "./config-store.js";
import { FileSystemError, UsageError } from "./errors.js";
import { runCommand, type CommandRunner } from "./exec.js";
import { AGENT_REGISTRY, DEFAULT_AGENT, isKnownAgent, unknownAgentError } from "./registry.js";
import type { X100Config } from "./validation.js";

export const PROJECT_DIRS = ["src", "docs", "tests", "scripts"];
const PROJECT_CODE_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface InitResult {
  steps: InitStep[];
  config: X100Config;
}

export function slugify(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "-");
}

/**
 * Lay down the project skeleton and write .x100/config.json, merged over
 * whatever config already exists.
 */
export async function initProject(
  paths: ToolPaths,
  options: InitOptions = {},
  run: CommandRunner = runCommand
): Promise<InitResult> {
  const root = paths.projectRoot;
  const agentId = resolveInitAgent(options.ai);
  // Validate names before touching the filesystem.
  const config = buildConfig(loadConfig(paths.configPath), root, agentId, options);
  const steps: InitStep[] = [];

  for (const dir of PROJECT_DIRS) {
    const target = join(root, dir);
    if (existsSync(target) && statSync(target).isDirectory()) {
      steps.push({ target, status: "exists" });
      continue;
    }
    try {
      mkdirSync(target, { recursive: true });
    } catch (err) {
      throw new FileSystemError("create", target, err);
    }
    steps.push({ target, status: "created" });
  }

  steps.push(copyTemplate(paths, "README.example.md", "README.md"));
  steps.push(copyTemplate(paths, "AGENTS.example.md", "AGENTS.md"));
  steps.push(await initGit(root, options.noGit === true, run));

  saveConfig(paths.configPath, config);
  steps.push({ target: paths.configPath, status: "saved" });

  return { steps, config };
}

function resolveInitAgent(ai: string | undefined): AgentId {
  if (ai === undefined) {
    return DEFAULT_AGENT;
  }
  if (!isKnownAgent(ai)) {
    throw unknownAgentError(ai);
  }
  return ai;
}

function copyTemplate(paths: ToolPaths, templateName: string, fileName: string): InitStep {
  const target = join(paths.projectRoot, fileName);
  if (existsSync(target)) {
    return { target, status: "exists" };
  }
  const src = join(paths.templatesDir, templateName);
  if (!existsSync(src)) {
    return { target, status: "missing-template", detail: src };
  }
  try {
    copyFileSync(src, target);
  } catch (err) {
    throw new FileSystemError("copy to", target, err);
  }
  return { target, status: "created" };
}

async function initGit(root: string, skip: boolean, run: CommandRunner): Promise<InitStep> {
  const target = join(root, ".git");
  if (existsSync(target)) {
    return { target, status: "exists" };
  }
  if (skip) {
    return { target, status: "skipped" };
  }

  const result = await run("git", ["init", resolve(root)]);
  if (result.notFound) {
    return {
      target,
      status: "failed",
      detail: "'git' command not found on PATH. Install it from https://git-scm.com/downloads",
    };
  }
  if (result.code !== 0) {
    return { target, status: "failed", detail: `git init failed: ${result.stderr.trim()}` };
  }
  return { target, status: "initialized" };
}

function buildConfig(
  existing: X100Config,
  root: string,
  agentId: AgentId,
  options: InitOptions
): X100Config {
  const projectName = options.name ?? existing.project_name ?? basename(resolve(root));
  const projectCode = options.code ?? existing.project_code ?? slugify(projectName);
  if (!PROJECT_CODE_PATTERN.test(projectCode)) {
    throw new UsageError(
      `Invalid project code "${projectCode}": use letters, digits, - or _`
    );
  }

  const defaultAgent = options.ai ?? existing.default_agent ?? agentId;

  const agents: NonNullable<X100Config["agents"]> = {};
  for (const meta of Object.values(AGENT_REGISTRY)) {
    agents[meta.id] = {
      name: meta.name,
      enabled: meta.id === defaultAgent,
      requires_cli: meta.requiresCli,
    };
  }

  return {
    ...existing,
    project_name: projectName,
    project_code: projectCode,
    default_agent: defaultAgent,
    backend: existing.backend ?? null,
    frontend: existing.frontend ?? null,
    agents,
  };
}
