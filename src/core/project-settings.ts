import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import type { AgentId } from "../types/index.js";
import { getDefaultAgent, isX100Project, loadConfig, updateConfig } from "./config-store.js";
import { UsageError } from "./errors.js";
import { AGENT_REGISTRY, isKnownAgent, unknownAgentError } from "./registry.js";

export const NOT_A_PROJECT =
  "Not in an x100 project directory. Run this command from a project initialized with 'x100 init'.";

export function requireX100Project(root: string): void {
  if (!isX100Project(root)) {
    throw new UsageError(NOT_A_PROJECT);
  }
}

/**
 * Store a GitHub project URL and the project id that follows `/projects/`
 * (empty when the URL has none).
 */
export function setProjectUrl(configPath: string, url: string): { url: string; id: string } {
  if (!existsSync(configPath)) {
    throw new UsageError(NOT_A_PROJECT);
  }
  const trimmed = url.trim();
  if (!trimmed.includes("github.com/")) {
    throw new UsageError(`Unable to extract project ID from URL: ${url}`);
  }
  const marker = trimmed.indexOf("/projects/");
  const id = marker === -1 ? "" : trimmed.slice(marker + "/projects/".length).split(/[/?#]/)[0];

  updateConfig(configPath, (config) => {
    config.project = { ...config.project, url: trimmed, id };
  });
  return { url: trimmed, id };
}

export interface SwitchResult {
  previous: string;
  current: AgentId;
  changed: boolean;
  /** Whether the new assistant's folder already exists in the project. */
  folderExists: boolean;
}

export function switchDefaultAgent(configPath: string, agentId: string): SwitchResult {
  if (!existsSync(configPath)) {
    throw new UsageError(NOT_A_PROJECT);
  }
  if (!isKnownAgent(agentId)) {
    throw unknownAgentError(agentId);
  }

  const previous = getDefaultAgent(loadConfig(configPath));
  const projectRoot = dirname(dirname(configPath));
  const folderExists = existsSync(join(projectRoot, AGENT_REGISTRY[agentId].folder));

  if (previous === agentId) {
    return { previous, current: agentId, changed: false, folderExists };
  }

  updateConfig(configPath, (config) => {
    config.default_agent = agentId;
  });
  return { previous, current: agentId, changed: true, folderExists };
}
