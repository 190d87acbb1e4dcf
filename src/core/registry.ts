import { join } from "node:path";
import type { AgentId, AgentMeta } from "../types/index.js";
import { UsageError } from "./errors.js";

/**
 * AI assistant registry: folder, install hint and CLI prompt mode per agent.
 */
export const AGENT_REGISTRY: Record<AgentId, AgentMeta> = {
  copilot: {
    id: "copilot",
    name: "GitHub Copilot",
    folder: ".github/",
    requiresCli: false,
    cli: { cmd: "copilot", promptMode: "flag", arg: "-p", extraArgs: ["--allow-all-tools"] },
    commandsSubdir: "prompts",
  },
  claude: {
    id: "claude",
    name: "Claude Code",
    folder: ".claude/",
    installUrl: "https://docs.anthropic.com/en/docs/claude-code/setup",
    requiresCli: true,
    cli: { cmd: "claude", promptMode: "flag", arg: "-p" },
  },
  gemini: {
    id: "gemini",
    name: "Gemini CLI",
    folder: ".gemini/",
    installUrl: "https://github.com/google-gemini/gemini-cli",
    requiresCli: true,
    cli: { cmd: "gemini", promptMode: "flag", arg: "-p" },
  },
  "cursor-agent": {
    id: "cursor-agent",
    name: "Cursor",
    folder: ".cursor/",
    requiresCli: false,
  },
  qwen: {
    id: "qwen",
    name: "Qwen Code",
    folder: ".qwen/",
    installUrl: "https://github.com/QwenLM/qwen-code",
    requiresCli: true,
    cli: { cmd: "qwen", promptMode: "flag", arg: "-p" },
  },
  opencode: {
    id: "opencode",
    name: "opencode",
    folder: ".opencode/",
    installUrl: "https://opencode.ai",
    requiresCli: true,
    cli: { cmd: "opencode", promptMode: "subcommand", arg: "run" },
  },
  codex: {
    id: "codex",
    name: "Codex CLI",
    folder: ".codex/",
    installUrl: "https://github.com/openai/codex",
    requiresCli: true,
    cli: { cmd: "codex", promptMode: "subcommand", arg: "exec" },
  },
  windsurf: {
    id: "windsurf",
    name: "Windsurf",
    folder: ".windsurf/",
    requiresCli: false,
  },
  kilocode: {
    id: "kilocode",
    name: "Kilo Code",
    folder: ".kilocode/",
    requiresCli: false,
  },
  auggie: {
    id: "auggie",
    name: "Auggie CLI",
    folder: ".augment/",
    installUrl: "https://docs.augmentcode.com/cli/setup-auggie/install-auggie-cli",
    requiresCli: true,
  },
  codebuddy: {
    id: "codebuddy",
    name: "CodeBuddy",
    folder: ".codebuddy/",
    installUrl: "https://www.codebuddy.ai/cli",
    requiresCli: true,
  },
  roo: {
    id: "roo",
    name: "Roo Code",
    folder: ".roo/",
    requiresCli: false,
  },
  q: {
    id: "q",
    name: "Amazon Q Developer CLI",
    folder: ".amazonq/",
    installUrl: "https://aws.amazon.com/developer/learning/q-developer-cli/",
    requiresCli: true,
  },
  amp: {
    id: "amp",
    name: "Amp",
    folder: ".agents/",
    installUrl: "https://ampcode.com/manual#install",
    requiresCli: true,
  },
  shai: {
    id: "shai",
    name: "SHAI",
    folder: ".shai/",
    installUrl: "https://github.com/ovh/shai",
    requiresCli: true,
  },
  bob: {
    id: "bob",
    name: "IBM Bob",
    folder: ".bob/",
    requiresCli: false,
  },
};

export const DEFAULT_AGENT: AgentId = "claude";

export function isKnownAgent(id: string): id is AgentId {
  return Object.prototype.hasOwnProperty.call(AGENT_REGISTRY, id);
}

export function unknownAgentError(id: string): UsageError {
  return new UsageError(
    `Unknown AI assistant: ${id}. Choose one of: ${Object.keys(AGENT_REGISTRY).join(", ")}`
  );
}

/**
 * Look up agent metadata. Returns undefined for unknown ids.
 */
export function getAgentMeta(id: string): AgentMeta | undefined {
  return isKnownAgent(id) ? AGENT_REGISTRY[id] : undefined;
}

/**
 * Active command/agent directories for an assistant, relative to the project root.
 */
export function activeDirs(
  projectRoot: string,
  id: AgentId
): { commands: string; agents: string } {
  const meta = AGENT_REGISTRY[id];
  const base = join(projectRoot, meta.folder);
  return {
    commands: join(base, meta.commandsSubdir ?? "commands"),
    agents: join(base, meta.agentsSubdir ?? "agents"),
  };
}
