import { runCommand, type CommandRunner } from "../core/exec.js";
import { getAgentMeta } from "../core/registry.js";
import type { AgentCli, AiResult } from "../types/index.js";

export const AI_TIMEOUT_MS = 60_000;

export interface AiClient {
  readonly agentId: string;
  /** False for the fallback client: no CLI call is made. */
  readonly available: boolean;
  analyze(prompt: string): Promise<AiResult>;
}

/**
 * Argument list for a one-shot prompt, per the agent's prompt mode.
 */
export function buildPromptArgs(cli: AgentCli, prompt: string): string[] {
  const extra = cli.extraArgs ?? [];
  switch (cli.promptMode) {
    case "positional":
      return [prompt, ...extra];
    case "flag":
    case "subcommand":
      return cli.arg ? [cli.arg, prompt, ...extra] : [prompt, ...extra];
  }
}

/**
 * Runs the agent's own CLI and returns its stdout untouched apart from
 * surrounding whitespace.
 */
export class CliAiClient implements AiClient {
  readonly available = true;

  constructor(
    readonly agentId: string,
    private readonly name: string,
    private readonly cli: AgentCli,
    private readonly installUrl: string | undefined,
    private readonly run: CommandRunner = runCommand,
    private readonly timeoutMs: number = AI_TIMEOUT_MS
  ) {}

  async analyze(prompt: string): Promise<AiResult> {
    const result = await this.run(this.cli.cmd, buildPromptArgs(this.cli, prompt), {
      timeoutMs: this.timeoutMs,
    });

    if (result.notFound) {
      const hint = this.installUrl ? ` Install from: ${this.installUrl}` : "";
      return { ok: false, error: `${this.name} CLI not found.${hint}` };
    }
    if (result.timedOut) {
      return {
        ok: false,
        error: `${this.name} CLI timed out after ${Math.round(this.timeoutMs / 1000)} seconds`,
      };
    }
    if (result.code !== 0) {
      return { ok: false, error: result.stderr.trim() || `${this.cli.cmd} exited with code ${result.code}` };
    }
    return { ok: true, text: result.stdout.trim() };
  }
}

/**
 * For agents without a scriptable CLI. The report is rule-based only.
 */
export class FallbackAiClient implements AiClient {
  readonly available = false;

  constructor(readonly agentId: string) {}

  async analyze(): Promise<AiResult> {
    return { ok: false, error: `Using rule-based analysis (no AI CLI integration for ${this.agentId})` };
  }
}

export function getAiClient(agentId: string, run: CommandRunner = runCommand): AiClient {
  const meta = getAgentMeta(agentId);
  if (!meta?.cli) {
    return new FallbackAiClient(agentId);
  }
  return new CliAiClient(agentId, meta.name, meta.cli, meta.installUrl, run);
}
