import { describe, it, expect, vi, type Mock } from "vitest";
import type { CommandRunner } from "../../src/core/exec.js";
import {
  AI_TIMEOUT_MS,
  buildPromptArgs,
  CliAiClient,
  FallbackAiClient,
  getAiClient,
} from "../../src/nextstep/ai-client.js";
import { commandResult } from "./helpers.js";

describe("buildPromptArgs", () => {
  it("should place the prompt after the flag and before extra args", () => {
    expect(buildPromptArgs({ cmd: "copilot", promptMode: "flag", arg: "-p", extraArgs: ["--allow-all-tools"] }, "hi")).toEqual([
      "-p",
      "hi",
      "--allow-all-tools",
    ]);
  });

  it("should handle subcommand and positional modes", () => {
    expect(buildPromptArgs({ cmd: "codex", promptMode: "subcommand", arg: "exec" }, "hi")).toEqual(["exec", "hi"]);
    expect(buildPromptArgs({ cmd: "tool", promptMode: "positional" }, "hi")).toEqual(["hi"]);
  });
});

describe("CliAiClient", () => {
  function client(run: CommandRunner): CliAiClient {
    return new CliAiClient("claude", "Claude Code", { cmd: "claude", promptMode: "flag", arg: "-p" }, "https://example.com/install", run);
  }

  it("should return trimmed stdout on success", async () => {
    const run: Mock<CommandRunner> = vi.fn<CommandRunner>(async () => commandResult({ stdout: "\n  Focus on tests.  \n" }));

    expect(await client(run).analyze("prompt")).toEqual({ ok: true, text: "Focus on tests." });
    expect(run).toHaveBeenCalledWith("claude", ["-p", "prompt"], { timeoutMs: AI_TIMEOUT_MS });
  });

  it("should point to the install page when the CLI is missing", async () => {
    const result = await client(async () => commandResult({ code: -1, notFound: true })).analyze("prompt");
    expect(result).toEqual({ ok: false, error: "Claude Code CLI not found. Install from: https://example.com/install" });
  });

  it("should report timeouts in seconds", async () => {
    const result = await client(async () => commandResult({ code: -1, timedOut: true })).analyze("prompt");
    expect(result).toEqual({ ok: false, error: "Claude Code CLI timed out after 60 seconds" });
  });

  it("should prefer stderr for non-zero exits", async () => {
    expect(await client(async () => commandResult({ code: 2, stderr: "rate limited\n" })).analyze("p")).toEqual({
      ok: false,
      error: "rate limited",
    });
    expect(await client(async () => commandResult({ code: 2 })).analyze("p")).toEqual({
      ok: false,
      error: "claude exited with code 2",
    });
  });
});

describe("getAiClient", () => {
  it("should use the fallback for agents without a CLI", async () => {
    const run = vi.fn<CommandRunner>();
    const ai = getAiClient("windsurf", run);

    expect(ai).toBeInstanceOf(FallbackAiClient);
    expect(ai.available).toBe(false);
    expect(await ai.analyze("prompt")).toEqual({
      ok: false,
      error: "Using rule-based analysis (no AI CLI integration for windsurf)",
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("should build a CLI client for known CLIs", () => {
    const ai = getAiClient("gemini");
    expect(ai).toBeInstanceOf(CliAiClient);
    expect(ai.agentId).toBe("gemini");
  });
});
