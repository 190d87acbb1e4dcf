import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CommandRunner } from "../../src/core/exec.js";
import { ConfigError, UsageError } from "../../src/core/errors.js";
import type { FetchFn } from "../../src/nextstep/github.js";
import { runNextstep } from "../../src/nextstep/index.js";
import { commandResult, writeTree } from "./helpers.js";

const NOW = new Date("2024-03-15T12:00:00Z");

describe("runNextstep", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "x100-pipeline-"));
    writeTree(root, {
      ".x100/config.json": JSON.stringify({ default_agent: "gemini" }),
      "src/app.py": "def main():\n    # TODO: wire config\n    pass\n",
      "tests/test_app.py": "def test_main():\n    pass\n",
      "README.md": "# Demo\n",
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should complete with local metrics when GitHub has no token", async () => {
    const fetch: Mock<FetchFn> = vi.fn<FetchFn>();
    const steps: string[] = [];

    const report = await runNextstep(
      root,
      { githubRepo: "acme/widgets", useAi: false, env: {}, fetch, now: NOW },
      { onStepStart: (label) => steps.push(label) }
    );

    expect(report.generatedAt).toBe("2024-03-15T12:00:00.000Z");
    expect(report.agentId).toBe("gemini");
    expect(report.code.pythonFiles).toBe(2);
    expect(report.code.todos).toHaveLength(1);
    expect(report.git.isGitRepo).toBe(false);
    expect(report.docs.hasReadme).toBe(true);
    expect(report.github).toBeNull();
    expect(report.githubRepo).toBe("acme/widgets");
    expect(report.ai).toBeNull();
    expect(report.warnings).toEqual([
      "GitHub token not found (set GITHUB_TOKEN or GH_TOKEN, or pass --github-token)",
    ]);
    expect(fetch).not.toHaveBeenCalled();
    expect(steps).toEqual([
      "Analyzing codebase",
      "Analyzing git history",
      "Analyzing tests",
      "Analyzing user stories",
      "Analyzing documentation",
    ]);
  });

  it("should turn GitHub failures into warnings", async () => {
    const fetch: FetchFn = async () => new Response("boom", { status: 500, statusText: "Server Error" });

    const report = await runNextstep(root, {
      githubRepo: "acme/widgets",
      githubToken: "test-secret",
      useAi: false,
      env: {},
      fetch,
      now: NOW,
    });

    expect(report.github).toBeNull();
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatch(/^GitHub integration failed: /);
    expect(report.recommendations.healthScore.overall).toBeGreaterThan(0);
  });

  it("should warn when the AI CLI is missing", async () => {
    const run: Mock<CommandRunner> = vi.fn<CommandRunner>(async () => commandResult({ code: -1, notFound: true }));

    const report = await runNextstep(root, { ai: "claude", run, env: {}, now: NOW });

    expect(report.ai).toEqual({ ok: false, error: expect.stringMatching(/^Claude Code CLI not found\./) });
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toMatch(/^AI analysis failed: Claude Code CLI not found\./);
    expect(run).toHaveBeenCalledWith("claude", ["-p", report.prompt], expect.objectContaining({ timeoutMs: 60_000 }));
  });

  it("should pass AI output through to the report", async () => {
    const run: CommandRunner = async () => commandResult({ stdout: "Add integration tests.\n" });

    const report = await runNextstep(root, { run, env: {}, now: NOW });

    expect(report.ai).toEqual({ ok: true, text: "Add integration tests." });
    expect(report.warnings).toEqual([]);
  });

  it("should log rather than warn for agents without a CLI", async () => {
    const debug = vi.fn<(message: string) => void>();

    const report = await runNextstep(root, { ai: "windsurf", env: {}, now: NOW }, { debug });

    expect(report.warnings).toEqual([]);
    expect(debug).toHaveBeenCalledWith("Using rule-based analysis (no AI CLI integration for windsurf)");
  });

  it("should reject an unknown assistant before analyzing anything", async () => {
    const steps: string[] = [];
    const run = vi.fn<CommandRunner>();

    const attempt = runNextstep(
      root,
      { ai: "claud", run, env: {}, now: NOW },
      { onStepStart: (label) => steps.push(label) }
    );

    await expect(attempt).rejects.toThrow(UsageError);
    await expect(attempt).rejects.toThrow(/^Unknown AI assistant: claud\. Choose one of: /);
    expect(steps).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });

  it("should abort on a broken nextstep.json", async () => {
    writeTree(root, { ".x100/nextstep.json": "{ nope" });
    await expect(runNextstep(root, { useAi: false, env: {}, now: NOW })).rejects.toThrow(ConfigError);
  });

  it("should fall back to the default agent when config.json is broken", async () => {
    writeTree(root, { ".x100/config.json": "[]" });

    const report = await runNextstep(root, { useAi: false, env: {}, now: NOW });

    expect(report.agentId).toBe("claude");
    expect(report.warnings[0]).toMatch(/^Could not read project config, using claude: Config must be a JSON object/);
  });
});
