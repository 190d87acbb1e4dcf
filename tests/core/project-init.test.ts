import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig } from "../../src/core/config-store.js";
import type { CommandResult, CommandRunner } from "../../src/core/exec.js";
import { resolveToolPaths } from "../../src/core/paths.js";
import { initProject, slugify } from "../../src/core/project-init.js";
import type { ToolPaths } from "../../src/types/index.js";

function result(partial: Partial<CommandResult> = {}): CommandResult {
  return { code: 0, stdout: "", stderr: "", notFound: false, timedOut: false, ...partial };
}

describe("initProject", () => {
  let root: string;
  let paths: ToolPaths;
  let run: Mock<CommandRunner>;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "x100-init-test-"));
    const resources = join(root, "pool");
    paths = resolveToolPaths(join(root, "My App"), "claude", resources);
    mkdirSync(paths.templatesDir, { recursive: true });
    writeFileSync(join(paths.templatesDir, "README.example.md"), "# Project Name\n");
    run = vi.fn<CommandRunner>(async () => result());
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should create the skeleton, run git init and save the config", async () => {
    const project = paths.projectRoot;
    const { steps, config } = await initProject(paths, {}, run);

    expect(steps).toEqual([
      { target: join(project, "src"), status: "created" },
      { target: join(project, "docs"), status: "created" },
      { target: join(project, "tests"), status: "created" },
      { target: join(project, "scripts"), status: "created" },
      { target: join(project, "README.md"), status: "created" },
      {
        target: join(project, "AGENTS.md"),
        status: "missing-template",
        detail: join(paths.templatesDir, "AGENTS.example.md"),
      },
      { target: join(project, ".git"), status: "initialized" },
      { target: paths.configPath, status: "saved" },
    ]);
    expect(run).toHaveBeenCalledWith("git", ["init", resolve(project)]);
    expect(readFileSync(join(project, "README.md"), "utf-8")).toBe("# Project Name\n");

    expect(config.project_name).toBe("My App");
    expect(config.project_code).toBe("my-app");
    expect(config.default_agent).toBe("claude");
    expect(config.agents?.claude).toEqual({ name: "Claude Code", enabled: true, requires_cli: true });
    expect(config.agents?.copilot).toEqual({ name: "GitHub Copilot", enabled: false, requires_cli: false });
    expect(loadConfig(paths.configPath)).toEqual(config);
  });

  it("should leave existing files alone and keep extra config keys", async () => {
    const project = paths.projectRoot;
    mkdirSync(join(project, "src"), { recursive: true });
    writeFileSync(join(project, "README.md"), "mine\n");
    mkdirSync(join(project, ".x100"), { recursive: true });
    writeFileSync(paths.configPath, JSON.stringify({ project_name: "Kept", custom: 1 }));

    const { steps, config } = await initProject(paths, { ai: "gemini", noGit: true }, run);

    expect(steps[0]).toEqual({ target: join(project, "src"), status: "exists" });
    expect(steps[4]).toEqual({ target: join(project, "README.md"), status: "exists" });
    expect(steps[6]).toEqual({ target: join(project, ".git"), status: "skipped" });
    expect(run).not.toHaveBeenCalled();
    expect(readFileSync(join(project, "README.md"), "utf-8")).toBe("mine\n");
    expect(config).toMatchObject({ project_name: "Kept", project_code: "kept", default_agent: "gemini", custom: 1 });
  });

  it("should report a missing git binary with a remediation message", async () => {
    run.mockResolvedValue(result({ code: 1, notFound: true }));
    const { steps } = await initProject(paths, {}, run);
    expect(steps[6]).toEqual({
      target: join(paths.projectRoot, ".git"),
      status: "failed",
      detail: "'git' command not found on PATH. Install it from https://git-scm.com/downloads",
    });
  });

  it("should report a failing git init", async () => {
    run.mockResolvedValue(result({ code: 128, stderr: "fatal: cannot mkdir\n" }));
    const { steps } = await initProject(paths, {}, run);
    expect(steps[6].detail).toBe("git init failed: fatal: cannot mkdir");
  });

  it("should reject an unknown assistant before touching the disk", async () => {
    await expect(initProject(paths, { ai: "nope" }, run)).rejects.toThrow(/^Unknown AI assistant: nope\./);
    expect(existsSync(paths.projectRoot)).toBe(false);
  });

  it("should reject an invalid project code before touching the disk", async () => {
    await expect(initProject(paths, { code: "bad code!" }, run)).rejects.toThrow(
      'Invalid project code "bad code!": use letters, digits, - or _'
    );
    expect(existsSync(paths.projectRoot)).toBe(false);
  });
});

describe("slugify", () => {
  it("should lowercase and hyphenate whitespace", () => {
    expect(slugify("  My  Cool App ")).toBe("my-cool-app");
  });
});
