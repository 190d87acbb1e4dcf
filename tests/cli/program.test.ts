import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createProgram } from "../../src/cli/program.js";
import { setVerbose } from "../../src/cli/utils.js";
import { writeTree } from "../nextstep/helpers.js";

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super(`process.exit(${code})`);
  }
}

describe("x100 program", () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];

  async function run(args: string[]): Promise<void> {
    await createProgram().parseAsync(args, { from: "user" });
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "x100-cli-"));
    writeTree(root, {
      ".x100/config.json": JSON.stringify({ default_agent: "claude" }),
      "src/app.py": "print('hi')\n",
      "README.md": "# Demo\n",
    });
    stdout = [];
    stderr = [];
    vi.spyOn(process, "cwd").mockReturnValue(root);
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    });
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new ExitSignal(Number(code ?? 0));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setVerbose(false);
    rmSync(root, { recursive: true, force: true });
  });

  describe("nextstep", () => {
    it("should add statistics for --verbose after the command name", async () => {
      await run(["nextstep", "--verbose", "--no-ai", "-f", "json"]);

      const report = JSON.parse(stdout.join("\n"));
      expect(report.statistics.code.files).toBe(1);
      expect(report.statistics.docs.readme).toBe(true);
    });

    it("should honour --verbose given before the command name", async () => {
      await run(["--verbose", "nextstep", "--no-ai", "-f", "json"]);

      expect(JSON.parse(stdout.join("\n")).statistics.code.python_files).toBe(1);
    });

    it("should keep json output parseable while debug lines go to stderr", async () => {
      await run(["nextstep", "-v", "--no-ai", "-f", "json"]);

      expect(stdout).toHaveLength(1);
      expect(JSON.parse(stdout[0]).health_score.overall).toBeGreaterThan(0);
      expect(stderr.some((line) => line.includes("[debug]"))).toBe(true);
    });

    it("should leave statistics out without --verbose", async () => {
      await run(["nextstep", "--no-ai", "-f", "json"]);

      expect(JSON.parse(stdout.join("\n")).statistics).toBeUndefined();
    });

    it("should reject an unknown assistant with exit code 1", async () => {
      await expect(run(["nextstep", "--ai", "claud", "-f", "json"])).rejects.toMatchObject({ code: 1 });

      expect(stdout).toEqual([]);
      expect(stderr.some((line) => line.includes("Unknown AI assistant: claud."))).toBe(true);
    });

    it("should reject an unknown format with exit code 1", async () => {
      await expect(run(["nextstep", "--no-ai", "-f", "yaml"])).rejects.toMatchObject({ code: 1 });
      expect(stderr.some((line) => line.includes('Invalid format "yaml"'))).toBe(true);
    });
  });

  describe("command enable / disable", () => {
    const active = () => join(root, ".claude", "commands", "start.md");

    it("should copy a command into the assistant folder", async () => {
      await run(["command", "enable", "start"]);

      expect(existsSync(active())).toBe(true);
      expect(readFileSync(active(), "utf-8")).toContain("description:");
      expect(process.exit).not.toHaveBeenCalled();
    });

    it("should exit 1 for a command missing from the pool", async () => {
      await expect(run(["command", "enable", "nope"])).rejects.toMatchObject({ code: 1 });
      expect(stderr.some((line) => line.includes("Command not found: nope"))).toBe(true);
    });

    it("should remove an active command with --yes", async () => {
      await run(["command", "enable", "start"]);
      await run(["command", "disable", "start", "--yes"]);

      expect(existsSync(active())).toBe(false);
      expect(process.exit).not.toHaveBeenCalled();
    });

    it("should treat disabling an inactive command as a no-op", async () => {
      await run(["command", "disable", "start", "--yes"]);

      expect(process.exit).not.toHaveBeenCalled();
      expect(stdout.some((line) => line.includes("start") && line.includes("is not active"))).toBe(true);
    });
  });

  it("should summarize init with the configured default assistant", async () => {
    writeTree(root, { ".x100/config.json": JSON.stringify({ default_agent: "gemini" }) });

    await run(["init", root, "--no-git"]);

    expect(stdout.some((line) => line.includes("Gemini CLI (gemini)"))).toBe(true);
    expect(JSON.parse(readFileSync(join(root, ".x100", "config.json"), "utf-8")).default_agent).toBe("gemini");
  });
});
