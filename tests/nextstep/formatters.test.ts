import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import {
  defaultReportPath,
  formatJson,
  formatMarkdown,
  formatReport,
  formatTerminal,
  reportFileContent,
  saveReport,
} from "../../src/nextstep/formatters.js";
import { sampleReport } from "./fixtures.js";

describe("formatMarkdown", () => {
  it("should render the health table and next steps", () => {
    const lines = formatMarkdown(sampleReport()).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "# Project Health Analysis",
      "",
      "**Generated:** 2024-03-15T12:00:00.000Z",
      "",
      "## Project Health",
    ]);
    expect(lines).toContain("**Overall Score:** 100/100 (Excellent)");
    expect(lines).toContain("| Quality | 100/100 |");
    expect(lines).toContain("### Next Sprint");
    expect(lines).toContain("1. **Continue current trajectory**");
    expect(lines).not.toContain("## Blockers & Risks");
    expect(lines).not.toContain("## Statistics");
  });

  it("should add statistics when verbose", () => {
    const lines = formatMarkdown(sampleReport(), true).split("\n");

    expect(lines).toContain("| Lines of Code | 1,500 |");
    expect(lines).toContain("| Test Coverage | 85% |");
    expect(lines).toContain("| Commits (7d) | 14 |");
    expect(lines).toContain("| Docs Score | 100/100 |");
  });

  it("should include AI insights and warnings", () => {
    const markdown = formatMarkdown(
      sampleReport({ ai: { ok: true, text: "Ship the search feature." }, warnings: ["GitHub token not found"] })
    );

    expect(markdown).toContain("## AI Insights\n\nShip the search feature.\n");
    expect(markdown).toContain("## Warnings\n\n- GitHub token not found\n");
  });
});

describe("formatJson", () => {
  it("should emit scores, steps and the agent", () => {
    const data = JSON.parse(formatJson(sampleReport()));

    expect(data.timestamp).toBe("2024-03-15T12:00:00.000Z");
    expect(data.agent).toBe("claude");
    expect(data.health_score).toEqual({
      overall: 100,
      summary: "Excellent",
      velocity: 100,
      quality: 100,
      blockers: 100,
      activity: 100,
      trend: "improving",
    });
    expect(data.next_steps[0].action).toBe("Continue current trajectory");
    expect(data.ai_insights).toBeNull();
    expect(data.statistics).toBeUndefined();
  });

  it("should add statistics when verbose", () => {
    const data = JSON.parse(formatJson(sampleReport(), true));

    expect(data.statistics.code.lines).toBe(1500);
    expect(data.statistics.tests.coverage).toBe(85);
    expect(data.statistics.git.commits_7d).toBe(14);
    expect(data.statistics.github).toBeNull();
    expect(data.statistics.docs.score).toBe(100);
  });
});

describe("formatTerminal", () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it("should name the agent and list steps by priority", () => {
    const lines = formatTerminal(sampleReport()).split("\n");

    expect(lines[0]).toBe("Analysis by: Claude Code");
    expect(lines).toContain("Next Sprint:");
    expect(lines).toContain("  1. Continue current trajectory");
    expect(lines).toContain("     • Effort: Ongoing");
  });

  it("should print warnings and the GitHub tip", () => {
    const lines = formatTerminal(sampleReport({ warnings: ["git is not installed"] })).split("\n");

    expect(lines).toContain("Warning: git is not installed");
    expect(lines[lines.length - 1]).toBe(
      "Tip: Add --github-repo owner/repo --github-token $GITHUB_TOKEN for GitHub integration"
    );
  });

  it("should fall back to the agent id for unknown agents", () => {
    expect(formatReport(sampleReport({ agentId: "custom" }), "text").split("\n")[0]).toBe("Analysis by: custom");
  });
});

describe("saving reports", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "x100-report-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should name reports by local timestamp and format", () => {
    const now = new Date(2024, 2, 5, 9, 7, 3);
    expect(defaultReportPath("text", now, dir)).toBe(join(dir, "nextstep_report_20240305_090703.md"));
    expect(defaultReportPath("json", now, dir)).toBe(join(dir, "nextstep_report_20240305_090703.json"));
  });

  it("should save text reports as markdown", () => {
    const report = sampleReport();
    const path = saveReport(reportFileContent(report, "text"), join(dir, "out", "report.md"));

    expect(readFileSync(path, "utf-8")).toBe(formatMarkdown(report) + "\n");
  });
});
