import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import boxen from "boxen";
import chalk from "chalk";
import { FileSystemError } from "../core/errors.js";
import { getAgentMeta } from "../core/registry.js";
import { coverageScore } from "./analyzers/docs.js";
import type { NextstepReport, ReportFormat, StepPriority } from "../types/index.js";

const PRIORITIES: StepPriority[] = ["NOW", "This Week", "Next Sprint"];

function formatNumber(n: number): string {
  return n.toLocaleString("en-US");
}

function statisticsRows(report: NextstepReport): Array<[string, string]> {
  const { code, tests, git } = report;
  const rows: Array<[string, string]> = [
    ["Files", String(code.fileCount)],
    ["Lines of Code", formatNumber(code.lineCount)],
    ["Python Files", String(code.pythonFiles)],
    ["JavaScript Files", String(code.javascriptFiles)],
    ["TODO Markers", String(code.todos.length)],
    ["FIXME Markers", String(code.fixmes.length)],
  ];
  if (tests.coveragePercentage !== null) {
    rows.push(["Test Coverage", `${tests.coveragePercentage}%`]);
  }
  rows.push(["Test Files", String(tests.testCount)]);
  rows.push(["Untested Files", String(tests.untestedFiles.length)]);
  if (git.isGitRepo && git.gitAvailable) {
    rows.push(["Commits (7d)", String(git.commitCount7d)]);
    rows.push(["Commits (30d)", String(git.commitCount30d)]);
    rows.push(["Commits/Day", String(git.commitsPerDay)]);
  }
  rows.push(["User Stories", String(report.stories.length)]);
  rows.push(["Docs Score", `${coverageScore(report.docs)}/100`]);
  return rows;
}

// --- Markdown ---

export function formatMarkdown(report: NextstepReport, verbose = false): string {
  const { healthScore: health, blockers, gaps, nextSteps } = report.recommendations;
  const out: string[] = [
    "# Project Health Analysis",
    "",
    `**Generated:** ${report.generatedAt}`,
    "",
    "## Project Health",
    "",
    `**Overall Score:** ${health.overall}/100 (${health.summary})`,
    "",
    "| Metric | Score |",
    "|--------|-------|",
    `| Velocity | ${health.velocityScore}/100 |`,
    `| Quality | ${health.qualityScore}/100 |`,
    `| Blockers | ${health.blockerScore}/100 |`,
    `| Activity | ${health.activityScore}/100 |`,
    "",
  ];

  if (verbose) {
    out.push("## Statistics", "", "| Metric | Value |", "|--------|-------|");
    for (const [label, value] of statisticsRows(report)) {
      out.push(`| ${label} | ${value} |`);
    }
    out.push("");
  }

  if (report.ai?.ok) {
    out.push("## AI Insights", "", report.ai.text, "");
  }

  if (blockers.length > 0) {
    out.push("## Blockers & Risks", "");
    for (const blocker of blockers) {
      out.push(`### ${blocker.title}`, "");
      out.push(`- **Impact:** ${blocker.impact}`);
      out.push(`- **Source:** ${blocker.source}`);
      if (blocker.details) out.push(`- **Details:** ${blocker.details}`);
      out.push("");
    }
  }

  if (gaps.length > 0) {
    out.push("## Gaps Detected", "");
    for (const gap of gaps) {
      out.push(`- **${gap.category}** (${gap.severity}): ${gap.description}`);
    }
    out.push("");
  }

  if (nextSteps.length > 0) {
    out.push("## Recommended Next Steps", "");
    for (const priority of PRIORITIES) {
      const steps = nextSteps.filter((s) => s.priority === priority);
      if (steps.length === 0) continue;
      out.push(`### ${priority}`, "");
      for (const step of steps) {
        out.push(`${step.order}. **${step.action}**`);
        out.push(`   - **Rationale:** ${step.rationale}`);
        out.push(`   - **Impact:** ${step.impact}`);
        out.push(`   - **Effort:** ${step.effort}`);
        out.push("");
      }
    }
  }

  if (report.warnings.length > 0) {
    out.push("## Warnings", "");
    for (const warning of report.warnings) out.push(`- ${warning}`);
    out.push("");
  }

  return out.join("\n");
}

// --- JSON ---

export function formatJson(report: NextstepReport, verbose = false): string {
  const { healthScore: health, blockers, gaps, nextSteps } = report.recommendations;
  const { code, tests, git } = report;

  const output: Record<string, unknown> = {
    timestamp: report.generatedAt,
    agent: report.agentId,
    health_score: {
      overall: health.overall,
      summary: health.summary,
      velocity: health.velocityScore,
      quality: health.qualityScore,
      blockers: health.blockerScore,
      activity: health.activityScore,
      trend: health.trend,
    },
    blockers: blockers.map((b) => ({
      title: b.title,
      impact: b.impact,
      source: b.source,
      details: b.details,
    })),
    gaps: gaps.map((g) => ({
      category: g.category,
      description: g.description,
      severity: g.severity,
      file: g.file ?? null,
    })),
    next_steps: nextSteps.map((s) => ({
      priority: s.priority,
      order: s.order,
      action: s.action,
      rationale: s.rationale,
      impact: s.impact,
      effort: s.effort,
    })),
    ai_insights: report.ai?.ok ? report.ai.text : null,
    warnings: report.warnings,
  };

  if (verbose) {
    output.statistics = {
      code: {
        files: code.fileCount,
        lines: code.lineCount,
        python_files: code.pythonFiles,
        javascript_files: code.javascriptFiles,
        todos: code.todos.length,
        fixmes: code.fixmes.length,
      },
      tests: {
        coverage: tests.coveragePercentage,
        test_files: tests.testCount,
        untested_files: tests.untestedFiles.length,
      },
      git:
        git.isGitRepo && git.gitAvailable
          ? {
              commits_7d: git.commitCount7d,
              commits_30d: git.commitCount30d,
              commits_per_day: git.commitsPerDay,
              contributors: git.contributors,
              last_commit: git.lastCommitDate ?? null,
            }
          : null,
      github: report.github
        ? {
            repo: report.githubRepo ?? null,
            open_issues: report.github.openIssues.length,
            blocked_issues: report.github.blockedIssues.length,
            stale_issues: report.github.staleIssues.length,
            open_prs: report.github.openPrCount,
            stale_prs: report.github.stalePrCount,
          }
        : null,
      stories: report.stories.length,
      docs: {
        readme: report.docs.hasReadme,
        license: report.docs.hasLicense,
        changelog: report.docs.hasChangelog,
        doc_files: report.docs.docFileCount,
        score: coverageScore(report.docs),
      },
    };
  }

  return JSON.stringify(output, null, 2);
}

// --- Terminal ---

function scoreColor(overall: number): { color: "green" | "cyan" | "yellow" | "red"; paint: (s: string) => string } {
  if (overall >= 80) return { color: "green", paint: chalk.green.bold };
  if (overall >= 70) return { color: "cyan", paint: chalk.cyan.bold };
  if (overall >= 60) return { color: "yellow", paint: chalk.yellow.bold };
  return { color: "red", paint: chalk.red.bold };
}

export function formatTerminal(report: NextstepReport, verbose = false): string {
  const { healthScore: health, blockers, gaps, nextSteps } = report.recommendations;
  const out: string[] = [];

  const agentName = getAgentMeta(report.agentId)?.name ?? report.agentId;
  out.push(`${chalk.dim("Analysis by:")} ${chalk.cyan(agentName)}`, "");

  if (report.ai?.ok) {
    out.push(
      boxen(report.ai.text, { padding: 1, borderColor: "cyan", borderStyle: "round", title: "AI Insights" }),
      ""
    );
  }

  const { color, paint } = scoreColor(health.overall);
  out.push(
    boxen(
      [
        `${paint(`${health.overall}/100`)} - ${health.summary}`,
        "",
        `  • Velocity: ${health.velocityScore}/100`,
        `  • Quality: ${health.qualityScore}/100`,
        `  • Blockers: ${health.blockerScore}/100`,
        `  • Activity: ${health.activityScore}/100`,
      ].join("\n"),
      { padding: 1, borderColor: color, borderStyle: "round", title: "Project Health" }
    ),
    ""
  );

  if (verbose) {
    const rows = statisticsRows(report);
    const width = Math.max(...rows.map(([label]) => label.length));
    out.push(
      boxen(rows.map(([label, value]) => `${chalk.cyan(label.padEnd(width))}  ${value}`).join("\n"), {
        padding: { left: 1, right: 1 },
        borderColor: "cyan",
        borderStyle: "round",
        title: "Detailed Statistics",
      }),
      ""
    );
  }

  if (blockers.length > 0) {
    out.push(chalk.red.bold("Blockers & Risks"), "");
    for (const blocker of blockers) {
      out.push(`  • ${chalk.red(blocker.title)}`);
      out.push(`    ${chalk.dim(`Impact: ${blocker.impact}`)}`);
      if (verbose && blocker.details) out.push(`    ${chalk.dim(blocker.details)}`);
    }
    out.push("");
  }

  if (gaps.length > 0) {
    out.push(chalk.yellow.bold("Gaps Detected"), "");
    for (const gap of gaps) {
      const paintGap = gap.severity === "high" ? chalk.red : chalk.yellow;
      out.push(`  ⚠  ${paintGap(`${gap.category}:`)} ${gap.description}`);
    }
    out.push("");
  }

  if (nextSteps.length > 0) {
    out.push(chalk.cyan.bold("Recommended Next Steps"), "");
    const paintPriority: Record<StepPriority, (s: string) => string> = {
      NOW: chalk.red.bold,
      "This Week": chalk.yellow.bold,
      "Next Sprint": chalk.cyan.bold,
    };
    for (const priority of PRIORITIES) {
      const steps = nextSteps.filter((s) => s.priority === priority);
      if (steps.length === 0) continue;
      out.push(paintPriority[priority](`${priority}:`));
      for (const step of steps) {
        out.push("", `  ${step.order}. ${chalk.cyan(step.action)}`);
        out.push(`     • Rationale: ${step.rationale}`);
        out.push(`     • Impact: ${step.impact}`);
        out.push(`     • Effort: ${step.effort}`);
      }
      out.push("");
    }
  }

  for (const warning of report.warnings) {
    out.push(chalk.yellow(`Warning: ${warning}`));
  }

  if (!report.githubRepo && !verbose) {
    out.push(chalk.dim("Tip: Run with --verbose for detailed statistics"));
    out.push(chalk.dim("Tip: Add --github-repo owner/repo --github-token $GITHUB_TOKEN for GitHub integration"));
  }

  return out.join("\n");
}

export function formatReport(report: NextstepReport, format: ReportFormat, verbose = false): string {
  switch (format) {
    case "json":
      return formatJson(report, verbose);
    case "markdown":
      return formatMarkdown(report, verbose);
    case "text":
      return formatTerminal(report, verbose);
  }
}

// --- Saving ---

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * nextstep_report_YYYYMMDD_HHMMSS.{md|json} in local time. Text reports are
 * saved as markdown.
 */
export function defaultReportPath(format: ReportFormat, now: Date = new Date(), dir = process.cwd()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const ext = format === "json" ? "json" : "md";
  return join(dir, `nextstep_report_${stamp}.${ext}`);
}

/** Content written to disk for a format: text reports become markdown. */
export function reportFileContent(report: NextstepReport, format: ReportFormat, verbose = false): string {
  return format === "json" ? formatJson(report, verbose) : formatMarkdown(report, verbose);
}

export function saveReport(content: string, outputPath: string): string {
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, content.endsWith("\n") ? content : content + "\n", "utf-8");
  } catch (err) {
    throw new FileSystemError("write", outputPath, err);
  }
  return outputPath;
}
