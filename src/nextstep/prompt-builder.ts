import { basename } from "node:path";
import type {
  CodeAnalysis,
  DocumentationStatus,
  GitAnalysis,
  ProjectStatus,
  TestAnalysis,
  UserStoryStatus,
} from "../types/index.js";
import { coverageScore } from "./analyzers/docs.js";
import { isHighRisk } from "./recommender.js";

export interface PromptInput {
  code: CodeAnalysis;
  git: GitAnalysis;
  tests: TestAnalysis;
  github?: ProjectStatus | null;
  stories?: UserStoryStatus[];
  docs?: DocumentationStatus;
}

const MAX_HIGH_RISK_LISTED = 5;

function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}

/**
 * Builds the single analysis prompt handed to the AI agent CLI.
 * Optional sections are left out when their data is absent.
 */
export function buildAnalysisPrompt(input: PromptInput): string {
  const { code, git, tests, github, stories, docs } = input;

  const gitLines = git.isGitRepo && git.gitAvailable
    ? [
        `- Commits (last 7 days): ${git.commitCount7d}`,
        `- Commits (last 30 days): ${git.commitCount30d}`,
        `- Commits per day: ${git.commitsPerDay.toFixed(2)}`,
        `- Active branches: ${git.activeBranches}`,
        `- Contributors: ${git.contributors}`,
        `- Last commit: ${git.lastCommitDate ?? "unknown"}`,
      ]
    : [git.isGitRepo ? "- Git is not installed" : "- Not a git repository"];

  const testLines = [
    tests.coveragePercentage !== null
      ? `- Coverage: ${tests.coveragePercentage}%`
      : "- Coverage: Not available",
  ];
  if (tests.untestedFiles.length > 0) {
    testLines.push(`- Untested files: ${tests.untestedFiles.length}`);
    const highRisk = tests.untestedFiles.filter((f) => isHighRisk(f));
    if (highRisk.length > 0) {
      testLines.push("- High-risk untested files:");
      for (const file of highRisk.slice(0, MAX_HIGH_RISK_LISTED)) {
        testLines.push(`  * ${basename(file)}`);
      }
    }
  }

  const githubLines = github
    ? [
        ``,
        `## GitHub`,
        `- Open issues: ${github.openIssues.length}`,
        `- Blocked issues: ${github.blockedIssues.length}`,
        `- Stale issues: ${github.staleIssues.length}`,
        `- Open pull requests: ${github.openPrCount}`,
        `- Stale pull requests: ${github.stalePrCount}`,
      ]
    : [];

  const storyLines: string[] = [];
  if (stories && stories.length > 0) {
    storyLines.push(``, `## User Stories`, `- Total stories: ${stories.length}`);
    const doneNoImpl = stories.filter((s) => s.status === "done" && !s.hasImplementation);
    if (doneNoImpl.length > 0) {
      storyLines.push(`- Stories marked done without implementation: ${doneNoImpl.length}`);
    }
  }

  const docLines: string[] = [];
  if (docs) {
    docLines.push(
      ``,
      `## Documentation Status`,
      `- Documentation score: ${coverageScore(docs)}/100`,
      `- Has README: ${yesNo(docs.hasReadme)}`,
      `- Has LICENSE: ${yesNo(docs.hasLicense)}`,
      `- Has CHANGELOG: ${yesNo(docs.hasChangelog)}`
    );
    if (docs.outdatedDocs.length > 0) {
      docLines.push(`- Docs with TODO/TBD: ${docs.outdatedDocs.length}`);
    }
  }

  const lines: string[] = [
    `# Project Analysis Request`,
    ``,
    `You are an AI Project Manager/Tech Lead. Analyze the following project data and provide actionable recommendations.`,
    ``,
    `## Codebase Metrics`,
    `- Total files: ${code.fileCount}`,
    `- Total lines: ${code.lineCount}`,
    `- TODO markers: ${code.todos.length}`,
    `- FIXME markers: ${code.fixmes.length}`,
    ``,
    `## Git Activity`,
    ...gitLines,
    ``,
    `## Test Coverage`,
    ...testLines,
    ...githubLines,
    ...storyLines,
    ...docLines,
    ``,
    `## Request`,
    ``,
    `Based on this data, provide:`,
    `1. Top 3 most critical issues or blockers`,
    `2. Top 3 recommended next steps (prioritized)`,
    `3. Overall project health assessment (0-100 score)`,
    `4. Key risks or concerns`,
    ``,
    `Keep responses concise and actionable. Focus on immediate priorities.`,
  ];

  return lines.join("\n");
}
