import { basename } from "node:path";
import type {
  AnalysisThresholds,
  Blocker,
  CodeAnalysis,
  DocumentationStatus,
  Gap,
  GitAnalysis,
  HealthScore,
  HealthWeights,
  NextStep,
  ProjectStatus,
  Recommendations,
  TestAnalysis,
  UserStoryStatus,
} from "../types/index.js";
import { missingDocs } from "./analyzers/docs.js";

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  coverageThreshold: 80,
  staleIssueDays: 30,
  stalePrDays: 7,
  maxFixmeCount: 10,
};

export const DEFAULT_WEIGHTS: HealthWeights = {
  velocity: 0.2,
  quality: 0.3,
  blockers: 0.3,
  activity: 0.2,
};

/** Coverage below this is a blocker regardless of the configured target. */
const CRITICAL_COVERAGE = 60;
const HIGH_RISK_KEYWORDS = ["payment", "auth", "security", "api"];
const ESSENTIAL_DOCS = ["README.md", "LICENSE"];

export interface RecommenderInput {
  code: CodeAnalysis;
  git: GitAnalysis;
  tests: TestAnalysis;
  stories?: UserStoryStatus[];
  docs?: DocumentationStatus;
  github?: ProjectStatus | null;
  thresholds?: AnalysisThresholds;
  weights?: HealthWeights;
}

export function isHighRisk(file: string, keywords: string[] = HIGH_RISK_KEYWORDS): boolean {
  const lower = file.toLowerCase();
  return keywords.some((k) => lower.includes(k));
}

function activityScore(git: GitAnalysis): number {
  if (!git.isGitRepo) return 50;
  if (git.commitsPerDay >= 2) return 100;
  if (git.commitsPerDay >= 1) return 80;
  if (git.commitsPerDay >= 0.5) return 60;
  if (git.commitCount7d > 0) return 40;
  return 20;
}

function velocityScore(git: GitAnalysis): number {
  if (!git.isGitRepo) return 50;
  if (git.commitCount7d >= 14) return 100;
  if (git.commitCount7d >= 7) return 85;
  if (git.commitCount7d >= 3) return 70;
  if (git.commitCount7d > 0) return 50;
  return 30;
}

function qualityScore(code: CodeAnalysis, tests: TestAnalysis, coverageThreshold: number): number {
  let score = 100;
  if (tests.coveragePercentage !== null) {
    score -= Math.max(0, coverageThreshold - tests.coveragePercentage);
  }
  const markers = code.todos.length + code.fixmes.length;
  if (markers > 50) score -= 20;
  else if (markers > 20) score -= 10;
  else if (markers > 10) score -= 5;
  return Math.max(0, score);
}

function blockerScore(code: CodeAnalysis): number {
  const fixmes = code.fixmes.length;
  if (fixmes > 20) return 40;
  if (fixmes > 10) return 60;
  if (fixmes > 5) return 80;
  return 100;
}

function weightedOverall(
  scores: { velocity: number; quality: number; blockers: number; activity: number },
  weights: HealthWeights
): number {
  let total = weights.velocity + weights.quality + weights.blockers + weights.activity;
  let w = weights;
  if (total <= 0) {
    w = DEFAULT_WEIGHTS;
    total = 1;
  }
  const sum =
    scores.velocity * w.velocity +
    scores.quality * w.quality +
    scores.blockers * w.blockers +
    scores.activity * w.activity;
  // epsilon keeps 0.1-step weights from landing just under an integer
  return Math.floor(sum / total + 1e-9);
}

export function calculateHealthScore(
  code: CodeAnalysis,
  git: GitAnalysis,
  tests: TestAnalysis,
  thresholds: AnalysisThresholds = DEFAULT_THRESHOLDS,
  weights: HealthWeights = DEFAULT_WEIGHTS
): HealthScore {
  const scores = {
    velocity: velocityScore(git),
    quality: qualityScore(code, tests, thresholds.coverageThreshold),
    blockers: blockerScore(code),
    activity: activityScore(git),
  };
  const overall = weightedOverall(scores, weights);

  let summary: string;
  let trend: HealthScore["trend"];
  if (overall >= 80) {
    summary = "Excellent";
    trend = "improving";
  } else if (overall >= 70) {
    summary = "Good";
    trend = "stable";
  } else if (overall >= 60) {
    summary = "Fair";
    trend = "stable";
  } else if (overall >= 50) {
    summary = "Needs Attention";
    trend = "declining";
  } else {
    summary = "Poor";
    trend = "declining";
  }

  return {
    overall,
    velocityScore: scores.velocity,
    qualityScore: scores.quality,
    blockerScore: scores.blockers,
    activityScore: scores.activity,
    summary,
    trend,
  };
}

export function identifyBlockers(input: RecommenderInput): Blocker[] {
  const { code, git, tests } = input;
  const thresholds = input.thresholds ?? DEFAULT_THRESHOLDS;
  const blockers: Blocker[] = [];

  if (code.fixmes.length > thresholds.maxFixmeCount) {
    blockers.push({
      title: `${code.fixmes.length} FIXME markers in codebase`,
      impact: "Technical debt accumulating",
      source: "code",
      details: `Found ${code.fixmes.length} FIXME markers that need attention`,
    });
  }

  if (tests.coveragePercentage !== null && tests.coveragePercentage < CRITICAL_COVERAGE) {
    blockers.push({
      title: `Low test coverage (${tests.coveragePercentage}%)`,
      impact: "High risk of production issues",
      source: "code",
      details: `Coverage is ${tests.coveragePercentage}%, target should be >${thresholds.coverageThreshold}%`,
    });
  }

  if (git.isGitRepo && git.gitAvailable && git.commitCount7d === 0) {
    blockers.push({
      title: "No recent commits (7+ days)",
      impact: "Project appears inactive",
      source: "git",
      details: "No commits in the last 7 days may indicate stalled development",
    });
  }

  for (const issue of input.github?.blockedIssues ?? []) {
    blockers.push({
      title: `Issue #${issue.number}: ${issue.title}`,
      impact: `Blocked for ${issue.createdDaysAgo} days`,
      source: "github",
      details: "Blocking other work",
    });
  }

  return blockers;
}

export function findGaps(input: RecommenderInput): Gap[] {
  const { tests } = input;
  const gaps: Gap[] = [];

  const highRisk = tests.untestedFiles.filter((f) => isHighRisk(f));
  if (highRisk.length > 0) {
    for (const file of highRisk.slice(0, 3)) {
      gaps.push({
        category: "Quality Gap",
        description: `${basename(file)}: No tests (high risk module)`,
        severity: "high",
        file,
      });
    }
  } else if (tests.untestedFiles.length > 5) {
    gaps.push({
      category: "Quality Gap",
      description: `${tests.untestedFiles.length} files without tests`,
      severity: "medium",
    });
  }

  for (const story of input.stories ?? []) {
    if (story.status === "done" && !story.hasImplementation) {
      gaps.push({
        category: "Story Gap",
        description: `${story.id} is marked done but references no implementation`,
        severity: "medium",
        file: story.filePath,
      });
    }
  }

  if (input.docs) {
    const missing = missingDocs(input.docs).filter((d) => ESSENTIAL_DOCS.includes(d));
    if (missing.length > 0) {
      gaps.push({
        category: "Documentation Gap",
        description: `Missing ${missing.join(", ")}`,
        severity: "low",
      });
    }
  }

  const stalePrs = input.github?.stalePrCount ?? 0;
  if (stalePrs > 0) {
    const days = (input.thresholds ?? DEFAULT_THRESHOLDS).stalePrDays;
    gaps.push({
      category: "Review Gap",
      description: `${stalePrs} pull request${stalePrs === 1 ? "" : "s"} open longer than ${days} days`,
      severity: "medium",
    });
  }

  return gaps;
}

export function generateNextSteps(input: RecommenderInput): NextStep[] {
  const { code, git, tests } = input;
  const thresholds = input.thresholds ?? DEFAULT_THRESHOLDS;
  const steps: NextStep[] = [];
  const add = (step: Omit<NextStep, "order">) => steps.push({ ...step, order: steps.length + 1 });

  if (tests.coveragePercentage !== null && tests.coveragePercentage < CRITICAL_COVERAGE) {
    add({
      priority: "NOW",
      action: `Increase test coverage to >${CRITICAL_COVERAGE}%`,
      rationale: "Current coverage is critically low, high risk of production issues",
      impact: "Reduces risk, improves confidence in changes",
      effort: "4-8 hours",
    });
  }

  const critical = tests.untestedFiles.find((f) => isHighRisk(f, ["payment", "auth", "security"]));
  if (critical) {
    add({
      priority: "NOW",
      action: `Add tests for ${basename(critical)}`,
      rationale: "High-risk module without test coverage",
      impact: "Reduces production risk for critical functionality",
      effort: "2-4 hours",
    });
  }

  for (const issue of input.github?.blockedIssues ?? []) {
    add({
      priority: "NOW",
      action: `Unblock issue #${issue.number}: ${issue.title}`,
      rationale: `Blocked for ${issue.createdDaysAgo} days`,
      impact: "Frees dependent work",
      effort: "Varies",
    });
  }

  if (code.fixmes.length > thresholds.maxFixmeCount) {
    add({
      priority: "This Week",
      action: `Address ${code.fixmes.length} FIXME markers`,
      rationale: "Technical debt is accumulating",
      impact: "Improves code quality and maintainability",
      effort: "4-8 hours",
    });
  }

  if (code.todos.length > 20) {
    add({
      priority: "This Week",
      action: `Review and clean up ${code.todos.length} TODO markers`,
      rationale: "Keep technical debt under control",
      impact: "Clarifies remaining work, prevents debt accumulation",
      effort: "2-4 hours",
    });
  }

  const stalePrs = input.github?.stalePrCount ?? 0;
  if (stalePrs > 0) {
    add({
      priority: "This Week",
      action: `Review ${stalePrs} stale pull request${stalePrs === 1 ? "" : "s"}`,
      rationale: `Open longer than ${thresholds.stalePrDays} days`,
      impact: "Shortens feedback loops",
      effort: "1-2 hours",
    });
  }

  if (git.isGitRepo && git.gitAvailable && git.commitsPerDay < 1) {
    add({
      priority: "Next Sprint",
      action: "Increase development velocity",
      rationale: "Current velocity is below optimal",
      impact: "Faster feature delivery",
      effort: "Planning session",
    });
  }

  if (steps.length === 0) {
    add({
      priority: "Next Sprint",
      action: "Continue current trajectory",
      rationale: "Project health is good, maintain momentum",
      impact: "Sustained quality and delivery",
      effort: "Ongoing",
    });
  }

  return steps;
}

/**
 * Rule-based recommendations. Deterministic for a given input.
 */
export function recommend(input: RecommenderInput): Recommendations {
  return {
    healthScore: calculateHealthScore(
      input.code,
      input.git,
      input.tests,
      input.thresholds ?? DEFAULT_THRESHOLDS,
      input.weights ?? DEFAULT_WEIGHTS
    ),
    blockers: identifyBlockers(input),
    gaps: findGaps(input),
    nextSteps: generateNextSteps(input),
  };
}
