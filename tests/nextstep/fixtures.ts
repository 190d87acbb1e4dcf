import type {
  CodeAnalysis,
  DocumentationStatus,
  GitAnalysis,
  NextstepReport,
  TestAnalysis,
  TodoItem,
  UserStoryStatus,
} from "../../src/types/index.js";
import { recommend } from "../../src/nextstep/recommender.js";

export function markers(type: TodoItem["type"], count: number): TodoItem[] {
  return Array.from({ length: count }, (_, i) => ({ file: "src/app.py", line: i + 1, text: `item ${i + 1}`, type }));
}

export function codeAnalysis(overrides: Partial<CodeAnalysis> = {}): CodeAnalysis {
  return {
    fileCount: 12,
    lineCount: 1500,
    pythonFiles: 8,
    javascriptFiles: 3,
    otherFiles: 1,
    todos: [],
    fixmes: [],
    ...overrides,
  };
}

export function gitAnalysis(overrides: Partial<GitAnalysis> = {}): GitAnalysis {
  return {
    isGitRepo: true,
    gitAvailable: true,
    commitCount7d: 14,
    commitCount30d: 50,
    activeBranches: 2,
    contributors: 3,
    activeContributors30d: 2,
    commitsPerDay: 2,
    lastCommitDate: "2024-03-14T10:00:00.000Z",
    lastCommitMessage: "Add search",
    ...overrides,
  };
}

export function testAnalysis(overrides: Partial<TestAnalysis> = {}): TestAnalysis {
  return {
    coveragePercentage: 85,
    testCount: 6,
    testFiles: [],
    untestedFiles: [],
    ...overrides,
  };
}

export function docsStatus(overrides: Partial<DocumentationStatus> = {}): DocumentationStatus {
  return {
    hasReadme: true,
    hasChangelog: true,
    hasContributing: true,
    hasLicense: true,
    hasPrd: true,
    hasArchitecture: true,
    docsFolderExists: true,
    docFileCount: 5,
    readmeLines: 60,
    outdatedDocs: [],
    ...overrides,
  };
}

export function story(overrides: Partial<UserStoryStatus> = {}): UserStoryStatus {
  return {
    id: "US-001",
    title: "Login",
    status: "done",
    filePath: "docs/user-stories/US-001.md",
    hasImplementation: true,
    hasTests: true,
    acceptanceCriteriaCount: 2,
    completionPercentage: 100,
    ...overrides,
  };
}

/**
 * A complete report for a healthy project; override parts as needed.
 */
export function sampleReport(overrides: Partial<NextstepReport> = {}): NextstepReport {
  const code = overrides.code ?? codeAnalysis();
  const git = overrides.git ?? gitAnalysis();
  const tests = overrides.tests ?? testAnalysis();
  const stories = overrides.stories ?? [];
  const docs = overrides.docs ?? docsStatus();
  const github = overrides.github ?? null;
  return {
    generatedAt: "2024-03-15T12:00:00.000Z",
    agentId: "claude",
    code,
    git,
    tests,
    stories,
    docs,
    github,
    recommendations: recommend({ code, git, tests, stories, docs, github }),
    prompt: "",
    ai: null,
    warnings: [],
    ...overrides,
  };
}
