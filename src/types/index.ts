// === Agent Registry ===

export type AgentId =
  | "copilot"
  | "claude"
  | "gemini"
  | "cursor-agent"
  | "qwen"
  | "opencode"
  | "codex"
  | "windsurf"
  | "kilocode"
  | "auggie"
  | "codebuddy"
  | "roo"
  | "q"
  | "amp"
  | "shai"
  | "bob";

/**
 * How a one-shot prompt is handed to an agent's CLI.
 */
export interface AgentCli {
  cmd: string;
  promptMode: "positional" | "flag" | "subcommand";
  /** Flag or subcommand name, for the matching prompt modes. */
  arg?: string;
  extraArgs?: string[];
}

export interface AgentMeta {
  id: AgentId;
  name: string;
  folder: string;
  installUrl?: string;
  requiresCli: boolean;
  cli?: AgentCli;
  commandsSubdir?: string;
  agentsSubdir?: string;
}

// === Paths ===

export interface ToolPaths {
  projectRoot: string;
  x100Dir: string;
  configPath: string;
  nextstepConfigPath: string;
  resourcesDir: string;
  templatesDir: string;
  availableCommandsDir: string;
  availableAgentsDir: string;
  activeCommandsDir: string;
  activeAgentsDir: string;
}

// === Templates ===

export type TemplateKind = "command" | "agent";

export interface TemplateInfo {
  name: string;
  displayName: string;
  description: string;
  active: boolean;
}

export interface EnableResult {
  name: string;
  target: string;
  alreadyActive: boolean;
}

export interface DisableResult {
  name: string;
  target: string;
  removed: boolean;
}

export interface WorkflowItem {
  kind: TemplateKind;
  name: string;
  status: "enabled" | "missing";
}

// === Project init / checks ===

export interface InitOptions {
  ai?: string;
  name?: string;
  code?: string;
  noGit?: boolean;
}

export interface InitStep {
  target: string;
  status:
    | "created"
    | "exists"
    | "missing-template"
    | "initialized"
    | "skipped"
    | "failed"
    | "saved";
  detail?: string;
}

export type StepStatus = "pending" | "running" | "done" | "error" | "skipped";

export interface Step {
  key: string;
  label: string;
  status: StepStatus;
  detail: string;
}

export interface StructureCheck {
  name: string;
  path: string;
  ok: boolean;
}

// === Nextstep analysis ===

export interface TodoItem {
  file: string;
  line: number;
  text: string;
  type: "TODO" | "FIXME";
}

export interface CodeAnalysis {
  fileCount: number;
  lineCount: number;
  pythonFiles: number;
  javascriptFiles: number;
  otherFiles: number;
  todos: TodoItem[];
  fixmes: TodoItem[];
}

export interface GitAnalysis {
  isGitRepo: boolean;
  gitAvailable: boolean;
  commitCount7d: number;
  commitCount30d: number;
  activeBranches: number;
  contributors: number;
  activeContributors30d: number;
  commitsPerDay: number;
  lastCommitDate?: string;
  lastCommitMessage?: string;
}

export interface TestAnalysis {
  coveragePercentage: number | null;
  testCount: number;
  testFiles: string[];
  untestedFiles: string[];
}

export type StoryStatus = "todo" | "in-progress" | "done";

export interface UserStoryStatus {
  id: string;
  title: string;
  status: StoryStatus;
  filePath: string;
  hasImplementation: boolean;
  hasTests: boolean;
  acceptanceCriteriaCount: number;
  completionPercentage: number;
}

export interface DocumentationStatus {
  hasReadme: boolean;
  hasChangelog: boolean;
  hasContributing: boolean;
  hasLicense: boolean;
  hasPrd: boolean;
  hasArchitecture: boolean;
  docsFolderExists: boolean;
  docFileCount: number;
  readmeLines: number;
  outdatedDocs: string[];
}

export interface IssueInfo {
  number: number;
  title: string;
  state: string;
  createdDaysAgo: number;
  labels: string[];
  isBlocked: boolean;
}

export interface ProjectStatus {
  openIssues: IssueInfo[];
  blockedIssues: IssueInfo[];
  staleIssues: IssueInfo[];
  openPrCount: number;
  stalePrCount: number;
}

export interface Gap {
  category: string;
  description: string;
  severity: "low" | "medium" | "high";
  file?: string;
}

export interface Blocker {
  title: string;
  impact: string;
  source: "code" | "git" | "github";
  details: string;
}

export type StepPriority = "NOW" | "This Week" | "Next Sprint";

export interface NextStep {
  priority: StepPriority;
  action: string;
  rationale: string;
  impact: string;
  effort: string;
  order: number;
}

export interface HealthScore {
  overall: number;
  velocityScore: number;
  qualityScore: number;
  blockerScore: number;
  activityScore: number;
  summary: string;
  trend: "improving" | "stable" | "declining";
}

export interface Recommendations {
  healthScore: HealthScore;
  blockers: Blocker[];
  gaps: Gap[];
  nextSteps: NextStep[];
}

// === Nextstep config ===

export interface AnalysisThresholds {
  coverageThreshold: number;
  staleIssueDays: number;
  stalePrDays: number;
  maxFixmeCount: number;
}

export interface HealthWeights {
  velocity: number;
  quality: number;
  blockers: number;
  activity: number;
}

export interface NextstepConfig {
  defaultAiAgent: string;
  analysis: AnalysisThresholds;
  github: {
    enabled: boolean;
    tokenEnv: string;
    repo?: string;
  };
  healthWeights: HealthWeights;
}

export type ReportFormat = "text" | "json" | "markdown";

export type AiResult = { ok: true; text: string } | { ok: false; error: string };

export interface NextstepReport {
  generatedAt: string;
  agentId: string;
  code: CodeAnalysis;
  git: GitAnalysis;
  tests: TestAnalysis;
  stories: UserStoryStatus[];
  docs: DocumentationStatus;
  github: ProjectStatus | null;
  githubRepo?: string;
  recommendations: Recommendations;
  prompt: string;
  ai: AiResult | null;
  warnings: string[];
}
