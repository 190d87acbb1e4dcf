import { configPathFor, getDefaultAgent, loadConfig, nextstepConfigPathFor } from "../core/config-store.js";
import { errorMessage } from "../core/errors.js";
import { runCommand, type CommandRunner } from "../core/exec.js";
import { DEFAULT_AGENT, isKnownAgent, unknownAgentError } from "../core/registry.js";
import type { AiResult, NextstepConfig, NextstepReport, ProjectStatus } from "../types/index.js";
import { getAiClient } from "./ai-client.js";
import { scanCodebase } from "./analyzers/code.js";
import { analyzeDocs } from "./analyzers/docs.js";
import { analyzeGit } from "./analyzers/git.js";
import { analyzeStories } from "./analyzers/stories.js";
import { analyzeTests } from "./analyzers/tests.js";
import { loadNextstepConfig } from "./config.js";
import { GitHubClient, resolveGitHubToken, type FetchFn } from "./github.js";
import { buildAnalysisPrompt } from "./prompt-builder.js";
import { recommend } from "./recommender.js";

export interface NextstepOptions {
  /** Path to nextstep.json; defaults to <root>/.x100/nextstep.json. */
  configPath?: string;
  githubToken?: string;
  githubRepo?: string;
  /** Agent override; otherwise nextstep.json, then the project default. */
  ai?: string;
  useAi?: boolean;
  run?: CommandRunner;
  fetch?: FetchFn;
  now?: Date;
  env?: NodeJS.ProcessEnv;
}

export interface NextstepHooks {
  onStepStart?(label: string): void;
  onStepEnd?(label: string): void;
  debug?(message: string): void;
}

function projectDefaultAgent(root: string, warnings: string[]): string {
  try {
    return getDefaultAgent(loadConfig(configPathFor(root)));
  } catch (err) {
    warnings.push(`Could not read project config, using ${DEFAULT_AGENT}: ${errorMessage(err)}`);
    return DEFAULT_AGENT;
  }
}

/**
 * Local analysis, optional GitHub status, rule-based recommendations and an
 * optional AI pass. GitHub and AI failures become warnings; an unknown
 * `ai` override or a broken nextstep.json aborts the run.
 */
export async function runNextstep(
  root: string,
  options: NextstepOptions = {},
  hooks: NextstepHooks = {}
): Promise<NextstepReport> {
  if (options.ai !== undefined && !isKnownAgent(options.ai)) {
    throw unknownAgentError(options.ai);
  }
  const warnings: string[] = [];
  const run = options.run ?? runCommand;
  const env = options.env ?? process.env;
  const now = options.now ?? new Date();

  const step = async <T>(label: string, fn: () => Promise<T> | T): Promise<T> => {
    hooks.onStepStart?.(label);
    try {
      return await fn();
    } finally {
      hooks.onStepEnd?.(label);
    }
  };

  const projectAgent = projectDefaultAgent(root, warnings);
  const config: NextstepConfig = loadNextstepConfig(
    options.configPath ?? nextstepConfigPathFor(root),
    projectAgent
  );
  const agentId = options.ai ?? config.defaultAiAgent;
  hooks.debug?.(`agent=${agentId} thresholds=${JSON.stringify(config.analysis)}`);

  const code = await step("Analyzing codebase", () => scanCodebase(root));
  hooks.debug?.(`scanned ${code.fileCount} files, ${code.lineCount} lines`);
  const git = await step("Analyzing git history", () => analyzeGit(root, { run, now }));
  if (git.isGitRepo && !git.gitAvailable) {
    warnings.push("git is not installed; git activity was skipped. Install it from https://git-scm.com/downloads");
  }
  const tests = await step("Analyzing tests", () => analyzeTests(root));
  const stories = await step("Analyzing user stories", () => analyzeStories(root));
  const docs = await step("Analyzing documentation", () => analyzeDocs(root));

  const githubRepo = options.githubRepo ?? (config.github.enabled ? config.github.repo : undefined);
  let github: ProjectStatus | null = null;
  if (githubRepo) {
    const token = resolveGitHubToken(options.githubToken, config.github.tokenEnv, env);
    if (!token) {
      warnings.push(`GitHub token not found (set ${config.github.tokenEnv} or GH_TOKEN, or pass --github-token)`);
    } else {
      github = await step("Fetching GitHub status", async () => {
        try {
          const client = new GitHubClient(token, githubRepo, { fetch: options.fetch, now: () => now });
          return await client.getProjectStatus(config.analysis);
        } catch (err) {
          warnings.push(`GitHub integration failed: ${errorMessage(err)}`);
          return null;
        }
      });
    }
  }

  const recommendations = recommend({
    code,
    git,
    tests,
    stories,
    docs,
    github,
    thresholds: config.analysis,
    weights: config.healthWeights,
  });
  const prompt = buildAnalysisPrompt({ code, git, tests, github, stories, docs });

  let ai: AiResult | null = null;
  if (options.useAi !== false) {
    const client = getAiClient(agentId, run);
    ai = await step("Generating recommendations", () => client.analyze(prompt));
    if (!ai.ok) {
      if (client.available) {
        warnings.push(`AI analysis failed: ${ai.error}`);
      } else {
        hooks.debug?.(ai.error);
      }
    }
  }

  return {
    generatedAt: now.toISOString(),
    agentId,
    code,
    git,
    tests,
    stories,
    docs,
    github,
    githubRepo,
    recommendations,
    prompt,
    ai,
    warnings,
  };
}
