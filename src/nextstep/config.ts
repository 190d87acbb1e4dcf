import { existsSync, readFileSync } from "node:fs";
import { ConfigError, UsageError, errorMessage } from "../core/errors.js";
import { writeJsonAtomic } from "../core/config-store.js";
import {
  describeIssues,
  NextstepFileSchema,
  safeValidateNextstepFile,
  type NextstepFile,
} from "../core/validation.js";
import { isKnownAgent, unknownAgentError } from "../core/registry.js";
import type { NextstepConfig } from "../types/index.js";
import { GitHubError, parseRepo } from "./github.js";

function fromFile(file: NextstepFile, defaultAgent: string): NextstepConfig {
  return {
    defaultAiAgent: file.default_ai_agent ?? defaultAgent,
    analysis: {
      coverageThreshold: file.analysis.coverage_threshold,
      staleIssueDays: file.analysis.stale_issue_days,
      stalePrDays: file.analysis.stale_pr_days,
      maxFixmeCount: file.analysis.max_fixme_count,
    },
    github: {
      enabled: file.github.enabled,
      tokenEnv: file.github.token_env,
      repo: file.github.repo ?? undefined,
    },
    healthWeights: { ...file.health_weights },
  };
}

export function defaultNextstepConfig(defaultAgent: string): NextstepConfig {
  return fromFile(NextstepFileSchema.parse({}), defaultAgent);
}

/**
 * Read .x100/nextstep.json. A missing file gives defaults; the project's
 * default agent applies unless the file names one.
 */
export function loadNextstepConfig(configPath: string, defaultAgent: string): NextstepConfig {
  if (!existsSync(configPath)) {
    return defaultNextstepConfig(defaultAgent);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(configPath, `Malformed nextstep config: ${errorMessage(err)}`, { cause: err });
  }

  const result = safeValidateNextstepFile(data);
  if (!result.success) {
    throw new ConfigError(configPath, `Invalid nextstep config: ${describeIssues(result.error)}`);
  }
  return fromFile(result.data, defaultAgent);
}

/**
 * On-disk shape. `default_ai_agent` is written only when it differs from the
 * project's default agent, so switching the project default carries over.
 */
export function toFile(config: NextstepConfig, projectDefaultAgent?: string): NextstepFile {
  return {
    ...(config.defaultAiAgent !== projectDefaultAgent ? { default_ai_agent: config.defaultAiAgent } : {}),
    analysis: {
      coverage_threshold: config.analysis.coverageThreshold,
      stale_issue_days: config.analysis.staleIssueDays,
      stale_pr_days: config.analysis.stalePrDays,
      max_fixme_count: config.analysis.maxFixmeCount,
    },
    github: {
      enabled: config.github.enabled,
      token_env: config.github.tokenEnv,
      repo: config.github.repo ?? null,
    },
    health_weights: { ...config.healthWeights },
  };
}

export function saveNextstepConfig(
  configPath: string,
  config: NextstepConfig,
  projectDefaultAgent?: string
): void {
  writeJsonAtomic(configPath, toFile(config, projectDefaultAgent));
}

export interface SetupOptions {
  githubRepo?: string;
  coverageThreshold?: string;
  ai?: string;
}

/**
 * Apply `nextstep-setup` flags over the current nextstep.json (or defaults)
 * and save it. Naming a repository turns the GitHub integration on.
 */
export function configureNextstep(
  configPath: string,
  projectDefaultAgent: string,
  options: SetupOptions
): NextstepConfig {
  const config = loadNextstepConfig(configPath, projectDefaultAgent);

  if (options.coverageThreshold !== undefined) {
    const value = Number(options.coverageThreshold);
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new UsageError(
        `Invalid coverage threshold "${options.coverageThreshold}": expected a number from 0 to 100`
      );
    }
    config.analysis.coverageThreshold = value;
  }

  if (options.githubRepo !== undefined) {
    try {
      const { owner, name } = parseRepo(options.githubRepo);
      config.github.repo = `${owner}/${name}`;
    } catch (err) {
      if (err instanceof GitHubError) throw new UsageError(err.message);
      throw err;
    }
    config.github.enabled = true;
  }

  if (options.ai !== undefined) {
    if (!isKnownAgent(options.ai)) {
      throw unknownAgentError(options.ai);
    }
    config.defaultAiAgent = options.ai;
  }

  saveNextstepConfig(configPath, config, projectDefaultAgent);
  return config;
}
