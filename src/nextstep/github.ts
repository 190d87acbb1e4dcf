import { z } from "zod";
import { errorMessage } from "../core/errors.js";
import type { AnalysisThresholds, IssueInfo, ProjectStatus } from "../types/index.js";

const API_BASE = "https://api.github.com";
const PER_PAGE = 100;
const DAY_MS = 24 * 60 * 60 * 1000;
const RATE_LIMIT_HEADERS = ["X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset", "Retry-After"];

const IssueSchema = z.object({
  number: z.number(),
  title: z.string(),
  state: z.string(),
  created_at: z.string(),
  labels: z.array(z.union([z.string(), z.object({ name: z.string().optional() }).passthrough()])).default([]),
  pull_request: z.unknown().optional(),
});

const PullSchema = z.object({
  number: z.number(),
  created_at: z.string(),
});

type Issue = z.infer<typeof IssueSchema>;
type Pull = z.infer<typeof PullSchema>;

export type FetchFn = (url: string, init: { headers: Record<string, string> }) => Promise<Response>;

export class GitHubError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "GitHubError";
    this.status = status;
  }
}

/**
 * Token lookup order: --github-token, the configured env var, GH_TOKEN,
 * GITHUB_TOKEN. Blank values are skipped.
 */
export function resolveGitHubToken(
  cliToken: string | undefined,
  tokenEnv: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const candidates = [cliToken, tokenEnv ? env[tokenEnv] : undefined, env.GH_TOKEN, env.GITHUB_TOKEN];
  for (const value of candidates) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

export function parseRepo(repo: string): { owner: string; name: string } {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(repo.trim());
  if (!match) {
    throw new GitHubError(`Invalid repository "${repo}": expected owner/repo`);
  }
  return { owner: match[1], name: match[2] };
}

function daysSince(iso: string, now: Date): number {
  const created = Date.parse(iso);
  if (Number.isNaN(created)) return 0;
  return Math.max(0, Math.floor((now.getTime() - created) / DAY_MS));
}

function labelNames(issue: Issue): string[] {
  return issue.labels
    .map((label) => (typeof label === "string" ? label : label.name ?? ""))
    .filter(Boolean);
}

/**
 * Read-only client for the two endpoints nextstep needs.
 */
export class GitHubClient {
  private readonly owner: string;
  private readonly name: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;

  constructor(
    private readonly token: string,
    repo: string,
    options: { fetch?: FetchFn; now?: () => Date } = {}
  ) {
    const parsed = parseRepo(repo);
    this.owner = parsed.owner;
    this.name = parsed.name;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? (() => new Date());
  }

  async listOpenIssues(): Promise<Issue[]> {
    const items = await this.getAll("issues", IssueSchema);
    // the issues endpoint also returns pull requests
    return items.filter((item) => item.pull_request === undefined);
  }

  async listOpenPulls(): Promise<Pull[]> {
    return this.getAll("pulls", PullSchema);
  }

  async getProjectStatus(
    thresholds: Pick<AnalysisThresholds, "staleIssueDays" | "stalePrDays">
  ): Promise<ProjectStatus> {
    const now = this.now();
    const openIssues: IssueInfo[] = (await this.listOpenIssues()).map((issue) => {
      const labels = labelNames(issue);
      return {
        number: issue.number,
        title: issue.title,
        state: issue.state,
        createdDaysAgo: daysSince(issue.created_at, now),
        labels,
        isBlocked: labels.includes("blocked") || labels.includes("blocker"),
      };
    });

    const pulls = await this.listOpenPulls();
    return {
      openIssues,
      blockedIssues: openIssues.filter((i) => i.isBlocked),
      staleIssues: openIssues.filter((i) => i.createdDaysAgo > thresholds.staleIssueDays),
      openPrCount: pulls.length,
      stalePrCount: pulls.filter((p) => daysSince(p.created_at, now) > thresholds.stalePrDays).length,
    };
  }

  private async getAll<T extends z.ZodTypeAny>(endpoint: string, schema: T): Promise<Array<z.infer<T>>> {
    const results: Array<z.infer<T>> = [];
    const pageSchema = z.array(schema);
    let page = 1;

    while (true) {
      const url =
        `${API_BASE}/repos/${this.owner}/${this.name}/${endpoint}` +
        `?state=open&per_page=${PER_PAGE}&page=${page}`;

      let res: Response;
      try {
        res = await this.fetchFn(url, { headers: this.headers() });
      } catch (err) {
        throw new GitHubError(`GitHub request failed: ${errorMessage(err)}`);
      }

      if (!res.ok) {
        throw new GitHubError(describeFailure(res), res.status);
      }

      const parsed = pageSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new GitHubError(`Unexpected GitHub response for ${endpoint}`, res.status);
      }
      results.push(...parsed.data);

      if (parsed.data.length < PER_PAGE) break;
      page++;
    }

    return results;
  }

  private headers(): Record<string, string> {
    return {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      Authorization: `Bearer ${this.token}`,
    };
  }
}

function describeFailure(res: Response): string {
  const limits = RATE_LIMIT_HEADERS.flatMap((name) => {
    const value = res.headers.get(name);
    return value === null ? [] : [`${name}=${value}`];
  });
  const base = `GitHub API error: ${res.status} ${res.statusText}`.trim();
  return limits.length > 0 ? `${base} (${limits.join(", ")})` : base;
}
