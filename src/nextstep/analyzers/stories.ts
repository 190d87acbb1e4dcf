import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { StoryStatus, UserStoryStatus } from "../../types/index.js";

export const STORIES_DIR = join("docs", "user-stories");

const ACCEPTANCE_SECTION = /#+\s*Acceptance Criteria[\s\S]*?(?=\n#|$)/i;
const CHECKBOX_LINE = /^\s*[-*]\s+\[[ xX]\]/;

const IMPLEMENTATION_PATTERNS = [
  /`[\w/]+\.py`/i,
  /`[\w/]+\.js`/i,
  /`[\w/]+\.ts`/i,
  /implemented in/i,
  /code in/i,
  /file:.*\.py/i,
];

const TEST_PATTERNS = [/test[_\s]/i, /spec[_\s]/i, /`test_\w+\.py`/i, /`\w+\.test\.js`/i];

export function extractTitle(content: string): string {
  const match = /^#{1,2}\s+(.+)$/m.exec(content);
  return match ? match[1].trim() : "Untitled";
}

function acceptanceSection(content: string): string | undefined {
  return ACCEPTANCE_SECTION.exec(content)?.[0];
}

/**
 * Explicit `status:` markers win, then the acceptance checkboxes, then a few
 * keywords outside checkbox lines. Defaults to `todo`.
 */
export function extractStatus(content: string): StoryStatus {
  const lower = content.toLowerCase();

  if (lower.includes("status: done") || lower.includes("status: completed") || content.includes("✅")) {
    return "done";
  }
  if (lower.includes("status: in progress") || lower.includes("status: in-progress")) {
    return "in-progress";
  }
  if (lower.includes("status: todo") || lower.includes("status: not started")) {
    return "todo";
  }

  const section = acceptanceSection(content);
  if (section) {
    const checked = (section.match(/- \[x\]/gi) ?? []).length;
    const unchecked = (section.match(/- \[ \]/g) ?? []).length;
    const total = checked + unchecked;
    if (total > 0) {
      if (checked === total) return "done";
      return checked > 0 ? "in-progress" : "todo";
    }
  }

  const clean = content
    .split("\n")
    .filter((line) => !CHECKBOX_LINE.test(line))
    .join("\n")
    .toLowerCase();
  if (clean.includes("implemented and deployed") || clean.includes("implementation complete")) {
    return "done";
  }
  if (clean.includes("working on") || clean.includes("currently implementing")) {
    return "in-progress";
  }
  return "todo";
}

export function countAcceptanceCriteria(content: string): number {
  const section = acceptanceSection(content);
  return section ? (section.match(/^\s*[-*]\s+/gm) ?? []).length : 0;
}

export function completionPercentage(status: StoryStatus, hasImpl: boolean, hasTests: boolean): number {
  if (status === "done") return 100;
  if (status === "todo") return 0;
  let score = 50;
  if (hasImpl) score += 30;
  if (hasTests) score += 20;
  return Math.min(score, 100);
}

export function analyzeStory(id: string, filePath: string, content: string): UserStoryStatus {
  const status = extractStatus(content);
  const hasImplementation = IMPLEMENTATION_PATTERNS.some((p) => p.test(content));
  const hasTests = TEST_PATTERNS.some((p) => p.test(content));
  return {
    id,
    title: extractTitle(content),
    status,
    filePath,
    hasImplementation,
    hasTests,
    acceptanceCriteriaCount: countAcceptanceCriteria(content),
    completionPercentage: completionPercentage(status, hasImplementation, hasTests),
  };
}

/**
 * Every docs/user-stories/US-*.md, sorted by file name. Unreadable stories
 * are left out.
 */
export function analyzeStories(root: string): UserStoryStatus[] {
  const dir = join(root, STORIES_DIR);
  if (!existsSync(dir)) return [];

  const names = readdirSync(dir)
    .filter((name) => name.startsWith("US-") && name.endsWith(".md"))
    .sort();

  const stories: UserStoryStatus[] = [];
  for (const name of names) {
    try {
      const content = readFileSync(join(dir, name), "utf-8");
      stories.push(analyzeStory(name.slice(0, -3), `docs/user-stories/${name}`, content));
    } catch {
      continue;
    }
  }
  return stories;
}
