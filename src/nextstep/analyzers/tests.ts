import { existsSync, readFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import type { TestAnalysis } from "../../types/index.js";
import { CODE_EXTENSIONS, listProjectFiles } from "./code.js";

const TEST_FILE_PATTERNS = [
  /(^|\/)test_[^/]*\.py$/,
  /_test\.py$/,
  /(^|\/)tests\/.*\.py$/,
  /\.(test|spec)\.(js|ts|tsx)$/,
  /_test\.go$/,
];

export function isTestFile(relPath: string): boolean {
  return TEST_FILE_PATTERNS.some((p) => p.test(relPath));
}

/**
 * Source stem a test file covers: `test_foo.py`, `foo_test.py`,
 * `foo.test.ts` and `foo.spec.tsx` all cover `foo`.
 */
export function testedStem(relPath: string): string {
  let name = basename(relPath);
  name = name.replace(/\.(test|spec)\.(js|ts|tsx)$/, "");
  name = name.replace(/_test\.(py|go)$/, "");
  name = name.replace(/\.py$/, "");
  return name.replace(/^test_/, "");
}

function stemOf(relPath: string): string {
  return basename(relPath, extname(relPath));
}

/**
 * Line coverage from coverage/coverage-summary.json (istanbul) or the
 * `line-rate` of coverage.xml (Cobertura), rounded to one decimal.
 */
export function readCoverage(root: string): number | null {
  const summaryPath = join(root, "coverage", "coverage-summary.json");
  if (existsSync(summaryPath)) {
    try {
      const pct = extractSummaryPct(JSON.parse(readFileSync(summaryPath, "utf-8")));
      if (pct !== null) return Math.round(pct * 10) / 10;
    } catch {
      // fall through to coverage.xml
    }
  }

  const xmlPath = join(root, "coverage.xml");
  if (existsSync(xmlPath)) {
    try {
      const match = /<coverage\b[^>]*\bline-rate="([0-9.]+)"/.exec(readFileSync(xmlPath, "utf-8"));
      if (match) {
        const rate = Number.parseFloat(match[1]);
        if (!Number.isNaN(rate)) return Math.round(rate * 1000) / 10;
      }
    } catch {
      // unreadable: no coverage
    }
  }
  return null;
}

function extractSummaryPct(data: unknown): number | null {
  if (!isRecord(data)) return null;
  const total = data.total;
  if (!isRecord(total)) return null;
  const lines = total.lines;
  if (!isRecord(lines)) return null;
  return typeof lines.pct === "number" ? lines.pct : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function analyzeTests(root: string): Promise<TestAnalysis> {
  const files = await listProjectFiles(root);
  const testFiles = files.filter(isTestFile);
  const covered = new Set(testFiles.map(testedStem));

  const untestedFiles = files.filter((f) => {
    if (!CODE_EXTENSIONS.has(extname(f)) || isTestFile(f)) return false;
    const stem = stemOf(f);
    if (stem === "__init__" || stem === "index") return false;
    return !covered.has(stem);
  });

  return {
    coveragePercentage: readCoverage(root),
    testCount: testFiles.length,
    testFiles,
    untestedFiles,
  };
}
