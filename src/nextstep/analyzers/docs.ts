import { existsSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import { glob } from "glob";
import type { DocumentationStatus } from "../../types/index.js";
import { countLines } from "./code.js";

const LICENSE_FILES = ["LICENSE", "LICENSE.md", "LICENSE.txt", "COPYING"];
const ARCHITECTURE_FILES = ["ARCHITECTURE.md", "architecture.md", "DESIGN.md", "design.md"];
const STALE_MARKERS = ["todo", "fixme", "tbd"];

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export async function analyzeDocs(root: string): Promise<DocumentationStatus> {
  const docsDir = join(root, "docs");
  const docsFolderExists = existsSync(docsDir) && statSync(docsDir).isDirectory();

  const docFiles = docsFolderExists
    ? (await glob("**/*.md", { cwd: docsDir, nodir: true, dot: true, posix: true })).sort()
    : [];

  const outdatedDocs: string[] = [];
  for (const file of docFiles) {
    try {
      const lower = readFileSync(join(docsDir, file), "utf-8").toLowerCase();
      if (STALE_MARKERS.some((m) => lower.includes(m))) {
        outdatedDocs.push(`docs/${file}`);
      }
    } catch {
      continue;
    }
  }

  const readmePath = join(root, "README.md");
  const hasReadme = isFile(readmePath);
  let readmeLines = 0;
  if (hasReadme) {
    try {
      readmeLines = countLines(readFileSync(readmePath, "utf-8"));
    } catch {
      readmeLines = 0;
    }
  }

  return {
    hasReadme,
    hasChangelog: isFile(join(root, "CHANGELOG.md")),
    hasContributing: isFile(join(root, "CONTRIBUTING.md")),
    hasLicense: LICENSE_FILES.some((f) => isFile(join(root, f))),
    hasPrd: docsFolderExists && isFile(join(docsDir, "PRD.md")),
    hasArchitecture:
      docsFolderExists &&
      ARCHITECTURE_FILES.some((f) => isFile(join(docsDir, f)) || isFile(join(root, f))),
    docsFolderExists,
    docFileCount: docFiles.length,
    readmeLines,
    outdatedDocs,
  };
}

/**
 * 0-100. Essentials up to 60, project docs 30, quality bonus 10.
 */
export function coverageScore(status: DocumentationStatus): number {
  let score = 0;
  if (status.hasReadme) {
    score += 20;
    if (status.readmeLines >= 50) score += 10;
  }
  if (status.hasLicense) score += 10;
  if (status.hasChangelog) score += 10;
  if (status.hasContributing) score += 10;
  if (status.docsFolderExists) score += 10;
  if (status.hasPrd) score += 10;
  if (status.hasArchitecture) score += 10;
  if (status.docFileCount >= 5) score += 5;
  if (status.outdatedDocs.length === 0) score += 5;
  return Math.min(score, 100);
}

export function missingDocs(status: DocumentationStatus): string[] {
  const missing: string[] = [];
  if (!status.hasReadme) missing.push("README.md");
  if (!status.hasLicense) missing.push("LICENSE");
  if (!status.hasChangelog) missing.push("CHANGELOG.md");
  if (!status.hasContributing) missing.push("CONTRIBUTING.md");
  if (!status.hasPrd) missing.push("docs/PRD.md");
  if (!status.hasArchitecture) missing.push("docs/ARCHITECTURE.md");
  return missing;
}
