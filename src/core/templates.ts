import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import type {
  DisableResult,
  EnableResult,
  TemplateInfo,
  TemplateKind,
  ToolPaths,
  WorkflowItem,
} from "../types/index.js";
import { FileSystemError, UsageError } from "./errors.js";
import { parseFrontmatter, summarizeDescription } from "./frontmatter.js";

export const WORKFLOW_COMMANDS = ["start", "spec", "code", "review", "test", "done", "workflow"];
export const WORKFLOW_AGENTS = [
  "spec-writer",
  "code-implementer",
  "test-writer",
  "workflow-orchestrator",
];

function availableDir(paths: ToolPaths, kind: TemplateKind): string {
  return kind === "command" ? paths.availableCommandsDir : paths.availableAgentsDir;
}

function activeDir(paths: ToolPaths, kind: TemplateKind): string {
  return kind === "command" ? paths.activeCommandsDir : paths.activeAgentsDir;
}

/**
 * Sorted `.md` file names (without extension) in a directory; [] if it does not exist.
 */
export function listMarkdown(dirPath: string): string[] {
  if (!existsSync(dirPath)) {
    return [];
  }
  return readdirSync(dirPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry) => entry.name.slice(0, -3))
    .sort();
}

/**
 * Accept `/name`, `name.md` or `name`; reject anything that would escape the directory.
 */
export function normalizeTemplateName(raw: string): string {
  let name = raw.trim();
  if (name.startsWith("/")) name = name.slice(1);
  if (name.endsWith(".md")) name = name.slice(0, -3);
  if (!name || /[\\/]/.test(name) || name === "." || name === "..") {
    throw new UsageError(`Invalid name: ${raw}`);
  }
  return name;
}

/**
 * Everything in the available pool with its current activation state.
 * The active directory is read on every call.
 */
export function listTemplates(paths: ToolPaths, kind: TemplateKind): TemplateInfo[] {
  const poolDir = availableDir(paths, kind);
  if (!existsSync(poolDir)) {
    throw new UsageError(`Available ${kind}s directory not found: ${poolDir}`);
  }

  const active = new Set(listMarkdown(activeDir(paths, kind)));

  return listMarkdown(poolDir).map((name) => {
    let displayName = name;
    let description = "";
    try {
      const fields = parseFrontmatter(readFileSync(join(poolDir, `${name}.md`), "utf-8"));
      if (kind === "agent") {
        if (fields.name) displayName = fields.name;
        if (fields.description) description = summarizeDescription(fields.description);
      } else {
        description = fields.description ?? "";
      }
    } catch {
      // unreadable file: list it without a description
    }
    return { name, displayName, description, active: active.has(name) };
  });
}

export function listActive(paths: ToolPaths, kind: TemplateKind): string[] {
  return listMarkdown(activeDir(paths, kind));
}

/**
 * Copy a template from the pool into the active directory. Re-enabling
 * overwrites the active copy with the pool version.
 */
export function enableTemplate(
  paths: ToolPaths,
  kind: TemplateKind,
  rawName: string
): EnableResult {
  const name = normalizeTemplateName(rawName);
  const src = join(availableDir(paths, kind), `${name}.md`);
  const dstDir = activeDir(paths, kind);
  const dst = join(dstDir, `${name}.md`);

  if (!existsSync(src)) {
    throw new UsageError(`${capitalize(kind)} not found: ${name}`);
  }

  const alreadyActive = existsSync(dst);
  try {
    mkdirSync(dstDir, { recursive: true });
    copyFileSync(src, dst);
  } catch (err) {
    throw new FileSystemError("copy to", dst, err);
  }
  return { name, target: dst, alreadyActive };
}

/**
 * Remove a template from the active directory. Disabling something that is
 * not active is a no-op.
 */
export function disableTemplate(
  paths: ToolPaths,
  kind: TemplateKind,
  rawName: string
): DisableResult {
  const name = normalizeTemplateName(rawName);
  const dst = join(activeDir(paths, kind), `${name}.md`);

  if (!existsSync(dst)) {
    return { name, target: dst, removed: false };
  }
  try {
    unlinkSync(dst);
  } catch (err) {
    throw new FileSystemError("delete", dst, err);
  }
  return { name, target: dst, removed: true };
}

/**
 * Enable the full spec → code → review → test workflow set.
 * Items missing from the pool are reported, not fatal.
 */
export function enableWorkflow(paths: ToolPaths): WorkflowItem[] {
  const items: WorkflowItem[] = [];
  const plan: Array<[TemplateKind, string[]]> = [
    ["command", WORKFLOW_COMMANDS],
    ["agent", WORKFLOW_AGENTS],
  ];

  for (const [kind, names] of plan) {
    for (const name of names) {
      if (!existsSync(join(availableDir(paths, kind), `${name}.md`))) {
        items.push({ kind, name, status: "missing" });
        continue;
      }
      enableTemplate(paths, kind, name);
      items.push({ kind, name, status: "enabled" });
    }
  }
  return items;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
