import { readFileSync } from "node:fs";
import { extname, join } from "node:path";
import { glob } from "glob";
import type { CodeAnalysis, TodoItem } from "../../types/index.js";

export const EXCLUDED_DIRS = [
  ".git",
  ".venv",
  "venv",
  "node_modules",
  "__pycache__",
  ".pytest_cache",
  ".mypy_cache",
  "dist",
  "build",
  ".next",
  "coverage",
  ".coverage",
  ".tox",
  "htmlcov",
];

export const CODE_EXTENSIONS = new Set([
  ".py",
  ".js",
  ".jsx",
  ".ts",
  ".tsx",
  ".go",
  ".java",
  ".rs",
  ".rb",
  ".php",
  ".c",
  ".cpp",
  ".h",
  ".hpp",
]);

const JAVASCRIPT_EXTENSIONS = new Set([".js", ".jsx", ".ts", ".tsx"]);

const TODO_PATTERN = /#\s*TODO:?\s*(.+)|\/\/\s*TODO:?\s*(.+)/i;
const FIXME_PATTERN = /#\s*FIXME:?\s*(.+)|\/\/\s*FIXME:?\s*(.+)/i;

export const EXCLUDE_GLOBS = EXCLUDED_DIRS.map((dir) => `**/${dir}/**`);

/**
 * Files under `root` (dotfiles included, excluded dirs skipped), relative
 * with `/` separators and sorted.
 */
export async function listProjectFiles(root: string): Promise<string[]> {
  const files = await glob("**/*", {
    cwd: root,
    nodir: true,
    dot: true,
    posix: true,
    ignore: EXCLUDE_GLOBS,
  });
  return files.sort();
}

/**
 * Newline-terminated lines plus a trailing unterminated one. "" is 0 lines.
 */
export function countLines(text: string): number {
  if (text.length === 0) return 0;
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return text.endsWith("\n") ? count : count + 1;
}

/**
 * TODO/FIXME markers after `#` or `//` in one file's text.
 */
export function findMarkers(file: string, text: string): { todos: TodoItem[]; fixmes: TodoItem[] } {
  const todos: TodoItem[] = [];
  const fixmes: TodoItem[] = [];

  text.split("\n").forEach((line, i) => {
    const todo = matchMarker(TODO_PATTERN, line);
    if (todo) todos.push({ file, line: i + 1, text: todo, type: "TODO" });

    const fixme = matchMarker(FIXME_PATTERN, line);
    if (fixme) fixmes.push({ file, line: i + 1, text: fixme, type: "FIXME" });
  });

  return { todos, fixmes };
}

function matchMarker(pattern: RegExp, line: string): string | undefined {
  const match = pattern.exec(line);
  if (!match) return undefined;
  const text = (match[1] ?? match[2] ?? "").trim();
  return text || undefined;
}

/**
 * Single pass over the source tree: file and line counts by language and
 * TODO/FIXME markers. No caching; two runs over an unchanged tree agree.
 */
export async function scanCodebase(root: string): Promise<CodeAnalysis> {
  const files = (await listProjectFiles(root)).filter((f) => CODE_EXTENSIONS.has(extname(f)));

  let lineCount = 0;
  let pythonFiles = 0;
  let javascriptFiles = 0;
  const todos: TodoItem[] = [];
  const fixmes: TodoItem[] = [];

  for (const file of files) {
    const ext = extname(file);
    if (ext === ".py") pythonFiles++;
    else if (JAVASCRIPT_EXTENSIONS.has(ext)) javascriptFiles++;

    let text: string;
    try {
      text = readFileSync(join(root, file), "utf-8");
    } catch {
      continue; // unreadable: counted as a file, contributes no lines
    }
    lineCount += countLines(text);
    const markers = findMarkers(file, text);
    todos.push(...markers.todos);
    fixmes.push(...markers.fixmes);
  }

  return {
    fileCount: files.length,
    lineCount,
    pythonFiles,
    javascriptFiles,
    otherFiles: files.length - pythonFiles - javascriptFiles,
    todos,
    fixmes,
  };
}
