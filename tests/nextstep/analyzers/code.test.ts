import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { countLines, findMarkers, scanCodebase } from "../../../src/nextstep/analyzers/code.js";
import { writeTree } from "../helpers.js";

describe("scanCodebase", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "x100-code-test-"));
    writeTree(root, {
      "src/app.py": "import os\n# TODO: handle errors\nx = 1  # FIXME broken\n",
      "src/web/main.ts": "// todo: lower case works\nconst a = 1;",
      "src/lib.go": "package lib\n",
      "src/empty.js": "",
      "src/blank.rs": "// TODO   \nfn main() {}\n",
      "README.md": "# TODO: not code\n",
      "node_modules/pkg/index.js": "// TODO: vendored\n",
      "dist/out.js": "// FIXME: built\n",
      ".git/hooks/pre-commit.py": "# TODO: hook\n",
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should count code files, lines and markers outside excluded directories", async () => {
    const result = await scanCodebase(root);

    expect(result.fileCount).toBe(5);
    expect(result.lineCount).toBe(8);
    expect(result.pythonFiles).toBe(1);
    expect(result.javascriptFiles).toBe(2);
    expect(result.otherFiles).toBe(2);
    expect(result.todos).toEqual([
      { file: "src/app.py", line: 2, text: "handle errors", type: "TODO" },
      { file: "src/web/main.ts", line: 1, text: "lower case works", type: "TODO" },
    ]);
    expect(result.fixmes).toEqual([{ file: "src/app.py", line: 3, text: "broken", type: "FIXME" }]);
  });

  it("should give identical results on two runs over an unchanged tree", async () => {
    const first = await scanCodebase(root);
    const second = await scanCodebase(root);
    expect(second).toEqual(first);
  });

  it("should return zeros for an empty directory", async () => {
    const empty = mkdtempSync(join(tmpdir(), "x100-code-empty-"));
    try {
      expect(await scanCodebase(empty)).toEqual({
        fileCount: 0,
        lineCount: 0,
        pythonFiles: 0,
        javascriptFiles: 0,
        otherFiles: 0,
        todos: [],
        fixmes: [],
      });
    } finally {
      rmSync(empty, { recursive: true, force: true });
    }
  });
});

describe("countLines", () => {
  it("should count a trailing unterminated line", () => {
    expect(countLines("")).toBe(0);
    expect(countLines("a")).toBe(1);
    expect(countLines("a\n")).toBe(1);
    expect(countLines("a\nb")).toBe(2);
    expect(countLines("\n\n")).toBe(2);
  });
});

describe("findMarkers", () => {
  it("should only match markers after a comment prefix", () => {
    const text = "TODO without prefix\n#TODO tight\n// FIXME: spaced out  \nlet s = 'todo list';";
    expect(findMarkers("a.ts", text)).toEqual({
      todos: [{ file: "a.ts", line: 2, text: "tight", type: "TODO" }],
      fixmes: [{ file: "a.ts", line: 3, text: "spaced out", type: "FIXME" }],
    });
  });
});
