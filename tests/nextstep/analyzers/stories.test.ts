import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  analyzeStories,
  completionPercentage,
  extractStatus,
  extractTitle,
} from "../../../src/nextstep/analyzers/stories.js";
import { writeTree } from "../helpers.js";

describe("analyzeStories", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "x100-stories-test-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should return nothing without a stories folder", () => {
    expect(analyzeStories(root)).toEqual([]);
  });

  it("should read US-*.md files in name order", () => {
    writeTree(root, {
      "docs/user-stories/US-002-search.md": [
        "## Search products",
        "",
        "## Acceptance Criteria",
        "- [x] Search by name",
        "- [ ] Search by tag",
        "",
        "## Notes",
        "Working on the tag index.",
      ].join("\n"),
      "docs/user-stories/US-001-login.md": "# US-001: User login\n\nStatus: Done\n\nImplemented in `src/auth.py`.\n",
      "docs/user-stories/US-003.md": "Plain notes\n",
      "docs/user-stories/notes.md": "# Not a story\n",
    });

    expect(analyzeStories(root)).toEqual([
      {
        id: "US-001-login",
        title: "US-001: User login",
        status: "done",
        filePath: "docs/user-stories/US-001-login.md",
        hasImplementation: true,
        hasTests: false,
        acceptanceCriteriaCount: 0,
        completionPercentage: 100,
      },
      {
        id: "US-002-search",
        title: "Search products",
        status: "in-progress",
        filePath: "docs/user-stories/US-002-search.md",
        hasImplementation: false,
        hasTests: false,
        acceptanceCriteriaCount: 2,
        completionPercentage: 50,
      },
      {
        id: "US-003",
        title: "Untitled",
        status: "todo",
        filePath: "docs/user-stories/US-003.md",
        hasImplementation: false,
        hasTests: false,
        acceptanceCriteriaCount: 0,
        completionPercentage: 0,
      },
    ]);
  });
});

describe("extractStatus", () => {
  it("should prefer explicit markers", () => {
    expect(extractStatus("Status: In Progress\n- [x] a")).toBe("in-progress");
    expect(extractStatus("Shipped ✅")).toBe("done");
  });

  it("should derive status from acceptance checkboxes", () => {
    expect(extractStatus("## Acceptance Criteria\n- [x] a\n- [X] b\n")).toBe("done");
    expect(extractStatus("## Acceptance Criteria\n- [ ] a\n- [ ] b\n")).toBe("todo");
  });

  it("should ignore keywords inside checkbox lines", () => {
    expect(extractStatus("# Story\n- [ ] currently implementing the API")).toBe("todo");
    expect(extractStatus("# Story\nWe are currently implementing the API")).toBe("in-progress");
  });
});

describe("story helpers", () => {
  it("should fall back to Untitled without a heading", () => {
    expect(extractTitle("### Too deep\n")).toBe("Untitled");
  });

  it("should weight implementation and tests for stories in progress", () => {
    expect(completionPercentage("in-progress", false, false)).toBe(50);
    expect(completionPercentage("in-progress", true, false)).toBe(80);
    expect(completionPercentage("in-progress", true, true)).toBe(100);
  });
});
