import chalk from "chalk";
import boxen from "boxen";
import { relative } from "node:path";
import type { InitStep, TemplateInfo, TemplateKind, WorkflowItem } from "../types/index.js";

// --- verbose logger ---

let verbose = false;

export function setVerbose(on: boolean): void {
  verbose = on;
}

/**
 * Debug lines go to stderr so report output on stdout stays parseable.
 */
export function debug(...args: unknown[]): void {
  if (verbose) {
    console.error(chalk.dim("[debug]"), ...args);
  }
}

// --- palette ---

export const colors = {
  primary: chalk.hex("#F97316"),
  primaryBold: chalk.hex("#F97316").bold,
};

export type StatusTag = "ENABLED" | "DISABLED" | "CREATED" | "OK" | "SKIP" | "MISSING";

const TAG_PAINT: Record<StatusTag, (s: string) => string> = {
  ENABLED: chalk.green.bold,
  DISABLED: chalk.yellow.bold,
  CREATED: chalk.green.bold,
  OK: chalk.cyan.bold,
  SKIP: chalk.dim,
  MISSING: chalk.red.bold,
};

/**
 * Fixed-width coloured status tag, e.g. `[ENABLED] `.
 */
export function tag(kind: StatusTag): string {
  return TAG_PAINT[kind](`[${kind}]`.padEnd(10));
}

/**
 * Format a dimmed hint line.
 */
export function hint(text: string): string {
  return chalk.dim(`Hint: ${text}`);
}

export function formatBox(content: string, title?: string): string {
  return boxen(content, {
    padding: 1,
    borderColor: "green",
    borderStyle: "round",
    title,
  });
}

// --- logo ---

function lerpRgb(
  from: [number, number, number],
  to: [number, number, number],
  t: number
): [number, number, number] {
  return [
    Math.round(from[0] + (to[0] - from[0]) * t),
    Math.round(from[1] + (to[1] - from[1]) * t),
    Math.round(from[2] + (to[2] - from[2]) * t),
  ];
}

const ASCII_LINES = [
  "        _  ___   ___",
  " __ __ / |/ _ \\ / _ \\",
  " \\ \\ / | | | | | | | |",
  "  > <  | | |_| | |_| |",
  " /_/\\_\\|_|\\___/ \\___/",
];

/**
 * ASCII logo with an orange to red gradient.
 */
export function gradientLogo(): string {
  const orange: [number, number, number] = [249, 115, 22];
  const red: [number, number, number] = [220, 38, 38];
  const total = ASCII_LINES.length - 1;

  return ASCII_LINES.map((line, i) => {
    const [r, g, b] = lerpRgb(orange, red, total > 0 ? i / total : 0);
    return chalk.rgb(r, g, b)(line);
  }).join("\n");
}

export function banner(version: string): string {
  return [
    "",
    `  ${colors.primaryBold("x100")} ${chalk.dim(`v${version}`)}`,
    `  ${chalk.dim("Prompt assets and project health for AI-assisted development")}`,
    "",
  ].join("\n");
}

/**
 * Intro screen shown when x100 runs without arguments.
 */
export function intro(): string {
  return [
    "",
    gradientLogo(),
    "",
    `  ${chalk.dim("Prompt assets and project health for AI-assisted development.")}`,
    "",
    `  ${chalk.dim("Get started:")}`,
    `    ${chalk.bold("x100 init")}              Scaffold a project and write .x100/config.json`,
    `    ${chalk.bold("x100 workflow-enable")}   Activate the standard commands and agents`,
    `    ${chalk.bold("x100 nextstep")}          Analyze project health and suggest next steps`,
    `    ${chalk.bold("x100 --help")}            Show all commands`,
    "",
  ].join("\n");
}

/**
 * Help screen listing top-level commands under the gradient logo.
 */
export function styledHelp(
  version: string,
  commands: Array<{ name: string; description: string }>
): string {
  const lines: string[] = [
    "",
    gradientLogo(),
    "",
    `  x100 v${version}`,
    "",
    `  ${colors.primaryBold("USAGE")}`,
    "",
    `    ${chalk.white("$ x100 <command>")}           ${chalk.dim("Run a specific command")}`,
    `    ${chalk.white("$ x100 <command> --help")}    ${chalk.dim("Command-specific help")}`,
    "",
    `  ${colors.primaryBold("COMMANDS")}`,
    "",
  ];

  const width = Math.max(...commands.map((c) => c.name.length));
  for (const cmd of commands) {
    lines.push(`    ${colors.primary(cmd.name.padEnd(width + 2))} ${chalk.dim(cmd.description)}`);
  }

  lines.push(
    "",
    `  ${colors.primaryBold("OPTIONS")}`,
    "",
    `    ${colors.primary("--verbose")}       ${chalk.dim("Print debug output")}`,
    `    ${colors.primary("--help, -h")}      ${chalk.dim("Show help")}`,
    `    ${colors.primary("--version, -V")}   ${chalk.dim("Show version")}`,
    ""
  );
  return lines.join("\n");
}

// --- listings ---

/**
 * Available templates with ● for active and ○ for inactive entries.
 */
export function templateList(items: TemplateInfo[], kind: TemplateKind, activeDir: string): string {
  const heading = kind === "command" ? "Commands" : "Agents";
  const lines: string[] = ["", `  ${colors.primaryBold(heading)} ${chalk.dim(`(active: ${activeDir})`)}`];

  if (items.length === 0) {
    lines.push(`  ${chalk.dim(`No ${kind}s available.`)}`, "");
    return lines.join("\n");
  }

  const width = Math.max(...items.map((i) => i.displayName.length));
  for (const item of items) {
    const mark = item.active ? chalk.green("\u25CF") : chalk.dim("\u25CB");
    const name = item.active ? chalk.white(item.displayName.padEnd(width)) : chalk.dim(item.displayName.padEnd(width));
    lines.push(`  ${mark} ${name}   ${chalk.dim(item.description)}`.trimEnd());
  }

  const active = items.filter((i) => i.active).length;
  lines.push("", `  ${chalk.dim(`${active} of ${items.length} active`)}`, "");
  return lines.join("\n");
}

export interface AgentDashboardEntry {
  id: string;
  name: string;
  folder: string;
  isDefault: boolean;
  folderExists: boolean;
}

/**
 * Registered assistants: ● default, ○ folder present, × not set up.
 */
export function agentDashboard(entries: AgentDashboardEntry[]): string {
  const lines: string[] = ["", `  ${colors.primaryBold("AI assistants")}`];
  const width = Math.max(...entries.map((e) => e.id.length));

  for (const entry of entries) {
    const id = entry.id.padEnd(width);
    if (entry.isDefault) {
      lines.push(`  ${chalk.green("\u25CF")} ${chalk.white(id)}   ${entry.name}   ${colors.primary("default")}`);
    } else if (entry.folderExists) {
      lines.push(`  ${chalk.dim("\u25CB")} ${chalk.white(id)}   ${entry.name}   ${chalk.dim(entry.folder)}`);
    } else {
      lines.push(`  ${chalk.red("\u00D7")} ${chalk.dim(id)}   ${chalk.dim(entry.name)}`);
    }
  }

  lines.push("");
  return lines.join("\n");
}

export function workflowLines(items: WorkflowItem[]): string[] {
  return items.map((item) =>
    item.status === "enabled"
      ? `  ${tag("ENABLED")} ${item.kind} ${item.name}`
      : `  ${tag("MISSING")} ${item.kind} ${item.name} ${chalk.dim("(not in the available pool)")}`
  );
}

/**
 * One status line per init step, with paths shown relative to the project root.
 */
export function initStepLine(step: InitStep, root: string): string {
  const target = relative(root, step.target) || ".";
  const detail = step.detail ? ` ${chalk.dim(step.detail)}` : "";
  switch (step.status) {
    case "created":
      return `  ${tag("CREATED")} ${target}`;
    case "initialized":
      return `  ${tag("CREATED")} ${target} ${chalk.dim("(git init)")}`;
    case "saved":
      return `  ${tag("OK")} ${target} ${chalk.dim("saved")}`;
    case "exists":
      return `  ${tag("SKIP")} ${target} ${chalk.dim("already exists")}`;
    case "skipped":
      return `  ${tag("SKIP")} ${target}`;
    case "missing-template":
      return `  ${tag("MISSING")} ${target} ${chalk.dim("template not found:")}${detail}`;
    case "failed":
      return `  ${tag("MISSING")} ${target}${detail}`;
  }
}
