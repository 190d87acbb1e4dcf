import chalk from "chalk";
import type { Step, StepStatus } from "../types/index.js";

/**
 * Ordered list of steps rendered as a tree of ●/○ lines.
 */
export class StepTracker {
  readonly title: string;
  private readonly steps: Step[] = [];

  constructor(title: string) {
    this.title = title;
  }

  add(key: string, label: string): void {
    if (!this.steps.some((s) => s.key === key)) {
      this.steps.push({ key, label, status: "pending", detail: "" });
    }
  }

  start(key: string, detail = ""): void {
    this.update(key, "running", detail);
  }

  complete(key: string, detail = ""): void {
    this.update(key, "done", detail);
  }

  error(key: string, detail = ""): void {
    this.update(key, "error", detail);
  }

  skip(key: string, detail = ""): void {
    this.update(key, "skipped", detail);
  }

  get(key: string): Step | undefined {
    return this.steps.find((s) => s.key === key);
  }

  list(): Step[] {
    return this.steps.map((s) => ({ ...s }));
  }

  hasErrors(): boolean {
    return this.steps.some((s) => s.status === "error");
  }

  render(): string {
    const lines = [chalk.cyan(this.title)];
    this.steps.forEach((step, i) => {
      const branch = chalk.gray(i === this.steps.length - 1 ? "└── " : "├── ");
      const detail = step.detail.trim();
      let text: string;
      if (step.status === "pending") {
        text = chalk.gray(detail ? `${step.label} (${detail})` : step.label);
      } else {
        text = detail ? `${chalk.white(step.label)} ${chalk.gray(`(${detail})`)}` : chalk.white(step.label);
      }
      lines.push(`${branch}${symbolFor(step.status)} ${text}`);
    });
    return lines.join("\n");
  }

  private update(key: string, status: StepStatus, detail: string): void {
    const step = this.steps.find((s) => s.key === key);
    if (step) {
      step.status = status;
      if (detail) step.detail = detail;
      return;
    }
    this.steps.push({ key, label: key, status, detail });
  }
}

function symbolFor(status: StepStatus): string {
  switch (status) {
    case "done":
      return chalk.green("●");
    case "pending":
      return chalk.green.dim("○");
    case "running":
      return chalk.cyan("○");
    case "error":
      return chalk.red("●");
    case "skipped":
      return chalk.yellow("○");
  }
}
