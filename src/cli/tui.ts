import { createInterface } from "node:readline/promises";

/**
 * Prompts for interactive use: a raw-stdin select list and a y/n confirm.
 * Callers check `process.stdin.isTTY` before using either.
 */

export interface SelectOption<T> {
  value: T;
  label: string;
  hint?: string;
  /** Marks an entry that is already active (●). */
  active?: boolean;
}

export const CANCEL: unique symbol = Symbol("cancel");

export function isCancel(value: unknown): value is symbol {
  return value === CANCEL;
}

export type KeyAction = "up" | "down" | "enter" | "cancel";

/**
 * Map a raw stdin chunk to a navigation action.
 */
export function parseKey(data: Buffer): KeyAction | null {
  if (data[0] === 0x03) return "cancel";
  // lone Esc; arrow keys arrive as Esc sequences
  if (data.length === 1 && data[0] === 0x1b) return "cancel";
  if (data[0] === 0x0d || data[0] === 0x0a) return "enter";
  if (data[0] === 0x1b && data[1] === 0x5b) {
    if (data[2] === 0x41) return "up";
    if (data[2] === 0x42) return "down";
    return null;
  }
  switch (String.fromCharCode(data[0])) {
    case "k":
      return "up";
    case "j":
      return "down";
    case "q":
      return "cancel";
    default:
      return null;
  }
}

/**
 * Lines for the visible window of options, with scroll markers above and
 * below when the list does not fit.
 */
export function renderOptions<T>(
  options: SelectOption<T>[],
  selected: number,
  offset: number,
  max: number
): string[] {
  const lines: string[] = [];
  const end = Math.min(offset + max, options.length);

  if (offset > 0) {
    lines.push(`  \x1B[2m↑ ${offset} more\x1B[0m`);
  }

  for (let i = offset; i < end; i++) {
    const opt = options[i];
    const mark = opt.active === undefined ? "" : opt.active ? "\x1B[32m●\x1B[0m " : "○ ";
    const hint = opt.hint ? `  \x1B[2m${opt.hint}\x1B[0m` : "";
    if (i === selected) {
      lines.push(`  \x1B[1m❯\x1B[0m ${mark}\x1B[1m${opt.label}\x1B[0m${hint}`);
    } else {
      lines.push(`    ${mark}\x1B[2m${opt.label}\x1B[0m${hint}`);
    }
  }

  if (end < options.length) {
    lines.push(`  \x1B[2m↓ ${options.length - end} more\x1B[0m`);
  }

  return lines;
}

/**
 * New selection and scroll offset after a move.
 */
export function moveSelection(
  action: "up" | "down",
  selected: number,
  offset: number,
  count: number,
  max: number
): { selected: number; offset: number } {
  if (action === "up") {
    const next = Math.max(0, selected - 1);
    return { selected: next, offset: Math.min(offset, next) };
  }
  const next = Math.min(count - 1, selected + 1);
  return { selected: next, offset: next >= offset + max ? next - max + 1 : offset };
}

/**
 * Inline select prompt driven by arrow keys or j/k. Resolves with the chosen
 * value, or CANCEL on Ctrl+C, Esc or q.
 */
export function select<T>(opts: {
  message: string;
  options: SelectOption<T>[];
  maxVisible?: number;
}): Promise<T | typeof CANCEL> {
  const { message, options } = opts;
  const maxVisible = opts.maxVisible ?? 8;

  return new Promise((resolve) => {
    const stdin = process.stdin;
    const stdout = process.stdout;
    let selected = 0;
    let offset = 0;
    let prevLineCount = 0;
    let done = false;

    stdout.write(`\n  \x1B[38;2;249;115;22m${message}\x1B[0m\n`);
    stdout.write("\x1B[?25l");

    const render = () => {
      if (prevLineCount > 0) {
        stdout.write(`\x1B[${prevLineCount}A\x1B[0J`);
      }
      const lines = renderOptions(options, selected, offset, maxVisible);
      prevLineCount = lines.length;
      stdout.write(lines.join("\n") + "\n");
    };

    const restoreCursor = () => {
      stdout.write("\x1B[?25h");
    };

    const finish = (value: T | typeof CANCEL) => {
      done = true;
      restoreCursor();
      if (stdin.isTTY) stdin.setRawMode(false);
      stdin.pause();
      stdin.removeListener("data", onData);
      process.removeListener("exit", restoreCursor);
      stdout.write("\n");
      resolve(value);
    };

    const onData = (data: Buffer) => {
      if (done) return;
      const key = parseKey(data);
      if (key === "up" || key === "down") {
        ({ selected, offset } = moveSelection(key, selected, offset, options.length, maxVisible));
        render();
      } else if (key === "enter") {
        finish(options.length > 0 ? options[selected].value : CANCEL);
      } else if (key === "cancel") {
        finish(CANCEL);
      }
    };

    process.on("exit", restoreCursor);
    if (stdin.isTTY) stdin.setRawMode(true);
    stdin.resume();
    stdin.on("data", onData);
    render();
  });
}

/**
 * Interpret a y/n answer. Blank input takes the default.
 */
export function parseConfirm(answer: string, defaultValue: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "") return defaultValue;
  return normalized === "y" || normalized === "yes";
}

export async function confirm(message: string, defaultValue = false): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`  ${message} ${defaultValue ? "[Y/n]" : "[y/N]"} `);
    return parseConfirm(answer, defaultValue);
  } finally {
    rl.close();
  }
}
