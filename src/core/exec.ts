import { execFile } from "node:child_process";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
  /** The binary was not found on PATH. */
  notFound: boolean;
  timedOut: boolean;
}

/**
 * Runs an external binary with arguments. Tests swap in a fake.
 */
export type CommandRunner = (
  cmd: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number }
) => Promise<CommandResult>;

/**
 * execFile wrapper that always resolves. Non-zero exits, timeouts and a
 * missing binary are reported in the result instead of thrown.
 */
export const runCommand: CommandRunner = (cmd, args, options = {}) =>
  new Promise((resolve) => {
    execFile(
      cmd,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: 16 * 1024 * 1024,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ code: 0, stdout, stderr, notFound: false, timedOut: false });
          return;
        }
        const errno = "code" in error ? error.code : undefined;
        const notFound = errno === "ENOENT";
        const code = typeof errno === "number" ? errno : 1;
        const timedOut = options.timeoutMs !== undefined && error.killed === true;
        resolve({ code, stdout, stderr: stderr || error.message, notFound, timedOut });
      }
    );
  });
