/**
 * External process runner. Collects stdout/stderr and resolves with the
 * exit code instead of rejecting on non-zero, so callers decide how a
 * failure is reported. Spawn errors (ENOENT etc.) still reject.
 */

import { spawn } from "child_process";

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<ProcessResult>;

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));
  });

/** Shell-ish rendering of a command line for diagnostics. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((a) => (/\s/.test(a) ? `"${a}"` : a)).join(" ");
}
