import { spawn } from "child_process";

export type ProcessExit = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
};

export type RunProcessOptions = {
  input?: string;
};

export type ProcessRunner = (command: string, args: string[], opts?: RunProcessOptions) => Promise<ProcessExit>;

/**
 * Spawns a command without a shell and resolves with its exit status.
 * Rejects only when the process cannot be started (e.g. binary not found).
 */
export const runProcess: ProcessRunner = (command, args, opts = {}) =>
  new Promise<ProcessExit>((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: [opts.input != null ? "pipe" : "ignore", "ignore", "ignore"]
    });

    child.once("error", reject);
    child.once("close", (exitCode, signal) => {
      resolve({ exitCode, signal });
    });

    if (opts.input != null && child.stdin) {
      child.stdin.once("error", reject);
      child.stdin.end(opts.input);
    }
  });
