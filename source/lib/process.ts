/**
 * Running external commands (git, gh).
 */

import { spawn } from "child_process";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Runs a command in a working directory and captures its output.
 * Implementations must resolve, never reject: a command that cannot be
 * started resolves with a non-zero exit code.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  cwd: string
) => Promise<CommandResult>;

/** Exit code reported when the executable could not be spawned. */
export const SPAWN_FAILED_EXIT_CODE = 127;

/**
 * Default runner backed by child_process.spawn.
 */
export const runCommand: CommandRunner = (command, args, cwd) => {
  return new Promise((resolve) => {
    const proc = spawn(command, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data) => {
      stderr += data.toString();
    });

    // e.g. ENOENT when gh is not installed
    proc.on("error", (err) => {
      resolve({ exitCode: SPAWN_FAILED_EXIT_CODE, stdout, stderr: err.message });
    });

    proc.on("close", (code) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
  });
};
