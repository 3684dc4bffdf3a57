/**
 * git wrappers used while bootstrapping a project.
 */

import { stat } from "fs/promises";
import { join } from "path";
import type { CommandRunner } from "./process.js";

export type GitResult =
  | { success: true }
  | { success: false; message: string };

function failure(action: string, stderr: string): { success: false; message: string } {
  const detail = stderr.trim();
  return { success: false, message: detail ? `${action}: ${detail}` : action };
}

/**
 * True when the directory already has git metadata.
 * A `.git` file (worktrees, submodules) counts as well as a directory.
 */
export async function gitIsInitialized(dir: string): Promise<boolean> {
  try {
    await stat(join(dir, ".git"));
    return true;
  } catch {
    return false;
  }
}

/**
 * Initialize a repository, optionally naming its first branch.
 */
export async function gitInit(
  run: CommandRunner,
  cwd: string,
  initialBranch?: string | null
): Promise<GitResult> {
  const args = initialBranch ? ["init", `--initial-branch=${initialBranch}`] : ["init"];
  const { exitCode, stderr } = await run("git", args, cwd);
  if (exitCode !== 0) {
    return failure("git init failed", stderr);
  }
  return { success: true };
}

export type GitRemoteUrlResult =
  | { success: true; url: string }
  | { success: false; error: "no_remote" };

/**
 * Look up the URL of a named remote.
 */
export async function gitRemoteGetUrl(
  run: CommandRunner,
  cwd: string,
  remote: string = "origin"
): Promise<GitRemoteUrlResult> {
  const { exitCode, stdout } = await run("git", ["remote", "get-url", remote], cwd);
  if (exitCode !== 0) {
    return { success: false, error: "no_remote" };
  }
  return { success: true, url: stdout.trim() };
}

export async function gitRemoteAdd(
  run: CommandRunner,
  cwd: string,
  remote: string,
  url: string
): Promise<GitResult> {
  const { exitCode, stderr } = await run("git", ["remote", "add", remote, url], cwd);
  if (exitCode !== 0) {
    return failure(`Failed to add remote '${remote}'`, stderr);
  }
  return { success: true };
}

/**
 * Stage everything in the working tree.
 */
export async function gitAddAll(run: CommandRunner, cwd: string): Promise<GitResult> {
  const { exitCode, stderr } = await run("git", ["add", "-A"], cwd);
  if (exitCode !== 0) {
    return failure("git add failed", stderr);
  }
  return { success: true };
}

export type GitStagedResult =
  | { success: true; hasChanges: boolean }
  | { success: false; message: string };

/**
 * `git diff --cached --quiet` exits 1 when something is staged and 0 when
 * nothing is; any other code is an error.
 */
export async function gitHasStagedChanges(
  run: CommandRunner,
  cwd: string
): Promise<GitStagedResult> {
  const { exitCode, stderr } = await run("git", ["diff", "--cached", "--quiet"], cwd);
  if (exitCode === 0) return { success: true, hasChanges: false };
  if (exitCode === 1) return { success: true, hasChanges: true };
  return failure("git diff failed", stderr);
}

export async function gitCommit(
  run: CommandRunner,
  cwd: string,
  message: string
): Promise<GitResult> {
  const { exitCode, stderr } = await run("git", ["commit", "-m", message], cwd);
  if (exitCode !== 0) {
    return failure("git commit failed", stderr);
  }
  return { success: true };
}

/**
 * Name of the checked-out branch, or null on a detached HEAD or error.
 */
export async function gitCurrentBranch(
  run: CommandRunner,
  cwd: string
): Promise<string | null> {
  const { exitCode, stdout } = await run("git", ["branch", "--show-current"], cwd);
  const branch = stdout.trim();
  if (exitCode !== 0 || !branch) {
    return null;
  }
  return branch;
}

export async function gitPush(
  run: CommandRunner,
  cwd: string,
  remote: string,
  branch: string
): Promise<GitResult> {
  const { exitCode, stderr } = await run("git", ["push", "-u", remote, branch], cwd);
  if (exitCode !== 0) {
    return failure(`Push to ${remote}/${branch} failed`, stderr);
  }
  return { success: true };
}
