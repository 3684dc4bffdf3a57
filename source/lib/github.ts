/**
 * GitHub CLI wrappers for repository operations.
 */

import type { CommandRunner } from "./process.js";

export type Visibility = "public" | "private";

/**
 * True when `gh` is installed and has an authenticated session.
 */
export async function ghIsAuthenticated(run: CommandRunner, cwd: string): Promise<boolean> {
  const { exitCode } = await run("gh", ["auth", "status"], cwd);
  return exitCode === 0;
}

export type GhGetLoggedInUserResult =
  | { success: true; login: string }
  | { success: false; error: "not_logged_in" | "other"; message: string };

/**
 * Login of the account gh is authenticated as; the repository owner when
 * no GitHub user is configured.
 */
export async function ghGetLoggedInUser(
  run: CommandRunner,
  cwd: string
): Promise<GhGetLoggedInUserResult> {
  const result = await run("gh", ["api", "user", "--jq", ".login"], cwd);
  const login = result.stdout.trim();
  if (result.exitCode === 0 && login) {
    return { success: true, login };
  }

  const stderr = result.stderr.trim();
  if (/not logged in|auth login/.test(stderr)) {
    return {
      success: false,
      error: "not_logged_in",
      message: "Cannot determine the repository owner: gh has no active login (pass --github-user)",
    };
  }
  return {
    success: false,
    error: "other",
    message: `Cannot determine the repository owner: ${stderr || "gh api user returned no login"}`,
  };
}

export type GhRepoCreateResult =
  | { success: true; url: string | null }
  | { success: false; error: "already_exists" | "other"; message: string };

/**
 * Create a repository from the local directory and register it as `origin`.
 * On success gh prints the repository URL.
 */
export async function ghRepoCreate(
  run: CommandRunner,
  cwd: string,
  name: string,
  visibility: Visibility
): Promise<GhRepoCreateResult> {
  const { exitCode, stdout, stderr } = await run("gh", [
    "repo", "create", name,
    `--${visibility}`,
    "--source=.",
    "--remote=origin",
    "--description", `Project: ${name}`,
  ], cwd);

  if (exitCode !== 0) {
    if (stderr.includes("already exists")) {
      return {
        success: false,
        error: "already_exists",
        message: `Repository ${name} already exists`,
      };
    }
    return { success: false, error: "other", message: stderr.trim() };
  }

  const url = stdout.match(/https:\/\/\S+/)?.[0] ?? null;
  return { success: true, url };
}

/**
 * Web URL of a repository owned by `owner`.
 */
export function githubRepoUrl(owner: string, name: string): string {
  return `https://github.com/${owner}/${name}`;
}

/**
 * Manual commands for a user who has not authenticated gh yet.
 */
export function manualRemoteInstructions(
  name: string,
  visibility: Visibility,
  branch: string
): string[] {
  return [
    "Run 'gh auth login' and then manually create the repo:",
    `  gh repo create ${name} --${visibility} --source=. --remote=origin`,
    `  git add -A && git commit -m 'Initial commit' && git push -u origin ${branch}`,
  ];
}
