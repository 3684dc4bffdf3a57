import { fileURLToPath } from "url";

/** Name of the per-project configuration folder the rules are installed into. */
export const CONFIG_DIR_NAME = ".claude";

/** Line that keeps the configuration folder out of version control. */
export const IGNORE_ENTRY = `${CONFIG_DIR_NAME}/`;

/**
 * Directory of rule documents shipped with the package.
 * Resolves the same from `source/lib` and from the compiled `dist/lib`.
 */
export function getBundledRulesDir(): string {
  return fileURLToPath(new URL("../../rules", import.meta.url));
}

/**
 * Resolves the directory the rule documents are read from.
 * Priority: explicit argument > AGENT_RULES_SOURCE_DIR env var > bundled rules
 */
export function getRulesDir(explicitDir?: string): string {
  return (
    explicitDir || process.env.AGENT_RULES_SOURCE_DIR || getBundledRulesDir()
  );
}

/**
 * Resolves the GitHub owner used when attaching an existing remote.
 * Priority: explicit argument > AGENT_RULES_GITHUB_USER env var.
 * Returns null when neither is set; callers fall back to the logged-in gh user.
 */
export function getGithubUser(explicitUser?: string): string | null {
  return explicitUser || process.env.AGENT_RULES_GITHUB_USER || null;
}

/**
 * Resolves the configured default branch.
 * Priority: explicit argument > AGENT_RULES_BRANCH env var.
 * Returns null when unset; the repository's current branch is used then.
 */
export function getDefaultBranch(explicitBranch?: string): string | null {
  return explicitBranch || process.env.AGENT_RULES_BRANCH || null;
}
