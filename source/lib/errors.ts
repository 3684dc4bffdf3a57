/**
 * Errors that abort a run. Anything the remote step can recover from is
 * reported as a warning instead and never reaches these classes.
 */

export class AgentRulesError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AgentRulesError";
  }
}

/** Target directory is missing or is not a directory. */
export class InvalidTargetError extends AgentRulesError {
  constructor(target: string, reason: string) {
    super("INVALID_TARGET", `Directory '${target}' ${reason}.`, { target });
    this.name = "InvalidTargetError";
  }
}

/** Rule source directory is unreadable or holds no rule documents. */
export class RuleSourceError extends AgentRulesError {
  constructor(sourceDir: string, reason: string) {
    super("RULE_SOURCE", `${reason}: ${sourceDir}`, { sourceDir });
    this.name = "RuleSourceError";
  }
}

/** One or more rule documents could not be copied. */
export class RuleCopyError extends AgentRulesError {
  constructor(failures: { file: string; message: string }[]) {
    const list = failures.map((f) => `${f.file} (${f.message})`).join(", ");
    super("RULE_COPY", `Failed to copy rule files: ${list}`, { failures });
    this.name = "RuleCopyError";
  }
}

/** A git command needed for the local setup failed. */
export class GitCommandError extends AgentRulesError {
  constructor(message: string) {
    super("GIT_COMMAND", message);
    this.name = "GitCommandError";
  }
}

/**
 * Renders any thrown value as a single line for the CLI.
 */
export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
