/**
 * Project bootstrap: installs the rule documents into a target project and
 * sets up its repository.
 *
 * Steps 1-6 are local and must succeed; any failure there is thrown. Step 7
 * (GitHub) is best effort: problems become warnings and never undo the
 * local work.
 */

import { basename, join } from "path";
import { CONFIG_DIR_NAME, IGNORE_ENTRY, getDefaultBranch, getGithubUser, getRulesDir } from "./config.js";
import { GitCommandError, RuleCopyError } from "./errors.js";
import { ensureDir, ensureFile, resolveTargetDir } from "./filesystem.js";
import {
  gitAddAll,
  gitCommit,
  gitCurrentBranch,
  gitHasStagedChanges,
  gitInit,
  gitIsInitialized,
  gitPush,
  gitRemoteAdd,
  gitRemoteGetUrl,
} from "./git.js";
import {
  ghGetLoggedInUser,
  ghIsAuthenticated,
  ghRepoCreate,
  githubRepoUrl,
  manualRemoteInstructions,
  type Visibility,
} from "./github.js";
import { ensureIgnoreEntry } from "./gitignore.js";
import { runCommand, type CommandRunner } from "./process.js";
import { listRuleFiles, syncRuleFiles } from "./rules.js";
import { TRACKING_DOCS, renderTrackingDoc } from "./templates.js";

export const TOTAL_STEPS = 7;

const FALLBACK_BRANCH = "main";

export type StepStatus = "created" | "updated" | "unchanged" | "skipped" | "warning";

export type StepReport = {
  index: number;
  total: number;
  status: StepStatus;
  message: string;
  details: string[];
};

export type BootstrapContext = {
  sourceDir: string;
  targetDir: string;
  projectName: string;
  configDir: string;
  ruleFiles: string[];
};

export type RemoteOutcome =
  | { status: "disabled" }
  | { status: "not_authenticated" }
  | {
      status: "configured";
      remote: "existing" | "created" | "attached" | "missing";
      commit: "committed" | "nothing_to_commit" | "failed";
      pushed: boolean;
      repoUrl: string | null;
    };

export type BootstrapResult = {
  context: BootstrapContext;
  steps: StepReport[];
  remote: RemoteOutcome;
};

export type ProgressEvent =
  | { type: "start"; context: BootstrapContext }
  | { type: "step"; step: StepReport };

export type BootstrapOptions = {
  /** Directory to set up (default: cwd) */
  targetDir?: string;
  /** Defaults to the target directory's base name */
  projectName?: string;
  sourceDir?: string;
  githubUser?: string;
  branch?: string;
  visibility?: Visibility;
  /** Set to false to skip the GitHub step entirely */
  remote?: boolean;
  run?: CommandRunner;
  onProgress?: (event: ProgressEvent) => void;
};

/**
 * Run the full bootstrap checklist against a target directory.
 * Safe to re-run: only missing pieces are created and tracking docs are
 * never overwritten.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<BootstrapResult> {
  const run = options.run ?? runCommand;
  const visibility = options.visibility ?? "public";
  const branch = getDefaultBranch(options.branch);

  // Preconditions, checked before anything is written
  const targetDir = await resolveTargetDir(options.targetDir || process.cwd());
  const sourceDir = getRulesDir(options.sourceDir);
  const ruleFiles = await listRuleFiles(sourceDir);

  const context: BootstrapContext = {
    sourceDir,
    targetDir,
    projectName: options.projectName || basename(targetDir),
    configDir: join(targetDir, CONFIG_DIR_NAME),
    ruleFiles,
  };
  options.onProgress?.({ type: "start", context });

  const steps: StepReport[] = [];
  const report = (status: StepStatus, message: string, details: string[] = []) => {
    const step: StepReport = { index: steps.length + 1, total: TOTAL_STEPS, status, message, details };
    steps.push(step);
    options.onProgress?.({ type: "step", step });
  };

  // 1. Configuration folder
  const dirOutcome = await ensureDir(context.configDir);
  report(
    dirOutcome === "created" ? "created" : "unchanged",
    dirOutcome === "created"
      ? `Created ${CONFIG_DIR_NAME} folder`
      : `${CONFIG_DIR_NAME} folder already exists`
  );

  // 2. Rule documents
  const sync = await syncRuleFiles(ruleFiles, context.configDir);
  if (sync.errors.length > 0) {
    throw new RuleCopyError(sync.errors);
  }
  report(
    sync.copied + sync.updated > 0 ? "updated" : "unchanged",
    `Copied ${ruleFiles.length} rule files to ${CONFIG_DIR_NAME}/`,
    sync.files.map((f) => `- ${f.name}`)
  );

  // 3-4. Tracking documents
  for (const doc of TRACKING_DOCS) {
    const content = await renderTrackingDoc(doc, context.projectName, sourceDir);
    const outcome = await ensureFile(join(context.configDir, doc), content);
    report(
      outcome === "created" ? "created" : "unchanged",
      outcome === "created" ? `Created ${doc}` : `${doc} already exists (preserving existing)`
    );
  }

  // 5. .gitignore
  const ignoreOutcome = await ensureIgnoreEntry(targetDir, IGNORE_ENTRY);
  const ignoreMessages = {
    created: `Created .gitignore with ${IGNORE_ENTRY}`,
    appended: `Added ${IGNORE_ENTRY} to .gitignore`,
    present: `${IGNORE_ENTRY} already in .gitignore`,
  } as const;
  report(
    ignoreOutcome === "present" ? "unchanged" : ignoreOutcome === "created" ? "created" : "updated",
    ignoreMessages[ignoreOutcome]
  );

  // 6. Local repository
  if (await gitIsInitialized(targetDir)) {
    report("unchanged", "Git repository already initialized");
  } else {
    const init = await gitInit(run, targetDir, branch);
    if (!init.success) {
      throw new GitCommandError(init.message);
    }
    report("created", "Initialized Git repository");
  }

  // 7. GitHub repository
  let remote: RemoteOutcome;
  if (options.remote === false) {
    remote = { status: "disabled" };
    report("skipped", "GitHub setup skipped");
  } else {
    remote = await setupRemote(context, {
      run,
      branch,
      visibility,
      githubUser: getGithubUser(options.githubUser),
      report,
    });
  }

  return { context, steps, remote };
}

type RemoteSetup = {
  run: CommandRunner;
  branch: string | null;
  visibility: Visibility;
  githubUser: string | null;
  report: (status: StepStatus, message: string, details?: string[]) => void;
};

/**
 * Best-effort GitHub setup. Never throws for command failures; every
 * problem is folded into the step report.
 */
async function setupRemote(context: BootstrapContext, setup: RemoteSetup): Promise<RemoteOutcome> {
  const { run, visibility, report } = setup;
  const { targetDir: cwd, projectName } = context;

  if (!(await ghIsAuthenticated(run, cwd))) {
    report(
      "warning",
      "GitHub CLI not authenticated, skipping GitHub repository",
      manualRemoteInstructions(projectName, visibility, setup.branch ?? FALLBACK_BRANCH)
    );
    return { status: "not_authenticated" };
  }

  const details: string[] = [];
  const warnings: string[] = [];
  let repoUrl: string | null = null;
  let remote: "existing" | "created" | "attached" | "missing";

  const existing = await gitRemoteGetUrl(run, cwd, "origin");
  if (existing.success) {
    remote = "existing";
    repoUrl = existing.url;
    details.push("Remote 'origin' already exists");
  } else {
    const created = await ghRepoCreate(run, cwd, projectName, visibility);
    if (created.success) {
      remote = "created";
      repoUrl = created.url;
      details.push(`Created GitHub repository ${projectName}`);
    } else {
      details.push("Repository may already exist, adding remote...");
      const attached = await attachExistingRemote(setup, cwd, projectName);
      if (attached.success) {
        remote = "attached";
        repoUrl = attached.url;
        details.push(`Added remote 'origin' -> ${attached.url}`);
      } else {
        remote = "missing";
        warnings.push(attached.message);
      }
    }
  }

  let commit: "committed" | "nothing_to_commit" | "failed" = "failed";
  let pushed = false;

  const added = await gitAddAll(run, cwd);
  const staged = added.success
    ? await gitHasStagedChanges(run, cwd)
    : added;

  if (!staged.success) {
    warnings.push(staged.message);
  } else if (!staged.hasChanges) {
    commit = "nothing_to_commit";
    details.push("No changes to commit");
  } else {
    const committed = await gitCommit(run, cwd, `Initial commit: Set up ${projectName} project`);
    if (!committed.success) {
      warnings.push(committed.message);
    } else {
      commit = "committed";
      const branch = setup.branch ?? (await gitCurrentBranch(run, cwd)) ?? FALLBACK_BRANCH;
      const push = await gitPush(run, cwd, "origin", branch);
      if (push.success) {
        pushed = true;
        details.push(`Pushed ${branch} to GitHub`);
      } else {
        warnings.push(`${push.message} - you may need to push manually`);
      }
    }
  }

  let status: StepStatus = "unchanged";
  if (warnings.length > 0) {
    status = "warning";
  } else if (remote !== "existing" || pushed) {
    status = "updated";
  }
  report(status, "Set up GitHub repository", [...details, ...warnings.map((w) => `WARNING: ${w}`)]);

  return { status: "configured", remote, commit, pushed, repoUrl };
}

/**
 * Attach `origin` to a repository that gh refused to create because it
 * already exists on GitHub.
 */
async function attachExistingRemote(
  setup: RemoteSetup,
  cwd: string,
  projectName: string
): Promise<{ success: true; url: string } | { success: false; message: string }> {
  let owner = setup.githubUser;
  if (!owner) {
    const user = await ghGetLoggedInUser(setup.run, cwd);
    if (!user.success) {
      return { success: false, message: user.message };
    }
    owner = user.login;
  }

  const url = `${githubRepoUrl(owner, projectName)}.git`;
  const added = await gitRemoteAdd(setup.run, cwd, "origin", url);
  if (!added.success) {
    return { success: false, message: added.message };
  }
  return { success: true, url };
}
