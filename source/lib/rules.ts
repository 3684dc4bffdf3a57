/**
 * Rule documents: discovery in the source directory and copying into
 * project configuration folders.
 */

import { copyFile, mkdir, readdir, readFile, stat } from "fs/promises";
import { basename, join, resolve } from "path";
import { CONFIG_DIR_NAME } from "./config.js";
import { RuleSourceError } from "./errors.js";
import { TRACKING_DOCS } from "./templates.js";

export type SyncAction = "copied" | "updated" | "unchanged";

export type SyncedFile = {
  name: string;
  action: SyncAction;
};

export type SyncError = {
  file: string;
  message: string;
};

export type SyncStats = {
  files: SyncedFile[];
  copied: number;
  updated: number;
  unchanged: number;
  errors: SyncError[];
};

/**
 * Whether a file name in the source directory is a rule document.
 * Template placeholders and the per-project tracking docs are not.
 */
export function isRuleFileName(name: string): boolean {
  if (!name.endsWith(".md")) return false;
  if (name.endsWith("-template.md")) return false;
  return !TRACKING_DOCS.some((doc) => doc === name);
}

/**
 * Top-level rule documents of `sourceDir`, sorted by name.
 * Throws RuleSourceError when the directory is unreadable or has none.
 */
export async function listRuleFiles(sourceDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(sourceDir);
  } catch {
    throw new RuleSourceError(sourceDir, "Rule source directory not readable");
  }

  const ruleFiles: string[] = [];
  for (const name of entries.filter(isRuleFileName).sort()) {
    const filePath = join(sourceDir, name);
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) continue;
    } catch {
      continue;
    }
    ruleFiles.push(filePath);
  }

  if (ruleFiles.length === 0) {
    throw new RuleSourceError(sourceDir, "No .md rule files found");
  }
  return ruleFiles;
}

async function readOptional(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch {
    return null;
  }
}

/**
 * Copy rule documents into `configDir`, overwriting copies that differ from
 * the source. Per-file failures are collected rather than thrown so the
 * remaining files are still processed. With `dryRun` nothing is written but
 * the actions are reported as if it had been.
 */
export async function syncRuleFiles(
  ruleFiles: string[],
  configDir: string,
  options: { dryRun?: boolean } = {}
): Promise<SyncStats> {
  const dryRun = options.dryRun ?? false;
  const stats: SyncStats = { files: [], copied: 0, updated: 0, unchanged: 0, errors: [] };

  if (!dryRun) {
    await mkdir(configDir, { recursive: true });
  }

  for (const ruleFile of ruleFiles) {
    const name = basename(ruleFile);
    const targetFile = join(configDir, name);

    try {
      const source = await readFile(ruleFile);
      const existing = await readOptional(targetFile);

      let action: SyncAction;
      if (existing === null) {
        action = "copied";
      } else if (existing.equals(source)) {
        action = "unchanged";
      } else {
        action = "updated";
      }

      if (action !== "unchanged" && !dryRun) {
        await copyFile(ruleFile, targetFile);
      }

      stats[action]++;
      stats.files.push({ name, action });
    } catch (err) {
      stats.errors.push({ file: name, message: err instanceof Error ? err.message : String(err) });
    }
  }

  return stats;
}

/**
 * One-line summary such as "2 copied, 1 unchanged".
 */
export function describeStats(stats: SyncStats): string {
  const actions: string[] = [];
  if (stats.copied) actions.push(`${stats.copied} copied`);
  if (stats.updated) actions.push(`${stats.updated} updated`);
  if (stats.unchanged) actions.push(`${stats.unchanged} unchanged`);
  if (stats.errors.length) actions.push(`${stats.errors.length} errors`);
  return actions.length > 0 ? actions.join(", ") : "No changes";
}

/**
 * Sub-directories of `parentDir` that already carry a configuration folder.
 * Hidden directories and the directories in `exclude` are skipped.
 */
export async function findRuleProjects(
  parentDir: string,
  exclude: string[] = []
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(parentDir);
  } catch {
    // Parent directory doesn't exist - nothing to sync
    return [];
  }

  const excluded = new Set(exclude.map((dir) => resolve(dir)));
  const projects: string[] = [];

  for (const name of entries) {
    if (name.startsWith(".")) continue;

    const projectPath = resolve(parentDir, name);
    if (excluded.has(projectPath)) continue;

    try {
      const projectStat = await stat(projectPath);
      if (!projectStat.isDirectory()) continue;
      const configStat = await stat(join(projectPath, CONFIG_DIR_NAME));
      if (!configStat.isDirectory()) continue;
    } catch {
      continue;
    }

    projects.push(projectPath);
  }

  return projects.sort();
}
