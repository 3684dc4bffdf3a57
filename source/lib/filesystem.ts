/**
 * Filesystem helpers for check-then-act steps.
 */

import { mkdir, realpath, stat, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { InvalidTargetError } from "./errors.js";

export type EnsureOutcome = "created" | "exists";

/**
 * Resolve a user-supplied directory to an absolute real path.
 * Throws InvalidTargetError when it does not exist or is not a directory.
 */
export async function resolveTargetDir(target: string): Promise<string> {
  let resolved: string;
  try {
    resolved = await realpath(resolve(target));
  } catch {
    throw new InvalidTargetError(target, "does not exist");
  }

  const stats = await stat(resolved);
  if (!stats.isDirectory()) {
    throw new InvalidTargetError(target, "is not a directory");
  }
  return resolved;
}

/**
 * Create a directory (and parents) unless it is already there.
 */
export async function ensureDir(dir: string): Promise<EnsureOutcome> {
  try {
    const stats = await stat(dir);
    if (stats.isDirectory()) return "exists";
  } catch {
    // Missing, create below
  }
  // Fails with EEXIST when a file sits at the path
  await mkdir(dir, { recursive: true });
  return "created";
}

/**
 * Write a file only when nothing exists at the path yet.
 * Existing content is never touched.
 */
export async function ensureFile(filePath: string, content: string): Promise<EnsureOutcome> {
  try {
    await stat(filePath);
    return "exists";
  } catch {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
    return "created";
  }
}
